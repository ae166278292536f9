import { existsSync, readFileSync, statSync } from 'node:fs';

import type { IconFileReader } from '../types/adapters.types';

export const MAX_ICON_FILE_BYTES = 5 * 1024 * 1024;

/**
 * Synchronous local-file reader for custom icons.
 * Missing paths, directories and oversized files read as undefined.
 */
export const createNodeIconFileReader = (maxBytes: number = MAX_ICON_FILE_BYTES): IconFileReader => ({
    readFile(path: string): Uint8Array | undefined {
        if (!existsSync(path)) {
            return undefined;
        }
        const stats = statSync(path);
        if (!stats.isFile() || stats.size > maxBytes) {
            return undefined;
        }
        return new Uint8Array(readFileSync(path));
    },
});
