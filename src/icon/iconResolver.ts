import type { IconFileReader, ImageDecoder } from '../types/adapters.types';
import type { ResolvedIcon } from '../types/onboarding.types';
import { logDebugEvent } from '../layout/debug/debugLog';

const DEFAULT_ICON_SVG =
    '<svg xmlns="http://www.w3.org/2000/svg" width="64" height="64" viewBox="0 0 64 64">' +
    '<circle cx="32" cy="32" r="30" fill="#0f62fe"/>' +
    '<path d="M20 33l8 8 16-18" fill="none" stroke="#ffffff" stroke-width="5" stroke-linecap="round" stroke-linejoin="round"/>' +
    '</svg>';

export const DEFAULT_TOP_ICON: ResolvedIcon = {
    src: `data:image/svg+xml,${encodeURIComponent(DEFAULT_ICON_SVG)}`,
    mimeType: 'image/svg+xml',
    widthPx: 64,
    heightPx: 64,
};

export interface IconSources {
    fileReader: IconFileReader;
    imageDecoder: ImageDecoder;
    defaultIcon?: ResolvedIcon;
}

/**
 * Resolve the icon shown above a page's content.
 *
 * Returns the decoded custom icon when the path points at a readable image;
 * in every other case (no path, missing file, unreadable file, undecodable
 * bytes) returns the same default icon.
 */
export const resolveTopIcon = (path: string | undefined, sources: IconSources): ResolvedIcon => {
    const fallback = sources.defaultIcon ?? DEFAULT_TOP_ICON;

    if (path === undefined || path.trim().length === 0) {
        return fallback;
    }

    try {
        const bytes = sources.fileReader.readFile(path);
        if (!bytes) {
            logDebugEvent('icon', '🔍', 'icon-file-missing', { path });
            return fallback;
        }

        const icon = sources.imageDecoder.decode(bytes);
        if (!icon) {
            logDebugEvent('icon', '🧩', 'icon-not-decodable', { path, byteLength: bytes.length });
            return fallback;
        }

        logDebugEvent('icon', '🖼️', 'icon-resolved', { path, mimeType: icon.mimeType });
        return icon;
    } catch (error) {
        logDebugEvent('icon', '⚠️', 'icon-load-failed', {
            path,
            error: error instanceof Error ? error.message : String(error),
        });
        return fallback;
    }
};
