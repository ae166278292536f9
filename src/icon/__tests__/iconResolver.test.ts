/**
 * @jest-environment node
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { DEFAULT_TOP_ICON, resolveTopIcon } from '../iconResolver';
import type { IconSources } from '../iconResolver';
import { createNodeIconFileReader } from '../nodeIconFileReader';
import { createNodeAdapters } from '../../node';
import { createDefaultAdapters } from '../../types/adapters.types';
import { createDefaultImageDecoder, detectImageMimeType, toBase64 } from '../imageDecoder';
import { createPngHeader } from '../../__tests__/test-utils';
import type { ResolvedIcon } from '../../types/onboarding.types';

const bytesOf = (text: string) => new Uint8Array(Array.from(text, (char) => char.charCodeAt(0)));

describe('resolveTopIcon', () => {
    let workDir: string;
    let sources: IconSources;

    beforeAll(() => {
        workDir = mkdtempSync(join(tmpdir(), 'onboarding-icon-'));
        writeFileSync(join(workDir, 'icon.png'), createPngHeader(16, 8));
        writeFileSync(join(workDir, 'notes.txt'), 'not an image');
        mkdirSync(join(workDir, 'folder.png'));
        sources = {
            fileReader: createNodeIconFileReader(),
            imageDecoder: createDefaultImageDecoder(),
        };
    });

    afterAll(() => {
        rmSync(workDir, { recursive: true, force: true });
    });

    it('returns the default icon when no path is set', () => {
        expect(resolveTopIcon(undefined, sources)).toBe(DEFAULT_TOP_ICON);
    });

    it('returns the same value for a missing file as for no path', () => {
        const missing = resolveTopIcon(join(workDir, 'missing.png'), sources);
        expect(missing).toBe(resolveTopIcon(undefined, sources));
    });

    it('falls back when the bytes are not an image', () => {
        expect(resolveTopIcon(join(workDir, 'notes.txt'), sources)).toBe(DEFAULT_TOP_ICON);
    });

    it('falls back when the path is a directory', () => {
        expect(resolveTopIcon(join(workDir, 'folder.png'), sources)).toBe(DEFAULT_TOP_ICON);
    });

    it('decodes a readable image file', () => {
        const icon = resolveTopIcon(join(workDir, 'icon.png'), sources);

        expect(icon).toEqual({
            src: `data:image/png;base64,${toBase64(createPngHeader(16, 8))}`,
            mimeType: 'image/png',
            widthPx: 16,
            heightPx: 8,
        });
    });

    it('falls back when an adapter throws', () => {
        const failing: IconSources = {
            ...sources,
            fileReader: {
                readFile: () => {
                    throw new Error('EACCES: permission denied');
                },
            },
        };
        expect(resolveTopIcon(join(workDir, 'icon.png'), failing)).toBe(DEFAULT_TOP_ICON);
    });

    it('falls back for text that starts like a bitmap', () => {
        const bitmapLikeText = bytesOf('BMW service history for the fleet car');
        const textSources: IconSources = { ...sources, fileReader: { readFile: () => bitmapLikeText } };

        expect(resolveTopIcon('/icons/fleet.bmp', textSources)).toBe(DEFAULT_TOP_ICON);
    });

    it('falls back for a bare PNG signature', () => {
        const signatureOnly = createPngHeader().subarray(0, 8);
        const truncated: IconSources = { ...sources, fileReader: { readFile: () => signatureOnly } };

        expect(resolveTopIcon('/icons/truncated.png', truncated)).toBe(DEFAULT_TOP_ICON);
    });

    it('uses a configured default icon for every failure', () => {
        const defaultIcon: ResolvedIcon = { src: 'app://default-icon.png', mimeType: 'image/png' };
        const configured = { ...sources, defaultIcon };

        expect(resolveTopIcon(undefined, configured)).toBe(defaultIcon);
        expect(resolveTopIcon('   ', configured)).toBe(defaultIcon);
        expect(resolveTopIcon(join(workDir, 'missing.png'), configured)).toBe(defaultIcon);
        expect(resolveTopIcon(join(workDir, 'notes.txt'), configured)).toBe(defaultIcon);
    });
});

describe('createDefaultImageDecoder', () => {
    const decoder = createDefaultImageDecoder();

    it('recognizes common signatures', () => {
        expect(detectImageMimeType(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
        expect(detectImageMimeType(bytesOf('GIF89a\u0002\u0000\u0003\u0000'))).toBe('image/gif');
        expect(detectImageMimeType(bytesOf('RIFF\u0000\u0000\u0000\u0000WEBPVP8 '))).toBe('image/webp');
        expect(detectImageMimeType(bytesOf('\n  <svg xmlns="http://www.w3.org/2000/svg"></svg>'))).toBe('image/svg+xml');
        expect(detectImageMimeType(bytesOf('hello'))).toBeUndefined();
    });

    it('reads GIF dimensions', () => {
        const icon = decoder.decode(bytesOf('GIF89a\u0002\u0000\u0003\u0000'));
        expect(icon?.widthPx).toBe(2);
        expect(icon?.heightPx).toBe(3);
    });

    it('requires a complete PNG header with non-zero dimensions', () => {
        expect(decoder.decode(createPngHeader().subarray(0, 8))).toBeUndefined();
        expect(decoder.decode(createPngHeader(0, 8))).toBeUndefined();
        expect(decoder.decode(createPngHeader(16, 0))).toBeUndefined();
        expect(detectImageMimeType(createPngHeader(16, 8))).toBe('image/png');
    });

    it('requires a known DIB header size for bitmaps', () => {
        const bitmap = new Uint8Array(26);
        bitmap.set(bytesOf('BM'));
        bitmap[14] = 40;

        expect(detectImageMimeType(bitmap)).toBe('image/bmp');
        expect(detectImageMimeType(bytesOf('BMW service history for the fleet car'))).toBeUndefined();
    });

    it('requires at least one icon directory entry', () => {
        const emptyIcon = new Uint8Array([0x00, 0x00, 0x01, 0x00, 0x00, 0x00]);
        const oneEntry = new Uint8Array(22);
        oneEntry.set([0x00, 0x00, 0x01, 0x00, 0x01, 0x00]);

        expect(detectImageMimeType(emptyIcon)).toBeUndefined();
        expect(detectImageMimeType(oneEntry)).toBe('image/x-icon');
        expect(detectImageMimeType(oneEntry.subarray(0, 21))).toBeUndefined();
    });

    it('rejects WebP and GIF headers without image data', () => {
        expect(detectImageMimeType(bytesOf('RIFF\u0000\u0000\u0000\u0000WEBPJUNK'))).toBeUndefined();
        expect(detectImageMimeType(bytesOf('GIF89a\u0000\u0000\u0003\u0000'))).toBeUndefined();
    });

    it('returns undefined for empty input', () => {
        expect(decoder.decode(new Uint8Array())).toBeUndefined();
    });
});

describe('icon file readers', () => {
    let workDir: string;

    beforeAll(() => {
        workDir = mkdtempSync(join(tmpdir(), 'onboarding-reader-'));
        writeFileSync(join(workDir, 'icon.png'), createPngHeader(16, 8));
    });

    afterAll(() => {
        rmSync(workDir, { recursive: true, force: true });
    });

    it('reads nothing with the default bundle, so the default icon shows', () => {
        const adapters = createDefaultAdapters();
        const iconPath = join(workDir, 'icon.png');

        expect(adapters.iconFileReader.readFile(iconPath)).toBeUndefined();
        expect(
            resolveTopIcon(iconPath, { fileReader: adapters.iconFileReader, imageDecoder: adapters.imageDecoder })
        ).toBe(DEFAULT_TOP_ICON);
    });

    it('reads local files with the Node bundle', () => {
        const adapters = createNodeAdapters();
        const icon = resolveTopIcon(join(workDir, 'icon.png'), {
            fileReader: adapters.iconFileReader,
            imageDecoder: adapters.imageDecoder,
        });

        expect(icon.mimeType).toBe('image/png');
        expect(icon.widthPx).toBe(16);
    });

    it('keeps an injected reader in the Node bundle', () => {
        const fileReader = { readFile: () => undefined };

        expect(createNodeAdapters({ iconFileReader: fileReader }).iconFileReader).toBe(fileReader);
    });
});
