/**
 * Default image decoder
 *
 * Recognizes common raster formats and SVG by their header structure and turns
 * the file into a data URL. Anything unrecognized is not an image.
 */

import type { ImageDecoder } from '../types/adapters.types';
import type { ResolvedIcon } from '../types/onboarding.types';

interface ImageSignature {
    mimeType: string;
    matches: (bytes: Uint8Array) => boolean;
    dimensions?: (bytes: Uint8Array) => { widthPx: number; heightPx: number };
}

const startsWith = (bytes: Uint8Array, prefix: readonly number[], offset = 0): boolean =>
    bytes.length >= offset + prefix.length && prefix.every((byte, index) => bytes[offset + index] === byte);

const ascii = (text: string): number[] => Array.from(text, (char) => char.charCodeAt(0));

const readUint32BE = (bytes: Uint8Array, offset: number): number =>
    ((bytes[offset] << 24) | (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3]) >>> 0;

const readUint32LE = (bytes: Uint8Array, offset: number): number =>
    (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;

const readUint16LE = (bytes: Uint8Array, offset: number): number => bytes[offset] | (bytes[offset + 1] << 8);

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const UTF8_BOM = [0xef, 0xbb, 0xbf];

// BITMAPCOREHEADER through BITMAPV5HEADER
const BMP_DIB_HEADER_SIZES = [12, 40, 52, 56, 64, 108, 124];

const WEBP_CHUNK_TYPES = ['VP8 ', 'VP8L', 'VP8X'];

const ICO_DIRECTORY_ENTRY_BYTES = 16;

const pngDimensions = (bytes: Uint8Array) => ({ widthPx: readUint32BE(bytes, 16), heightPx: readUint32BE(bytes, 20) });

const gifDimensions = (bytes: Uint8Array) => ({ widthPx: readUint16LE(bytes, 6), heightPx: readUint16LE(bytes, 8) });

const isPng = (bytes: Uint8Array): boolean => {
    if (!startsWith(bytes, PNG_MAGIC) || bytes.length < 24 || !startsWith(bytes, ascii('IHDR'), 12)) {
        return false;
    }
    const { widthPx, heightPx } = pngDimensions(bytes);
    return widthPx > 0 && heightPx > 0;
};

const isJpeg = (bytes: Uint8Array): boolean =>
    startsWith(bytes, [0xff, 0xd8, 0xff]) && bytes.length >= 4 && bytes[3] >= 0xc0 && bytes[3] !== 0xff;

const isGif = (bytes: Uint8Array): boolean => {
    if (!(startsWith(bytes, ascii('GIF87a')) || startsWith(bytes, ascii('GIF89a'))) || bytes.length < 10) {
        return false;
    }
    const { widthPx, heightPx } = gifDimensions(bytes);
    return widthPx > 0 && heightPx > 0;
};

const isWebp = (bytes: Uint8Array): boolean =>
    startsWith(bytes, ascii('RIFF')) &&
    startsWith(bytes, ascii('WEBP'), 8) &&
    WEBP_CHUNK_TYPES.some((chunkType) => startsWith(bytes, ascii(chunkType), 12));

const isBmp = (bytes: Uint8Array): boolean =>
    startsWith(bytes, ascii('BM')) &&
    bytes.length >= 26 &&
    BMP_DIB_HEADER_SIZES.includes(readUint32LE(bytes, 14));

const isIco = (bytes: Uint8Array): boolean => {
    if (!startsWith(bytes, [0x00, 0x00, 0x01, 0x00]) || bytes.length < 6) {
        return false;
    }
    const imageCount = readUint16LE(bytes, 4);
    return imageCount > 0 && bytes.length >= 6 + imageCount * ICO_DIRECTORY_ENTRY_BYTES;
};

const looksLikeSvg = (bytes: Uint8Array): boolean => {
    const start = startsWith(bytes, UTF8_BOM) ? UTF8_BOM.length : 0;
    const head = String.fromCharCode(...Array.from(bytes.subarray(start, start + 1024))).trimStart();
    return head.startsWith('<svg') || (head.startsWith('<?xml') && head.includes('<svg'));
};

/**
 * A format matches only when its header is structurally valid, not just when
 * its magic bytes are present.
 */
const SIGNATURES: ImageSignature[] = [
    { mimeType: 'image/png', matches: isPng, dimensions: pngDimensions },
    { mimeType: 'image/jpeg', matches: isJpeg },
    { mimeType: 'image/gif', matches: isGif, dimensions: gifDimensions },
    { mimeType: 'image/webp', matches: isWebp },
    { mimeType: 'image/bmp', matches: isBmp },
    { mimeType: 'image/x-icon', matches: isIco },
    { mimeType: 'image/svg+xml', matches: looksLikeSvg },
];

const BASE64_CHUNK_SIZE = 0x8000;

export const toBase64 = (bytes: Uint8Array): string => {
    let binary = '';
    for (let offset = 0; offset < bytes.length; offset += BASE64_CHUNK_SIZE) {
        binary += String.fromCharCode(...Array.from(bytes.subarray(offset, offset + BASE64_CHUNK_SIZE)));
    }
    return btoa(binary);
};

export const detectImageMimeType = (bytes: Uint8Array): string | undefined =>
    SIGNATURES.find((signature) => signature.matches(bytes))?.mimeType;

export const createDefaultImageDecoder = (): ImageDecoder => ({
    decode(bytes: Uint8Array): ResolvedIcon | undefined {
        const signature = SIGNATURES.find((candidate) => candidate.matches(bytes));
        if (!signature) {
            return undefined;
        }
        return {
            src: `data:${signature.mimeType};base64,${toBase64(bytes)}`,
            mimeType: signature.mimeType,
            ...signature.dimensions?.(bytes),
        };
    },
});
