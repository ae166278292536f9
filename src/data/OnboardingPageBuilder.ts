/**
 * Onboarding Page Builder
 *
 * Normalizes loosely typed page records (decoded JSON, host payloads) into
 * OnboardingPage values. Malformed fields are dropped, never reported.
 */

import type {
    ImagePayload,
    InfoSection,
    InfoSectionField,
    OnboardingPage,
    PageMedia,
    VideoPayload,
} from '../types/onboarding.types';

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readText = (value: unknown): string | undefined =>
    typeof value === 'string' && value.trim().length > 0 ? value : undefined;

const readNumber = (value: unknown): number | undefined =>
    typeof value === 'number' && Number.isFinite(value) ? value : undefined;

const readBoolean = (value: unknown): boolean | undefined => (typeof value === 'boolean' ? value : undefined);

const parseImagePayload = (raw: UnknownRecord): ImagePayload | undefined => {
    const src = readText(raw.src);
    if (!src) {
        return undefined;
    }
    return {
        src,
        alt: readText(raw.alt),
        naturalWidthPx: readNumber(raw.naturalWidthPx),
        naturalHeightPx: readNumber(raw.naturalHeightPx),
    };
};

const parseVideoPayload = (raw: UnknownRecord): VideoPayload | undefined => {
    const src = readText(raw.src);
    if (!src) {
        return undefined;
    }
    return {
        src,
        posterSrc: readText(raw.posterSrc),
        autoplay: readBoolean(raw.autoplay),
        loop: readBoolean(raw.loop),
        muted: readBoolean(raw.muted),
    };
};

/**
 * Media keeps its kind even when the asset itself is unusable, so the
 * allocator still takes the media branch and skips only the media element.
 */
export const parsePageMedia = (raw: unknown): PageMedia | undefined => {
    if (!isRecord(raw)) {
        return undefined;
    }
    const payload: UnknownRecord = isRecord(raw.payload) ? raw.payload : {};
    switch (raw.kind) {
        case 'image': {
            const image = parseImagePayload(payload);
            return image ? { kind: 'image', payload: image } : { kind: 'image' };
        }
        case 'video': {
            const video = parseVideoPayload(payload);
            return video ? { kind: 'video', payload: video } : { kind: 'video' };
        }
        default:
            return undefined;
    }
};

export const parseInfoSection = (raw: unknown): InfoSection | undefined => {
    if (!isRecord(raw) || !Array.isArray(raw.fields)) {
        return undefined;
    }
    const fields = raw.fields.flatMap((field): InfoSectionField[] => {
        if (!isRecord(field)) {
            return [];
        }
        const description = readText(field.description);
        if (!description) {
            return [];
        }
        const label = readText(field.label);
        return [label ? { label, description } : { description }];
    });
    if (fields.length === 0) {
        return undefined;
    }
    const title = readText(raw.title);
    return title ? { title, fields } : { fields };
};

/**
 * Build an OnboardingPage from an untrusted record.
 */
export function parseOnboardingPage(raw: unknown): OnboardingPage {
    if (!isRecord(raw)) {
        return {};
    }
    return {
        title: readText(raw.title),
        subtitle: readText(raw.subtitle),
        body: readText(raw.body),
        media: parsePageMedia(raw.media),
        topIcon: readText(raw.topIcon),
        infoSection: parseInfoSection(raw.infoSection),
    };
}

/**
 * Parse a list of page records, e.g. the `pages` array of a wizard payload.
 */
export function parseOnboardingPages(raw: unknown): OnboardingPage[] {
    return Array.isArray(raw) ? raw.map(parseOnboardingPage) : [];
}
