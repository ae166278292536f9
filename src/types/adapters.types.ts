/**
 * Adapter interfaces for the onboarding page
 *
 * Hosts implement these to plug in their measurement, file access, decoding
 * and localization. Everything the page does outside pure computation goes
 * through one of them.
 */

import type { OnboardingPage, ResolvedIcon } from './onboarding.types';
import type { LocalizationKey } from '../localization/strings';
import { DEFAULT_STRINGS, isLocalizationKey } from '../localization/strings';
import {
    BODY_TEXT_METRICS,
    PARAGRAPH_SPACING_PX,
    SUBTITLE_TEXT_METRICS,
    TITLE_TEXT_METRICS,
    estimateTextHeightPx,
} from '../layout/utils';
import { extractTextBlocks } from '../layout/bodyMarkdown';
import { createDefaultImageDecoder } from '../icon/imageDecoder';

/**
 * Content measurement adapter
 * Each call stands for "create the element at this size and report its height".
 */
export interface ContentMeasurer {
    measureTitle(text: string, widthPx: number): number;
    measureSubtitle(text: string, widthPx: number): number;
    /**
     * @param maxHeightPx - Budget the body view is created with; may be zero or negative
     */
    measureBody(text: string, widthPx: number, maxHeightPx: number): number;
}

/**
 * Receives navigation intent. The page never decides which page comes next.
 */
export interface NavigationDelegate {
    onAdvance(fromPage: OnboardingPage): void;
    onRetreat(fromPage: OnboardingPage): void;
}

export interface WizardTermination {
    finish(reason: string): void;
}

/**
 * File access for custom icons. Returns undefined when the file is missing.
 * Node hosts can use createNodeIconFileReader from the `./node` entry.
 */
export interface IconFileReader {
    readFile(path: string): Uint8Array | undefined;
}

/**
 * Decodes icon bytes. Returns undefined when the bytes are not an image.
 */
export interface ImageDecoder {
    decode(bytes: Uint8Array): ResolvedIcon | undefined;
}

export interface Localizer {
    localize(key: LocalizationKey): string;
}

/**
 * Complete adapter bundle
 */
export interface OnboardingAdapters {
    measurer: ContentMeasurer;
    iconFileReader: IconFileReader;
    imageDecoder: ImageDecoder;
    localizer: Localizer;
}

/**
 * Default implementations (heuristic, no font metrics)
 */
export const createDefaultContentMeasurer = (): ContentMeasurer => ({
    measureTitle: (text, widthPx) => estimateTextHeightPx(text, widthPx, TITLE_TEXT_METRICS),
    measureSubtitle: (text, widthPx) => estimateTextHeightPx(text, widthPx, SUBTITLE_TEXT_METRICS),
    measureBody: (text, widthPx, maxHeightPx) => {
        const contentHeight = extractTextBlocks(text).reduce(
            (total, block, index) =>
                total +
                estimateTextHeightPx(block, widthPx, BODY_TEXT_METRICS) +
                (index > 0 ? PARAGRAPH_SPACING_PX : 0),
            0
        );
        // The body view scrolls past its budget; it never reports more than it was given.
        return Math.max(0, Math.min(contentHeight, maxHeightPx));
    },
});

/**
 * Reader for hosts without file access: every path is missing, so pages show
 * the default icon.
 */
export const createUnavailableIconFileReader = (): IconFileReader => ({
    readFile: () => undefined,
});

export const createDefaultLocalizer = (
    overrides: Partial<Record<LocalizationKey, string>> = {}
): Localizer => ({
    localize: (key) => overrides[key] ?? DEFAULT_STRINGS[key],
});

/**
 * Localizer backed by a loose string table (e.g. a loaded locale file).
 * Unknown or missing keys fall back to the bundled English strings.
 */
export const createTableLocalizer = (table: Record<string, unknown>): Localizer => {
    const overrides: Partial<Record<LocalizationKey, string>> = {};
    Object.entries(table).forEach(([key, value]) => {
        if (isLocalizationKey(key) && typeof value === 'string') {
            overrides[key] = value;
        }
    });
    return createDefaultLocalizer(overrides);
};

/**
 * Create default adapter bundle
 * @param options - Individual adapters to use instead of the defaults
 */
export function createDefaultAdapters(options?: Partial<OnboardingAdapters>): OnboardingAdapters {
    return {
        measurer: options?.measurer ?? createDefaultContentMeasurer(),
        iconFileReader: options?.iconFileReader ?? createUnavailableIconFileReader(),
        imageDecoder: options?.imageDecoder ?? createDefaultImageDecoder(),
        localizer: options?.localizer ?? createDefaultLocalizer(),
    };
}
