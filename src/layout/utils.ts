import type { AllocationPlan, GravityRegion, RegionBuckets } from './types';

export const LAYOUT_SPACING_PX = 12;
export const PARAGRAPH_SPACING_PX = 6;

export const GRAVITY_REGIONS: readonly GravityRegion[] = ['top', 'center', 'bottom'];

export interface TextMetrics {
    fontSizePx: number;
    fontWeight: 400 | 600 | 700;
    lineHeightPx: number;
    /** Average advance of one glyph, used for line-wrap estimates. */
    averageCharWidthPx: number;
}

export const TITLE_TEXT_METRICS: TextMetrics = {
    fontSizePx: 26,
    fontWeight: 700,
    lineHeightPx: 31,
    averageCharWidthPx: 14,
};

export const SUBTITLE_TEXT_METRICS: TextMetrics = {
    fontSizePx: 16,
    fontWeight: 600,
    lineHeightPx: 20,
    averageCharWidthPx: 9,
};

export const BODY_TEXT_METRICS: TextMetrics = {
    fontSizePx: 13,
    fontWeight: 400,
    lineHeightPx: 17,
    averageCharWidthPx: 7,
};

/**
 * Estimate the wrapped height of a block of text. Explicit newlines always
 * start a new line; an empty line still occupies one line.
 */
export const estimateTextHeightPx = (text: string, widthPx: number, metrics: TextMetrics): number => {
    const charsPerLine = Math.max(1, Math.floor(widthPx / metrics.averageCharWidthPx));
    const lineCount = text
        .split('\n')
        .reduce((total, line) => total + Math.max(1, Math.ceil(line.length / charsPerLine)), 0);
    return lineCount * metrics.lineHeightPx;
};

/**
 * Group a plan's elements by region, keeping insertion order inside each one.
 */
export const bucketByRegion = (plan: AllocationPlan): RegionBuckets => {
    const buckets: RegionBuckets = { top: [], center: [], bottom: [] };
    plan.insertions.forEach(({ region, index, element }) => {
        buckets[region].splice(index, 0, element);
    });
    return buckets;
};
