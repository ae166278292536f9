import { describe, it, expect } from '@jest/globals';
import {
    BODY_TEXT_METRICS,
    TITLE_TEXT_METRICS,
    bucketByRegion,
    estimateTextHeightPx,
} from '../utils';
import { allocateLayout } from '../allocator';
import { createDefaultContentMeasurer } from '../../types/adapters.types';
import { TEST_IMAGE_PAYLOAD, createFixedMeasurer, createTestPage } from '../../__tests__/test-utils';

describe('Layout Utils', () => {
    describe('estimateTextHeightPx', () => {
        it('uses one line for short text', () => {
            expect(estimateTextHeightPx('Welcome', 400, TITLE_TEXT_METRICS)).toBe(31);
        });

        it('wraps long lines by average glyph width', () => {
            // 280 / 7 = 40 chars per line -> 60 chars take 2 lines
            expect(estimateTextHeightPx('a'.repeat(60), 280, BODY_TEXT_METRICS)).toBe(34);
        });

        it('counts explicit newlines and empty lines', () => {
            expect(estimateTextHeightPx('one\n\ntwo', 400, BODY_TEXT_METRICS)).toBe(51);
        });

        it('keeps at least one glyph per line for a zero width', () => {
            expect(estimateTextHeightPx('abc', 0, BODY_TEXT_METRICS)).toBe(51);
        });
    });

    describe('createDefaultContentMeasurer', () => {
        const measurer = createDefaultContentMeasurer();

        it('adds paragraph spacing between body paragraphs', () => {
            expect(measurer.measureBody('First paragraph.\n\nSecond.', 700, 500)).toBe(40);
        });

        it('measures the rendered Markdown blocks, not the markup', () => {
            // Steps, Bold words, one, two: 4 lines of 17 plus 3 gaps of 6
            expect(measurer.measureBody('# Steps\n\n**Bold** words\n\n- one\n- two', 700, 500)).toBe(86);
        });

        it('bounds body height to its budget', () => {
            expect(measurer.measureBody('First paragraph.\n\nSecond.', 700, 30)).toBe(30);
            expect(measurer.measureBody('First paragraph.', 700, -5)).toBe(0);
        });

        it('measures headings with their own metrics', () => {
            expect(measurer.measureTitle('Welcome', 400)).toBe(31);
            expect(measurer.measureSubtitle('A quick tour', 400)).toBe(20);
        });
    });

    describe('bucketByRegion', () => {
        it('groups elements per region in insertion order', () => {
            const plan = allocateLayout({
                containerWidthPx: 320,
                containerHeightPx: 400,
                page: createTestPage({ media: { kind: 'image', payload: TEST_IMAGE_PAYLOAD } }),
                measurer: createFixedMeasurer(),
            });

            const buckets = bucketByRegion(plan);

            expect(buckets.top.map((element) => element.kind)).toEqual(['title', 'subtitle']);
            expect(buckets.center.map((element) => element.kind)).toEqual(['body']);
            expect(buckets.bottom.map((element) => element.kind)).toEqual(['image']);
        });

        it('returns empty regions for an empty plan', () => {
            expect(bucketByRegion({ insertions: [], remainingPx: 0 })).toEqual({ top: [], center: [], bottom: [] });
        });
    });
});
