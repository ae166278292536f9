import { describe, it, expect } from '@jest/globals';
import { actionFor, configurePosition, pagePositionAt } from '../positionState';
import type { ButtonConfig } from '../positionState';
import { PAGE_POSITIONS } from '../../types/onboarding.types';
import type { PagePosition } from '../../types/onboarding.types';

const EXPECTED: Record<PagePosition, ButtonConfig> = {
    first: {
        rightLabel: 'continue',
        leftLabel: 'back',
        isRightHidden: false,
        isLeftHidden: true,
        rightAction: 'advance',
        leftAction: 'none',
    },
    middle: {
        rightLabel: 'continue',
        leftLabel: 'back',
        isRightHidden: false,
        isLeftHidden: false,
        rightAction: 'advance',
        leftAction: 'retreat',
    },
    last: {
        rightLabel: 'close',
        leftLabel: 'back',
        isRightHidden: false,
        isLeftHidden: false,
        rightAction: 'finish',
        leftAction: 'retreat',
    },
    singlePage: {
        rightLabel: 'close',
        leftLabel: 'back',
        isRightHidden: false,
        isLeftHidden: true,
        rightAction: 'finish',
        leftAction: 'none',
    },
};

describe('configurePosition', () => {
    it.each(PAGE_POSITIONS.map((position) => [position]))('configures buttons for %s', (position) => {
        expect(configurePosition(position)).toEqual(EXPECTED[position]);
    });

    it('never hides the right button', () => {
        PAGE_POSITIONS.forEach((position) => {
            expect(configurePosition(position).isRightHidden).toBe(false);
        });
    });

    it('hides the left button only on first and single pages', () => {
        const hidden = PAGE_POSITIONS.filter((position) => configurePosition(position).isLeftHidden);
        expect(hidden).toEqual(['first', 'singlePage']);
    });

    it('maps hidden left buttons to no action', () => {
        PAGE_POSITIONS.forEach((position) => {
            const config = configurePosition(position);
            expect(config.isLeftHidden).toBe(actionFor(config, 'left') === 'none');
        });
    });
});

describe('pagePositionAt', () => {
    it('returns singlePage for a one-page wizard', () => {
        expect(pagePositionAt(0, 1)).toBe('singlePage');
    });

    it('derives first, middle and last for longer wizards', () => {
        expect([0, 1, 2, 3].map((index) => pagePositionAt(index, 4))).toEqual(['first', 'middle', 'middle', 'last']);
    });

    it('treats a two-page wizard as first and last', () => {
        expect(pagePositionAt(0, 2)).toBe('first');
        expect(pagePositionAt(1, 2)).toBe('last');
    });
});
