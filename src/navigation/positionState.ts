/**
 * Position-driven button configuration
 *
 * Everything a page's navigation controls show and do is derived from its
 * PagePosition alone.
 */

import type { PagePosition } from '../types/onboarding.types';

export type ButtonLabel = 'continue' | 'close' | 'back';

/**
 * `none` is the left action of pages whose left button is hidden; pressing
 * it anyway does nothing.
 */
export type NavigationAction = 'advance' | 'retreat' | 'finish' | 'none';

export type ButtonSide = 'left' | 'right';

export interface ButtonConfig {
    rightLabel: ButtonLabel;
    leftLabel: ButtonLabel;
    isRightHidden: boolean;
    isLeftHidden: boolean;
    rightAction: NavigationAction;
    leftAction: NavigationAction;
}

const assertNever = (value: never): never => value;

export const configurePosition = (position: PagePosition): ButtonConfig => {
    switch (position) {
        case 'first':
            return {
                rightLabel: 'continue',
                leftLabel: 'back',
                isRightHidden: false,
                isLeftHidden: true,
                rightAction: 'advance',
                leftAction: 'none',
            };
        case 'middle':
            return {
                rightLabel: 'continue',
                leftLabel: 'back',
                isRightHidden: false,
                isLeftHidden: false,
                rightAction: 'advance',
                leftAction: 'retreat',
            };
        case 'last':
            return {
                rightLabel: 'close',
                leftLabel: 'back',
                isRightHidden: false,
                isLeftHidden: false,
                rightAction: 'finish',
                leftAction: 'retreat',
            };
        case 'singlePage':
            return {
                rightLabel: 'close',
                leftLabel: 'back',
                isRightHidden: false,
                isLeftHidden: true,
                rightAction: 'finish',
                leftAction: 'none',
            };
        default:
            return assertNever(position);
    }
};

export const actionFor = (config: ButtonConfig, side: ButtonSide): NavigationAction =>
    side === 'right' ? config.rightAction : config.leftAction;

/**
 * Map a page's index in an already ordered sequence to its position.
 */
export const pagePositionAt = (index: number, count: number): PagePosition => {
    if (count <= 1) {
        return 'singlePage';
    }
    if (index <= 0) {
        return 'first';
    }
    if (index >= count - 1) {
        return 'last';
    }
    return 'middle';
};
