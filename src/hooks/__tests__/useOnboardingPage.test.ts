import { describe, it, expect } from '@jest/globals';
import { renderHook } from '@testing-library/react';
import { useOnboardingPage } from '../useOnboardingPage';
import { DEFAULT_TOP_ICON } from '../../icon/iconResolver';
import type { ResolvedIcon } from '../../types/onboarding.types';
import { createTestAdapters, createTestPage } from '../../__tests__/test-utils';

describe('useOnboardingPage', () => {
    const adapters = createTestAdapters();

    it('derives layout, buttons and labels for the page', () => {
        const { result } = renderHook(() =>
            useOnboardingPage({
                page: createTestPage(),
                position: 'middle',
                containerSize: { widthPx: 320, heightPx: 400 },
                adapters,
            })
        );

        expect(result.current.buckets.top.map((element) => element.kind)).toEqual(['title', 'subtitle', 'body']);
        expect(result.current.plan.remainingPx).toBe(234);
        expect(result.current.buttons.isLeftHidden).toBe(false);
        expect(result.current.titles).toEqual({ right: 'Continue', left: 'Back', help: '?' });
        expect(result.current.icon).toBe(DEFAULT_TOP_ICON);
        expect(result.current.helpAvailable).toBe(false);
        expect(result.current.spacingPx).toBe(12);
    });

    it('treats non-finite container sizes as zero', () => {
        const { result } = renderHook(() =>
            useOnboardingPage({
                page: { body: 'x' },
                position: 'first',
                containerSize: { widthPx: Number.NaN, heightPx: Number.POSITIVE_INFINITY },
                adapters,
            })
        );

        expect(result.current.containerSize).toEqual({ widthPx: 0, heightPx: 0 });
        const [body] = result.current.buckets.top;
        expect(body.kind === 'body' && body.maxHeightPx).toBe(0);
    });

    it('applies configured spacing and default icon', () => {
        const defaultIcon: ResolvedIcon = { src: 'app://brand.svg', mimeType: 'image/svg+xml' };
        const { result } = renderHook(() =>
            useOnboardingPage({
                page: { title: 'Welcome' },
                position: 'singlePage',
                containerSize: { widthPx: 320, heightPx: 400 },
                adapters,
                config: { spacingPx: 20, defaultIcon },
            })
        );

        expect(result.current.plan.remainingPx).toBe(350); // 400 - (30 + 20)
        expect(result.current.icon).toBe(defaultIcon);
    });

    it('reports the action of each press', () => {
        const { result } = renderHook(() =>
            useOnboardingPage({
                page: createTestPage(),
                position: 'first',
                containerSize: { widthPx: 320, heightPx: 400 },
                adapters,
            })
        );

        expect(result.current.onLeftPress()).toBe('none');
        expect(result.current.onRightPress()).toBe('advance');
    });
});
