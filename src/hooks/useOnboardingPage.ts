import { useCallback, useEffect, useMemo } from 'react';

import type {
    ContainerSize,
    OnboardingPage,
    OnboardingPageConfig,
    PagePosition,
    ResolvedIcon,
} from '../types/onboarding.types';
import type { OnboardingAdapters } from '../types/adapters.types';
import { createDefaultAdapters } from '../types/adapters.types';
import type { AllocationPlan, RegionBuckets } from '../layout/types';
import { allocateLayout } from '../layout/allocator';
import { LAYOUT_SPACING_PX, bucketByRegion } from '../layout/utils';
import { configurePosition } from '../navigation/positionState';
import type { ButtonConfig, NavigationAction } from '../navigation/positionState';
import { pressButton } from '../navigation/dispatch';
import type { NavigationHandlers } from '../navigation/dispatch';
import { buildAccessibilityLabels, buildButtonTitles } from '../localization/labels';
import type { AccessibilityLabels, ButtonTitles } from '../localization/labels';
import { resolveTopIcon } from '../icon/iconResolver';
import { isHelpAvailable } from '../help/helpAffordance';
import { logDebugEvent } from '../layout/debug/debugLog';

export interface UseOnboardingPageArgs {
    page: OnboardingPage;
    position: PagePosition;
    containerSize: ContainerSize;
    /** Defaults to createDefaultAdapters(). */
    adapters?: OnboardingAdapters;
    navigation?: NavigationHandlers;
    config?: OnboardingPageConfig;
}

export interface UseOnboardingPageReturn {
    /** Content allocation for the gravity stack */
    plan: AllocationPlan;
    /** Plan elements grouped per region */
    buckets: RegionBuckets;
    buttons: ButtonConfig;
    titles: ButtonTitles;
    accessibility: AccessibilityLabels;
    icon: ResolvedIcon;
    helpAvailable: boolean;
    /** Container size the plan was computed for */
    containerSize: ContainerSize;
    spacingPx: number;
    onRightPress: () => NavigationAction;
    onLeftPress: () => NavigationAction;
}

const finiteOrZero = (value: number): number => (Number.isFinite(value) ? value : 0);

/**
 * Runs the page-render steps: layout allocation, button configuration,
 * accessibility labels and icon resolution.
 */
export const useOnboardingPage = ({
    page,
    position,
    containerSize,
    adapters: providedAdapters,
    navigation,
    config,
}: UseOnboardingPageArgs): UseOnboardingPageReturn => {
    const adapters = useMemo(() => providedAdapters ?? createDefaultAdapters(), [providedAdapters]);
    const spacingPx = config?.spacingPx ?? LAYOUT_SPACING_PX;
    const widthPx = finiteOrZero(containerSize.widthPx);
    const heightPx = finiteOrZero(containerSize.heightPx);

    // Layout runs first; everything size-dependent reads from the plan
    const plan = useMemo(
        () =>
            allocateLayout({
                containerWidthPx: widthPx,
                containerHeightPx: heightPx,
                page,
                measurer: adapters.measurer,
                spacingPx,
            }),
        [widthPx, heightPx, page, adapters.measurer, spacingPx]
    );
    const buckets = useMemo(() => bucketByRegion(plan), [plan]);

    const buttons = useMemo(() => configurePosition(position), [position]);
    const titles = useMemo(() => buildButtonTitles(buttons, adapters.localizer), [buttons, adapters.localizer]);
    const accessibility = useMemo(
        () => buildAccessibilityLabels(buttons, adapters.localizer),
        [buttons, adapters.localizer]
    );

    const defaultIcon = config?.defaultIcon;
    const icon = useMemo(
        () =>
            resolveTopIcon(page.topIcon, {
                fileReader: adapters.iconFileReader,
                imageDecoder: adapters.imageDecoder,
                defaultIcon,
            }),
        [page.topIcon, adapters.iconFileReader, adapters.imageDecoder, defaultIcon]
    );

    const helpAvailable = isHelpAvailable(page);

    useEffect(() => {
        logDebugEvent('page-render', '🎨', 'page-rendered', {
            position,
            insertions: plan.insertions.length,
            remainingPx: plan.remainingPx,
            helpAvailable,
            icon: icon.mimeType,
        });
    }, [position, plan, helpAvailable, icon]);

    const onRightPress = useCallback(
        () => pressButton('right', position, page, navigation ?? {}),
        [position, page, navigation]
    );
    const onLeftPress = useCallback(
        () => pressButton('left', position, page, navigation ?? {}),
        [position, page, navigation]
    );

    return {
        plan,
        buckets,
        buttons,
        titles,
        accessibility,
        icon,
        helpAvailable,
        containerSize: { widthPx, heightPx },
        spacingPx,
        onRightPress,
        onLeftPress,
    };
};
