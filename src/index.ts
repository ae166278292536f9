/**
 * onboarding-page-kit - Main Exports
 *
 * Centralized exports for the onboarding page renderer.
 */

// Page rendering
export { OnboardingPageView } from './components/OnboardingPageView';
export type { OnboardingPageViewProps } from './components/OnboardingPageView';
export { GravityStack } from './components/GravityStack';
export type { GravityStackProps } from './components/GravityStack';
export { LayoutElementView } from './components/LayoutElementView';
export { InfoPopover } from './components/InfoPopover';
export { useOnboardingPage } from './hooks/useOnboardingPage';
export type { UseOnboardingPageArgs, UseOnboardingPageReturn } from './hooks/useOnboardingPage';

// Navigation
export { configurePosition, actionFor, pagePositionAt } from './navigation/positionState';
export type { ButtonConfig, ButtonLabel, ButtonSide, NavigationAction } from './navigation/positionState';
export { pressButton, FINISH_REASON } from './navigation/dispatch';
export type { NavigationHandlers } from './navigation/dispatch';

// Layout
export { allocateLayout } from './layout/allocator';
export type { AllocateLayoutArgs } from './layout/allocator';
export {
    LAYOUT_SPACING_PX,
    GRAVITY_REGIONS,
    TITLE_TEXT_METRICS,
    SUBTITLE_TEXT_METRICS,
    BODY_TEXT_METRICS,
    bucketByRegion,
    estimateTextHeightPx,
} from './layout/utils';
export { extractTextBlocks, renderBodyMarkdown } from './layout/bodyMarkdown';
export type { TextMetrics } from './layout/utils';
export {
    createGravityStackStyles,
    createGravityRegionStyles,
    createGravityEntryStyles,
    createTextStyles,
    createBodyStyles,
    createMediaStyles,
} from './layout/structuralStyles';
export type { GravityStackStructuralStyles, GravityRegionStructuralStyles } from './layout/structuralStyles';
export type {
    AllocationPlan,
    BodyElement,
    GravityRegion,
    ImageMediaElement,
    LayoutElement,
    LayoutInsertion,
    MediaElement,
    RegionBuckets,
    SubtitleElement,
    TitleElement,
    VideoMediaElement,
} from './layout/types';

// Icons
export { resolveTopIcon, DEFAULT_TOP_ICON } from './icon/iconResolver';
export type { IconSources } from './icon/iconResolver';
export { createDefaultImageDecoder, detectImageMimeType } from './icon/imageDecoder';

// Help
export { isHelpAvailable } from './help/helpAffordance';

// Localization
export { DEFAULT_STRINGS, LOCALIZATION_KEYS, isLocalizationKey } from './localization/strings';
export type { LocalizationKey } from './localization/strings';
export { buildAccessibilityLabels, buildButtonTitles, localizeButtonLabel } from './localization/labels';
export type { AccessibilityLabels, ButtonTitles } from './localization/labels';

// Data
export {
    parseOnboardingPage,
    parseOnboardingPages,
    parsePageMedia,
    parseInfoSection,
} from './data/OnboardingPageBuilder';

// Debugging
export { isDebugEnabled, setDebugPreference } from './layout/debugFlags';
export type { DebugChannel } from './layout/debugFlags';

// Core Types
export { PAGE_POSITIONS } from './types/onboarding.types';
export type {
    ContainerSize,
    ImagePayload,
    InfoSection,
    InfoSectionField,
    MediaKind,
    OnboardingPage,
    OnboardingPageConfig,
    PageMedia,
    PagePosition,
    ResolvedIcon,
    VideoPayload,
} from './types/onboarding.types';

// Adapter System
export {
    createDefaultAdapters,
    createDefaultContentMeasurer,
    createDefaultLocalizer,
    createTableLocalizer,
    createUnavailableIconFileReader,
} from './types/adapters.types';
export type {
    ContentMeasurer,
    IconFileReader,
    ImageDecoder,
    Localizer,
    NavigationDelegate,
    OnboardingAdapters,
    WizardTermination,
} from './types/adapters.types';
