/**
 * Localization keys used by the onboarding page and the bundled English table.
 */

export const LOCALIZATION_KEYS = [
    'onboarding_page_continue_button',
    'onboarding_page_close_button',
    'onboarding_page_back_button',
    'onboarding_page_help_button',
    'onboarding_accessibility_button_right_continue',
    'onboarding_accessibility_button_right_close',
    'onboarding_accessibility_button_left',
    'onboarding_accessibility_button_center',
    'onboarding_accessibility_stackview_body',
    'onboarding_accessibility_image_top',
] as const;

export type LocalizationKey = (typeof LOCALIZATION_KEYS)[number];

export const DEFAULT_STRINGS: Record<LocalizationKey, string> = {
    onboarding_page_continue_button: 'Continue',
    onboarding_page_close_button: 'Close',
    onboarding_page_back_button: 'Back',
    onboarding_page_help_button: '?',
    onboarding_accessibility_button_right_continue: 'Continue to the next page',
    onboarding_accessibility_button_right_close: 'Close the onboarding',
    onboarding_accessibility_button_left: 'Go back to the previous page',
    onboarding_accessibility_button_center: 'Show more information',
    onboarding_accessibility_stackview_body: 'Page content',
    onboarding_accessibility_image_top: 'Onboarding icon',
};

export const isLocalizationKey = (value: string): value is LocalizationKey =>
    (LOCALIZATION_KEYS as readonly string[]).includes(value);
