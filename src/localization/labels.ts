import type { Localizer } from '../types/adapters.types';
import type { ButtonConfig, ButtonLabel } from '../navigation/positionState';
import type { LocalizationKey } from './strings';

const BUTTON_LABEL_KEYS: Record<ButtonLabel, LocalizationKey> = {
    continue: 'onboarding_page_continue_button',
    close: 'onboarding_page_close_button',
    back: 'onboarding_page_back_button',
};

export interface ButtonTitles {
    right: string;
    left: string;
    help: string;
}

export interface AccessibilityLabels {
    rightButton: string;
    leftButton: string;
    helpButton: string;
    body: string;
    topIcon: string;
}

export const localizeButtonLabel = (label: ButtonLabel, localizer: Localizer): string =>
    localizer.localize(BUTTON_LABEL_KEYS[label]);

export const buildButtonTitles = (config: ButtonConfig, localizer: Localizer): ButtonTitles => ({
    right: localizeButtonLabel(config.rightLabel, localizer),
    left: localizeButtonLabel(config.leftLabel, localizer),
    help: localizer.localize('onboarding_page_help_button'),
});

/**
 * Static accessibility labels for the page's controls. The right button is
 * announced as "close" whenever pressing it finishes the wizard.
 */
export const buildAccessibilityLabels = (config: ButtonConfig, localizer: Localizer): AccessibilityLabels => ({
    rightButton: localizer.localize(
        config.rightAction === 'finish'
            ? 'onboarding_accessibility_button_right_close'
            : 'onboarding_accessibility_button_right_continue'
    ),
    leftButton: localizer.localize('onboarding_accessibility_button_left'),
    helpButton: localizer.localize('onboarding_accessibility_button_center'),
    body: localizer.localize('onboarding_accessibility_stackview_body'),
    topIcon: localizer.localize('onboarding_accessibility_image_top'),
});
