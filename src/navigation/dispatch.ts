import type { NavigationDelegate, WizardTermination } from '../types/adapters.types';
import type { OnboardingPage, PagePosition } from '../types/onboarding.types';
import { actionFor, configurePosition } from './positionState';
import type { ButtonSide, NavigationAction } from './positionState';
import { logDebugEvent } from '../layout/debug/debugLog';

export const FINISH_REASON = 'user completed onboarding';

/**
 * Collaborators that receive the outcome of a button press. Both are injected
 * by the wizard; the page holds no reference back to it.
 */
export interface NavigationHandlers {
    delegate?: NavigationDelegate;
    termination?: WizardTermination;
}

/**
 * Perform the action a button press maps to and report which one it was.
 * Presses on a hidden button resolve to `none` and emit nothing.
 */
export const pressButton = (
    side: ButtonSide,
    position: PagePosition,
    page: OnboardingPage,
    handlers: NavigationHandlers
): NavigationAction => {
    const action = actionFor(configurePosition(position), side);

    logDebugEvent('navigation', '🧭', 'button-pressed', { side, position, action });

    switch (action) {
        case 'advance':
            handlers.delegate?.onAdvance(page);
            break;
        case 'retreat':
            handlers.delegate?.onRetreat(page);
            break;
        case 'finish':
            handlers.termination?.finish(FINISH_REASON);
            break;
        case 'none':
            break;
    }

    return action;
};
