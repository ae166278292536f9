import React, { useCallback, useRef, useState } from 'react';

import type { LayoutElement } from '../layout/types';
import { useOnboardingPage } from '../hooks/useOnboardingPage';
import type { UseOnboardingPageArgs } from '../hooks/useOnboardingPage';
import { GravityStack } from './GravityStack';
import { InfoPopover } from './InfoPopover';

export interface OnboardingPageViewProps extends UseOnboardingPageArgs {
    className?: string;
    renderElement?: (element: LayoutElement) => React.ReactNode;
}

const OnboardingPageView: React.FC<OnboardingPageViewProps> = ({ className, renderElement, ...args }) => {
    const {
        buckets,
        buttons,
        titles,
        accessibility,
        icon,
        helpAvailable,
        containerSize,
        spacingPx,
        onRightPress,
        onLeftPress,
    } = useOnboardingPage(args);

    const helpButtonRef = useRef<HTMLButtonElement>(null);
    const [isInfoOpen, setInfoOpen] = useState(false);
    const toggleInfo = useCallback(() => setInfoOpen((open) => !open), []);
    const closeInfo = useCallback(() => setInfoOpen(false), []);

    const { infoSection } = args.page;

    return (
        <div
            className={className ? `onboarding-page ${className}` : 'onboarding-page'}
            data-position={args.position}
        >
            <img
                className="onboarding-top-icon"
                src={icon.src}
                alt={accessibility.topIcon}
                width={icon.widthPx}
                height={icon.heightPx}
                data-testid="onboarding-top-icon"
            />
            <GravityStack
                buckets={buckets}
                widthPx={containerSize.widthPx}
                heightPx={containerSize.heightPx}
                spacingPx={spacingPx}
                accessibilityLabel={accessibility.body}
                renderElement={renderElement}
            />
            <div className="onboarding-nav">
                <button
                    type="button"
                    className="onboarding-btn onboarding-btn--secondary"
                    hidden={buttons.isLeftHidden}
                    aria-label={accessibility.leftButton}
                    onClick={onLeftPress}
                    data-testid="onboarding-left-button"
                >
                    {titles.left}
                </button>
                <button
                    ref={helpButtonRef}
                    type="button"
                    className="onboarding-btn onboarding-btn--help"
                    hidden={!helpAvailable}
                    aria-label={accessibility.helpButton}
                    aria-expanded={isInfoOpen}
                    onClick={toggleInfo}
                    data-testid="onboarding-help-button"
                >
                    {titles.help}
                </button>
                <div className="onboarding-nav-spacer" />
                <button
                    type="button"
                    className="onboarding-btn onboarding-btn--primary"
                    hidden={buttons.isRightHidden}
                    aria-label={accessibility.rightButton}
                    onClick={onRightPress}
                    data-testid="onboarding-right-button"
                >
                    {titles.right}
                </button>
            </div>
            {isInfoOpen && infoSection && (
                <InfoPopover infoSection={infoSection} anchorRef={helpButtonRef} onClose={closeInfo} />
            )}
        </div>
    );
};

export { OnboardingPageView };
