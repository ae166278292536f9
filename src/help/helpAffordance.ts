import type { InfoSection, OnboardingPage } from '../types/onboarding.types';

export const isHelpAvailable = (page: OnboardingPage): page is OnboardingPage & { infoSection: InfoSection } =>
    page.infoSection !== undefined;
