/**
 * onboarding-page-kit/node - Node.js host exports
 *
 * Kept apart from the main entry so browser bundles never load `node:fs`.
 */

import type { OnboardingAdapters } from './types/adapters.types';
import { createDefaultAdapters } from './types/adapters.types';
import { createNodeIconFileReader } from './icon/nodeIconFileReader';

export { createNodeIconFileReader, MAX_ICON_FILE_BYTES } from './icon/nodeIconFileReader';

/**
 * Default adapter bundle that reads custom icons from the local file system.
 * @param options - Individual adapters to use instead of the defaults
 */
export function createNodeAdapters(options?: Partial<OnboardingAdapters>): OnboardingAdapters {
    return createDefaultAdapters({
        ...options,
        iconFileReader: options?.iconFileReader ?? createNodeIconFileReader(),
    });
}
