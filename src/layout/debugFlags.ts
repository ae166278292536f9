type DebugChannel =
    | 'layout-allocator'
    | 'navigation'
    | 'icon'
    | 'page-render';

type DebugFlagSource = Partial<Record<DebugChannel, unknown>>;

interface OnboardingDebugGlobal {
    __ONBOARDING_DEBUG_FLAGS?: DebugFlagSource;
}

const DEBUG_DEFAULTS: Record<DebugChannel, boolean> = {
    'layout-allocator': false,
    'navigation': false,
    'icon': false,
    'page-render': false,
};

const ENV_VAR_MAP: Record<DebugChannel, string> = {
    'layout-allocator': 'ONBOARDING_DEBUG_LAYOUT',
    'navigation': 'ONBOARDING_DEBUG_NAVIGATION',
    'icon': 'ONBOARDING_DEBUG_ICON',
    'page-render': 'ONBOARDING_DEBUG_RENDER',
};

const parseBoolean = (value: unknown): boolean | undefined => {
    if (typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'number') {
        if (value === 1) {
            return true;
        }
        if (value === 0) {
            return false;
        }
    }

    if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) {
            return true;
        }
        if (['0', 'false', 'no', 'off'].includes(normalized)) {
            return false;
        }
    }

    return undefined;
};

const hasProcessEnv = (): boolean => typeof process !== 'undefined' && typeof process.env !== 'undefined';

const readEnvFlag = (channel: DebugChannel): boolean | undefined => {
    // Bundlers replace process.env.REACT_APP_* at build time, even where no process
    // object exists at run time, so each one is accessed literally and unguarded
    let reactAppValue: string | undefined;

    switch (channel) {
        case 'layout-allocator':
            reactAppValue = process.env.REACT_APP_ONBOARDING_DEBUG_LAYOUT;
            break;
        case 'navigation':
            reactAppValue = process.env.REACT_APP_ONBOARDING_DEBUG_NAVIGATION;
            break;
        case 'icon':
            reactAppValue = process.env.REACT_APP_ONBOARDING_DEBUG_ICON;
            break;
        case 'page-render':
            reactAppValue = process.env.REACT_APP_ONBOARDING_DEBUG_RENDER;
            break;
    }

    if (reactAppValue !== undefined) {
        const parsed = parseBoolean(reactAppValue);
        if (parsed !== undefined) {
            return parsed;
        }
    }

    // Non-prefixed vars for Node.js hosts
    return parseBoolean(hasProcessEnv() ? process.env[ENV_VAR_MAP[channel]] : undefined);
};

const readGlobalFlags = (): DebugFlagSource | undefined => {
    const candidate = (globalThis as OnboardingDebugGlobal).__ONBOARDING_DEBUG_FLAGS;
    if (candidate && typeof candidate === 'object') {
        return candidate;
    }

    return undefined;
};

const readGlobalFlag = (channel: DebugChannel): boolean | undefined => {
    const flags = readGlobalFlags();
    if (!flags) {
        return undefined;
    }
    return parseBoolean(flags[channel]);
};

const storageKeyFor = (channel: DebugChannel): string => `onboarding-debug:${channel}`;

const readStorageFlag = (channel: DebugChannel): boolean | undefined => {
    if (typeof window === 'undefined' || typeof window.localStorage === 'undefined') {
        return undefined;
    }

    try {
        const value = window.localStorage.getItem(storageKeyFor(channel));
        return parseBoolean(value);
    } catch {
        // Storage can be unavailable (private browsing); treat as unset
        return undefined;
    }
};

const isProduction = (): boolean => hasProcessEnv() && process.env.NODE_ENV === 'production';

export const isDebugEnabled = (channel: DebugChannel): boolean => {
    const envValue = readEnvFlag(channel);
    if (envValue !== undefined) {
        return envValue;
    }

    const globalValue = readGlobalFlag(channel);
    if (globalValue !== undefined) {
        return globalValue;
    }

    const storageValue = readStorageFlag(channel);
    if (storageValue !== undefined) {
        return storageValue;
    }

    if (isProduction()) {
        return false;
    }

    return DEBUG_DEFAULTS[channel];
};

export const setDebugPreference = (channel: DebugChannel, enabled: boolean): void => {
    if (typeof window === 'undefined' || typeof window.localStorage === 'undefined') {
        return;
    }

    try {
        window.localStorage.setItem(storageKeyFor(channel), String(enabled));
    } catch {
        // Ignore storage failures (e.g. private browsing mode)
        return;
    }
};

export type { DebugChannel };
