import { isDebugEnabled } from '../debugFlags';
import type { DebugChannel } from '../debugFlags';

const CHANNEL_TAGS: Record<DebugChannel, string> = {
    'layout-allocator': 'allocator',
    'navigation': 'navigation',
    'icon': 'icon',
    'page-render': 'page',
};

/**
 * Log a labelled event on a debug channel. No-op unless the channel is enabled.
 */
export const logDebugEvent = (
    channel: DebugChannel,
    emoji: string,
    label: string,
    context: Record<string, unknown> = {}
): void => {
    if (!isDebugEnabled(channel)) {
        return;
    }

    const prefix = `${emoji} [${CHANNEL_TAGS[channel]}] ${label}`;
    const payload = Object.keys(context).length > 0 ? context : undefined;
    if (payload) {
        // eslint-disable-next-line no-console
        console.log(prefix, payload);
    } else {
        // eslint-disable-next-line no-console
        console.log(prefix);
    }
};
