import { logDebugEvent } from './debugLog';
import type { LayoutInsertion } from '../types';

export const logAllocatorEvaluation = (
    emoji: string,
    label: string,
    context: Record<string, unknown> = {}
): void => {
    logDebugEvent('layout-allocator', emoji, label, context);
};

const describeElementSize = (insertion: LayoutInsertion): Record<string, unknown> => {
    const { element } = insertion;
    switch (element.kind) {
        case 'title':
        case 'subtitle':
            return { heightPx: element.heightPx };
        case 'body':
            return { heightPx: element.heightPx, maxHeightPx: element.maxHeightPx };
        case 'image':
        case 'video':
            return {
                preferredWidthPx: element.preferredWidthPx,
                preferredHeightPx: element.preferredHeightPx,
            };
    }
};

export const logInsertion = (insertion: LayoutInsertion, remainingAfterPx: number): void => {
    logAllocatorEvaluation('✅', 'element-inserted', {
        kind: insertion.element.kind,
        region: insertion.region,
        index: insertion.index,
        ...describeElementSize(insertion),
        remainingAfterPx,
    });
};
