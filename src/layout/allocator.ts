import { LAYOUT_SPACING_PX } from './utils';
import type {
    AllocationPlan,
    BodyElement,
    GravityRegion,
    LayoutInsertion,
    MediaElement,
} from './types';
import type { ContentMeasurer } from '../types/adapters.types';
import type { OnboardingPage, PageMedia } from '../types/onboarding.types';
import { logAllocatorEvaluation, logInsertion } from './debug/allocatorLogs';

export interface AllocateLayoutArgs {
    containerWidthPx: number;
    containerHeightPx: number;
    page: OnboardingPage;
    measurer: ContentMeasurer;
    spacingPx?: number;
}

interface AllocationContext {
    widthPx: number;
    spacingPx: number;
    measurer: ContentMeasurer;
}

interface AllocationState {
    insertions: LayoutInsertion[];
    remainingPx: number;
    nextTopIndex: number;
}

type AllocationStep = (state: AllocationState) => AllocationState;

const appendInsertion = (
    state: AllocationState,
    insertion: LayoutInsertion,
    consumedPx: number
): AllocationState => {
    const remainingPx = state.remainingPx - consumedPx;
    logInsertion(insertion, remainingPx);
    return {
        insertions: [...state.insertions, insertion],
        remainingPx,
        nextTopIndex: insertion.region === 'top' ? state.nextTopIndex + 1 : state.nextTopIndex,
    };
};

const titleStep = (text: string | undefined, context: AllocationContext): AllocationStep => (state) => {
    if (text === undefined) {
        return state;
    }
    const heightPx = context.measurer.measureTitle(text, context.widthPx);
    return appendInsertion(
        state,
        { region: 'top', index: state.nextTopIndex, element: { kind: 'title', text, heightPx } },
        heightPx + context.spacingPx
    );
};

const subtitleStep = (text: string | undefined, context: AllocationContext): AllocationStep => (state) => {
    if (text === undefined) {
        return state;
    }
    const heightPx = context.measurer.measureSubtitle(text, context.widthPx);
    return appendInsertion(
        state,
        { region: 'top', index: state.nextTopIndex, element: { kind: 'subtitle', text, heightPx } },
        heightPx + context.spacingPx
    );
};

/**
 * Body is measured against whatever budget is left. Next to media it sits at
 * the head of `center`; without media it continues the top stack.
 */
const bodyStep = (
    text: string | undefined,
    placement: Extract<GravityRegion, 'top' | 'center'>,
    context: AllocationContext
): AllocationStep => (state) => {
    if (text === undefined) {
        return state;
    }
    const maxHeightPx = state.remainingPx;
    const element: BodyElement = {
        kind: 'body',
        text,
        maxHeightPx,
        heightPx: context.measurer.measureBody(text, context.widthPx, maxHeightPx),
    };
    const index = placement === 'top' ? state.nextTopIndex : 0;
    return appendInsertion(state, { region: placement, index, element }, element.heightPx + context.spacingPx);
};

const createMediaElement = (
    media: PageMedia,
    widthPx: number,
    heightPx: number
): MediaElement | undefined => {
    switch (media.kind) {
        case 'image':
            return media.payload
                ? { kind: 'image', payload: media.payload, preferredWidthPx: widthPx, preferredHeightPx: heightPx }
                : undefined;
        case 'video':
            return media.payload
                ? { kind: 'video', payload: media.payload, preferredWidthPx: widthPx, preferredHeightPx: heightPx }
                : undefined;
    }
};

const mediaStep = (media: PageMedia, context: AllocationContext): AllocationStep => (state) => {
    const element = createMediaElement(media, context.widthPx, state.remainingPx);
    if (!element) {
        logAllocatorEvaluation('⏭️', 'media-skipped', { kind: media.kind, reason: 'missing-payload' });
        return state;
    }
    // Media takes the rest of the budget; nothing is placed after it.
    return appendInsertion(state, { region: 'bottom', index: 0, element }, 0);
};

/**
 * Allocate the container's vertical budget among the page's content blocks.
 *
 * Title and subtitle always stack from the top. With media, body text goes to
 * the center and the media element claims the bottom at whatever height is
 * left; without media, body follows the headings in the top stack.
 * The budget is never clamped: overflowing content yields a negative remainder.
 */
export const allocateLayout = ({
    containerWidthPx,
    containerHeightPx,
    page,
    measurer,
    spacingPx = LAYOUT_SPACING_PX,
}: AllocateLayoutArgs): AllocationPlan => {
    const context: AllocationContext = { widthPx: containerWidthPx, spacingPx, measurer };

    logAllocatorEvaluation('📐', 'allocation-start', {
        containerWidthPx,
        containerHeightPx,
        spacingPx,
        hasMedia: page.media !== undefined,
    });

    const steps: AllocationStep[] = page.media
        ? [
              titleStep(page.title, context),
              subtitleStep(page.subtitle, context),
              bodyStep(page.body, 'center', context),
              mediaStep(page.media, context),
          ]
        : [
              titleStep(page.title, context),
              subtitleStep(page.subtitle, context),
              bodyStep(page.body, 'top', context),
          ];

    const initialState: AllocationState = {
        insertions: [],
        remainingPx: containerHeightPx,
        nextTopIndex: 0,
    };
    const { insertions, remainingPx } = steps.reduce((state, step) => step(state), initialState);

    logAllocatorEvaluation('🧾', 'allocation-complete', {
        insertions: insertions.length,
        remainingPx,
    });

    return { insertions, remainingPx };
};
