import type { ImagePayload, VideoPayload } from '../types/onboarding.types';

/**
 * Named slots of the gravity stack. `top` stacks downward, `bottom` stacks
 * upward from the bottom edge, `center` holds one dominant block.
 */
export type GravityRegion = 'top' | 'center' | 'bottom';

export interface TitleElement {
    kind: 'title';
    text: string;
    heightPx: number;
}

export interface SubtitleElement {
    kind: 'subtitle';
    text: string;
    heightPx: number;
}

export interface BodyElement {
    kind: 'body';
    text: string;
    /** Budget the body view was created with. */
    maxHeightPx: number;
    /** Height reported by the measurer (bounded by the budget). */
    heightPx: number;
}

export interface ImageMediaElement {
    kind: 'image';
    payload: ImagePayload;
    preferredWidthPx: number;
    preferredHeightPx: number;
}

export interface VideoMediaElement {
    kind: 'video';
    payload: VideoPayload;
    preferredWidthPx: number;
    preferredHeightPx: number;
}

export type MediaElement = ImageMediaElement | VideoMediaElement;

export type LayoutElement = TitleElement | SubtitleElement | BodyElement | MediaElement;

export interface LayoutInsertion {
    region: GravityRegion;
    /** Insertion index inside the region. */
    index: number;
    element: LayoutElement;
}

export interface AllocationPlan {
    insertions: LayoutInsertion[];
    /** Budget left after the last subtraction. May be zero or negative. */
    remainingPx: number;
}

export type RegionBuckets = Record<GravityRegion, LayoutElement[]>;
