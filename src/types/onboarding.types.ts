/**
 * Core onboarding types
 *
 * Page content is supplied by the host per render and never mutated here.
 */

// ============================================================================
// Page content
// ============================================================================

export interface ImagePayload {
    src: string;
    alt?: string;
    naturalWidthPx?: number;
    naturalHeightPx?: number;
}

export interface VideoPayload {
    src: string;
    posterSrc?: string;
    autoplay?: boolean;
    loop?: boolean;
    muted?: boolean;
}

/**
 * Media attached to a page. `payload` is absent when the host failed to
 * decode the asset upstream; the page still renders without it.
 */
export type PageMedia =
    | { kind: 'image'; payload?: ImagePayload }
    | { kind: 'video'; payload?: VideoPayload };

export type MediaKind = PageMedia['kind'];

export interface InfoSectionField {
    label?: string;
    description: string;
}

export interface InfoSection {
    title?: string;
    fields: InfoSectionField[];
}

export interface OnboardingPage {
    title?: string;
    subtitle?: string;
    /** Markdown body text. Raw HTML is escaped when rendered. */
    body?: string;
    media?: PageMedia;
    /** Path of a custom icon shown above the content. */
    topIcon?: string;
    infoSection?: InfoSection;
}

// ============================================================================
// Position
// ============================================================================

export const PAGE_POSITIONS = ['first', 'middle', 'last', 'singlePage'] as const;

/**
 * Ordinal role of a page inside the wizard. Sole input to button configuration.
 */
export type PagePosition = (typeof PAGE_POSITIONS)[number];

// ============================================================================
// Icons
// ============================================================================

export interface ResolvedIcon {
    /** URL usable as an <img> source (data URLs for decoded files). */
    src: string;
    mimeType: string;
    widthPx?: number;
    heightPx?: number;
}

// ============================================================================
// Configuration
// ============================================================================

export interface ContainerSize {
    widthPx: number;
    heightPx: number;
}

export interface OnboardingPageConfig {
    /** Vertical spacing between stacked blocks. Defaults to 12px. */
    spacingPx?: number;
    /** Icon used when the page has no usable custom icon. */
    defaultIcon?: ResolvedIcon;
}
