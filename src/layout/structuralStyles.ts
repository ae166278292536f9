/**
 * Structural Styles Module
 *
 * The page owns the gravity stack's structural CSS via inline styles, so the
 * rendered regions match the sizes the allocator budgeted for.
 *
 * @module layout/structuralStyles
 */

import type { CSSProperties } from 'react';

import type { GravityRegion } from './types';
import type { TextMetrics } from './utils';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Structural styles for the gravity stack container.
 */
export interface GravityStackStructuralStyles {
    width: string;
    height: string;
    boxSizing: 'border-box';
    display: 'flex';
    flexDirection: 'column';
    alignItems: 'center';
    overflow: 'hidden';
}

/**
 * Structural styles for one gravity region.
 */
export interface GravityRegionStructuralStyles {
    display: 'flex';
    flexDirection: 'column';
    alignItems: 'center';
    justifyContent: 'flex-start' | 'center' | 'flex-end';
    width: '100%';
    flexGrow: 0 | 1;
    flexShrink: 0 | 1;
    minHeight: 0;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Regions sit flush against each other; all spacing lives on the entries.
 * @param widthPx - Container width the allocator was run with
 * @param heightPx - Container height the allocator was run with
 */
export const createGravityStackStyles = (widthPx: number, heightPx: number): GravityStackStructuralStyles => ({
    width: `${widthPx}px`,
    height: `${heightPx}px`,
    boxSizing: 'border-box',
    display: 'flex',
    flexDirection: 'column',
    alignItems: 'center',
    overflow: 'hidden',
});

const REGION_JUSTIFICATION: Record<GravityRegion, GravityRegionStructuralStyles['justifyContent']> = {
    top: 'flex-start',
    center: 'center',
    bottom: 'flex-end',
};

/**
 * The center region is the flexible filler between the pinned top and bottom
 * stacks.
 */
export const createGravityRegionStyles = (region: GravityRegion): GravityRegionStructuralStyles => ({
    display: 'flex',
    flexDirection: 'column',
    alignItems: 'center',
    justifyContent: REGION_JUSTIFICATION[region],
    width: '100%',
    flexGrow: region === 'center' ? 1 : 0,
    flexShrink: region === 'center' ? 1 : 0,
    minHeight: 0,
});

/**
 * Top and center entries each carry the spacing the allocator subtracted after
 * them. Bottom media fills what is left and carries none.
 */
export const createGravityEntryStyles = (region: GravityRegion, spacingPx: number): CSSProperties => ({
    marginBottom: `${region === 'bottom' ? 0 : spacingPx}px`,
    flexShrink: 0,
});

export const createTextStyles = (metrics: TextMetrics): CSSProperties => ({
    fontSize: `${metrics.fontSizePx}px`,
    fontWeight: metrics.fontWeight,
    lineHeight: `${metrics.lineHeightPx}px`,
    textAlign: 'center',
    margin: 0,
});

/**
 * Body text scrolls inside the budget it was measured against.
 */
export const createBodyStyles = (metrics: TextMetrics, maxHeightPx: number): CSSProperties => ({
    ...createTextStyles(metrics),
    maxHeight: `${Math.max(0, maxHeightPx)}px`,
    overflowY: 'auto',
});

export const createMediaStyles = (widthPx: number, heightPx: number): CSSProperties => ({
    maxWidth: `${Math.max(0, widthPx)}px`,
    maxHeight: `${Math.max(0, heightPx)}px`,
    objectFit: 'contain',
});
