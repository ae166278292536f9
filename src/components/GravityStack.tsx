import React from 'react';

import type { LayoutElement, RegionBuckets } from '../layout/types';
import { GRAVITY_REGIONS } from '../layout/utils';
import {
    createGravityEntryStyles,
    createGravityRegionStyles,
    createGravityStackStyles,
} from '../layout/structuralStyles';
import { LayoutElementView } from './LayoutElementView';

export interface GravityStackProps {
    buckets: RegionBuckets;
    widthPx: number;
    heightPx: number;
    spacingPx: number;
    accessibilityLabel?: string;
    /** Replaces the built-in rendering of a content element. */
    renderElement?: (element: LayoutElement) => React.ReactNode;
}

const GravityStack: React.FC<GravityStackProps> = ({
    buckets,
    widthPx,
    heightPx,
    spacingPx,
    accessibilityLabel,
    renderElement,
}) => (
    <div
        className="onboarding-gravity-stack"
        aria-label={accessibilityLabel}
        style={createGravityStackStyles(widthPx, heightPx)}
    >
        {GRAVITY_REGIONS.map((region) => (
            <div
                key={region}
                className={`onboarding-gravity-region onboarding-gravity-region--${region}`}
                data-region={region}
                style={createGravityRegionStyles(region)}
            >
                {buckets[region].map((element, index) => (
                    <div
                        key={`${region}:${index}:${element.kind}`}
                        className="onboarding-gravity-entry"
                        data-region={region}
                        data-kind={element.kind}
                        data-index={index}
                        style={createGravityEntryStyles(region, spacingPx)}
                    >
                        {renderElement ? renderElement(element) : <LayoutElementView element={element} />}
                    </div>
                ))}
            </div>
        ))}
    </div>
);

export { GravityStack };
