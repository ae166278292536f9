import React from 'react';

import type { LayoutElement } from '../layout/types';
import { BODY_TEXT_METRICS, SUBTITLE_TEXT_METRICS, TITLE_TEXT_METRICS } from '../layout/utils';
import { renderBodyMarkdown } from '../layout/bodyMarkdown';
import { createBodyStyles, createMediaStyles, createTextStyles } from '../layout/structuralStyles';

export interface LayoutElementViewProps {
    element: LayoutElement;
}

const LayoutElementView: React.FC<LayoutElementViewProps> = ({ element }) => {
    switch (element.kind) {
        case 'title':
            return (
                <h1 className="onboarding-title" style={createTextStyles(TITLE_TEXT_METRICS)}>
                    {element.text}
                </h1>
            );
        case 'subtitle':
            return (
                <h2 className="onboarding-subtitle" style={createTextStyles(SUBTITLE_TEXT_METRICS)}>
                    {element.text}
                </h2>
            );
        case 'body':
            return (
                <div
                    className="onboarding-body"
                    style={createBodyStyles(BODY_TEXT_METRICS, element.maxHeightPx)}
                    dangerouslySetInnerHTML={{ __html: renderBodyMarkdown(element.text) }}
                />
            );
        case 'image':
            return (
                <img
                    className="onboarding-media onboarding-media--image"
                    src={element.payload.src}
                    alt={element.payload.alt ?? ''}
                    style={createMediaStyles(element.preferredWidthPx, element.preferredHeightPx)}
                />
            );
        case 'video':
            return (
                <video
                    className="onboarding-media onboarding-media--video"
                    src={element.payload.src}
                    poster={element.payload.posterSrc}
                    autoPlay={element.payload.autoplay ?? false}
                    loop={element.payload.loop ?? false}
                    muted={element.payload.muted ?? true}
                    controls
                    playsInline
                    style={createMediaStyles(element.preferredWidthPx, element.preferredHeightPx)}
                />
            );
    }
};

export { LayoutElementView };
