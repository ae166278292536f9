import React, { useEffect, useRef } from 'react';
import type { CSSProperties, RefObject } from 'react';

import type { InfoSection } from '../types/onboarding.types';

export interface InfoPopoverProps {
    infoSection: InfoSection;
    anchorRef: RefObject<HTMLElement>;
    onClose: () => void;
}

const POPOVER_OFFSET_PX = 8;

const computeAnchoredPosition = (anchor: HTMLElement | null): CSSProperties => {
    if (!anchor) {
        return { position: 'absolute' };
    }
    const rect = anchor.getBoundingClientRect();
    // Opens beside the trailing edge of the anchor
    return {
        position: 'fixed',
        top: `${rect.top}px`,
        left: `${rect.right + POPOVER_OFFSET_PX}px`,
    };
};

/**
 * Transient help overlay. Closes on a click outside itself and its anchor,
 * or on Escape.
 */
const InfoPopover: React.FC<InfoPopoverProps> = ({ infoSection, anchorRef, onClose }) => {
    const popoverRef = useRef<HTMLDivElement>(null);

    useEffect(() => {
        const handleClickOutside = (event: MouseEvent) => {
            const target = event.target;
            if (!(target instanceof Node)) {
                return;
            }
            if (popoverRef.current?.contains(target) || anchorRef.current?.contains(target)) {
                return;
            }
            onClose();
        };
        const handleKeyDown = (event: KeyboardEvent) => {
            if (event.key === 'Escape') {
                onClose();
            }
        };
        document.addEventListener('mousedown', handleClickOutside);
        document.addEventListener('keydown', handleKeyDown);
        return () => {
            document.removeEventListener('mousedown', handleClickOutside);
            document.removeEventListener('keydown', handleKeyDown);
        };
    }, [anchorRef, onClose]);

    return (
        <div
            ref={popoverRef}
            className="onboarding-info-popover"
            role="dialog"
            aria-label={infoSection.title}
            style={computeAnchoredPosition(anchorRef.current)}
        >
            {infoSection.title && <h3 className="onboarding-info-popover__title">{infoSection.title}</h3>}
            <dl className="onboarding-info-popover__fields">
                {infoSection.fields.map((field, index) => (
                    <React.Fragment key={index}>
                        {field.label && <dt>{field.label}</dt>}
                        <dd>{field.description}</dd>
                    </React.Fragment>
                ))}
            </dl>
        </div>
    );
};

export { InfoPopover };
