/**
 * ProgressOverlay component - Spinner and paced progress messages shown
 * while a submission is in flight
 */

import React from 'react';
import type { ProgressDisplay } from '../core/progress-queue';

export interface ProgressOverlayProps {
  visible: boolean;
  progress: ProgressDisplay;
  className?: string;
}

export const ProgressOverlay: React.FC<ProgressOverlayProps> = ({
  visible,
  progress,
  className = '',
}) => {
  if (!visible) {
    return null;
  }

  return (
    <div className={`handover-progress ${className}`.trim()} role="status" aria-live="polite">
      <div className="handover-progress__spinner" aria-hidden="true" />
      {progress.text !== null && (
        <p className={`handover-progress__message handover-progress__message--${progress.phase}`}>
          {progress.text}
        </p>
      )}
    </div>
  );
};

ProgressOverlay.displayName = 'ProgressOverlay';
