/**
 * NoticeStack component - Displays the transient global notices
 */

import React from 'react';
import type { Notice } from '../types/error';

/**
 * Props for NoticeStack component
 */
export interface NoticeStackProps {
  notices: readonly Notice[];
  /** Custom CSS class */
  className?: string;
}

/**
 * NoticeStack - notices stacked in the order they were raised
 *
 * Each notice expires on its own; a leaving notice keeps rendering with its
 * exit class until the presenter drops it.
 */
export const NoticeStack: React.FC<NoticeStackProps> = ({ notices, className = '' }) => {
  if (notices.length === 0) {
    return null;
  }

  return (
    <div
      className={`handover-notices ${className}`.trim()}
      role="alert"
      aria-live="assertive"
    >
      {notices.map((notice) => (
        <div
          key={notice.id}
          className={`handover-notice handover-notice--${notice.phase}`}
          data-notice-id={notice.id}
        >
          {notice.label && <strong className="handover-notice__label">{notice.label}: </strong>}
          <span className="handover-notice__message">{notice.message}</span>
        </div>
      ))}
    </div>
  );
};

NoticeStack.displayName = 'NoticeStack';
