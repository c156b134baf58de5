/**
 * SuccessOverlay component - Confirmation shown after the document download
 */

import React from 'react';

export interface SuccessOverlayProps {
  visible: boolean;
  /** Seconds until the page reloads, shown to the user */
  reloadDelaySeconds: number;
  className?: string;
}

export const SuccessOverlay: React.FC<SuccessOverlayProps> = ({
  visible,
  reloadDelaySeconds,
  className = '',
}) => {
  if (!visible) {
    return null;
  }

  return (
    <div className={`handover-success ${className}`.trim()} role="dialog" aria-modal="true">
      <div className="handover-success__message">
        <h2 className="handover-success__title">Documento gerado com sucesso!</h2>
        <p className="handover-success__hint">
          O download foi iniciado. A página será recarregada em {reloadDelaySeconds} segundos.
        </p>
      </div>
    </div>
  );
};

SuccessOverlay.displayName = 'SuccessOverlay';
