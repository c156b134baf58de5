/**
 * Browser implementations of the form's side effects
 */

import type { FormEffects } from '../core/submission-orchestrator';
import type { FieldKey } from '../types/form';

/**
 * Attribute carried by the element wrapping each field
 */
export const FIELD_KEY_ATTRIBUTE = 'data-field-key';

/**
 * Scroll the element wrapping a field into the middle of the viewport
 */
export function scrollToField(key: FieldKey, root: ParentNode = document): void {
  const element = root.querySelector<HTMLElement>(`[${FIELD_KEY_ATTRIBUTE}="${key}"]`);
  element?.scrollIntoView({ behavior: 'smooth', block: 'center' });
}

/**
 * Offer a blob as a download through a temporary anchor
 */
export function saveFile(payload: Blob, filename: string): void {
  const url = URL.createObjectURL(payload);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  anchor.style.display = 'none';
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  URL.revokeObjectURL(url);
}

export function createDomEffects(root: ParentNode = document): FormEffects {
  return {
    scrollToField: (key) => scrollToField(key, root),
    saveFile,
    reload: () => window.location.reload(),
  };
}
