/**
 * Custom hook binding a SubmissionOrchestrator to a component
 * One orchestrator per mounted form, disposed on unmount
 */

import { useCallback, useEffect, useMemo, useState, useSyncExternalStore } from 'react';
import { createApiClient, type SubmissionTransport } from '../api/client';
import { EventSourceProgressSource } from '../api/progress';
import { loadFormConfig, type FormConfig } from '../config';
import type { ProgressSource } from '../core/progress-channel';
import {
  SubmissionOrchestrator,
  type FormEffects,
  type OrchestratorSnapshot,
} from '../core/submission-orchestrator';
import type { ValidationRuleSet } from '../core/validation-rules';
import type { SubmissionOutcome } from '../types/error';
import type { FieldKey } from '../types/form';
import { createDomEffects } from '../utils/domEffects';

/**
 * Configuration for useSubmissionOrchestrator hook
 */
export interface UseSubmissionOrchestratorOptions {
  /** Parsed configuration (default: all defaults) */
  config?: FormConfig;
  /** Transport (default: HTTP client on the configured submit endpoint) */
  client?: SubmissionTransport;
  /** Progress source (default: EventSource on the configured endpoint) */
  progressSource?: ProgressSource;
  /** Side effects (default: browser DOM effects) */
  effects?: FormEffects;
  rules?: ValidationRuleSet;
}

export interface UseSubmissionOrchestratorReturn {
  snapshot: OrchestratorSnapshot;
  setFieldValue: (key: FieldKey, value: string) => void;
  blurField: (key: FieldKey) => boolean;
  addGroup: () => number | null;
  removeGroup: (id: number) => boolean;
  submit: () => Promise<SubmissionOutcome>;
}

function createOrchestrator(options: UseSubmissionOrchestratorOptions): SubmissionOrchestrator {
  const config = options.config ?? loadFormConfig();
  return new SubmissionOrchestrator({
    config,
    rules: options.rules,
    client:
      options.client ??
      createApiClient({
        submitPath: config.endpoints.submit,
        timeoutMs: config.requestTimeoutMs,
      }),
    progressSource:
      options.progressSource ??
      new EventSourceProgressSource({
        url: config.endpoints.progress,
        sentinel: config.progress.sentinel,
      }),
    effects: options.effects ?? createDomEffects(),
  });
}

/**
 * Hook owning the orchestrator of one form.
 *
 * Options are read once, when the form mounts.
 */
export function useSubmissionOrchestrator(
  options: UseSubmissionOrchestratorOptions = {}
): UseSubmissionOrchestratorReturn {
  const [orchestrator] = useState(() => createOrchestrator(options));

  useEffect(() => () => orchestrator.dispose(), [orchestrator]);

  const subscribe = useCallback(
    (listener: () => void) => orchestrator.subscribe(listener),
    [orchestrator]
  );
  const snapshot = useSyncExternalStore(subscribe, orchestrator.getSnapshot);

  return useMemo(
    () => ({
      snapshot,
      setFieldValue: (key: FieldKey, value: string) => orchestrator.setFieldValue(key, value),
      blurField: (key: FieldKey) => orchestrator.blurField(key),
      addGroup: () => orchestrator.addGroup(),
      removeGroup: (id: number) => orchestrator.removeGroup(id),
      submit: () => orchestrator.submit(),
    }),
    [orchestrator, snapshot]
  );
}
