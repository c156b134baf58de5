/**
 * Form Configuration
 *
 * Endpoints, timings and layout constants of the form. Every value has a
 * default, so callers pass only what they override. Configuration can also
 * be embedded in the page as a JSON script element.
 */

import { z } from 'zod';
import { ConfigurationError } from './core/errors';

const durationMs = z.number().int().min(0);

export const formConfigSchema = z.object({
  endpoints: z
    .object({
      submit: z.string().min(1).default('/'),
      progress: z.string().min(1).default('/progress'),
    })
    .default({}),
  /** Abort the submission request after this long */
  requestTimeoutMs: z.number().int().positive().default(120_000),
  notices: z
    .object({
      visibleMs: durationMs.default(5000),
      exitMs: durationMs.default(300),
    })
    .default({}),
  groups: z
    .object({
      baseWidthPx: z.number().positive().default(350),
      widthIncrementPx: z.number().min(0).default(150),
      insertAnimationMs: durationMs.default(500),
      removeAnimationMs: durationMs.default(500),
    })
    .default({}),
  progress: z
    .object({
      enterMs: durationMs.default(500),
      holdMs: durationMs.default(1500),
      exitMs: durationMs.default(500),
      sentinel: z.string().min(1).default('DONE'),
    })
    .default({}),
  success: z
    .object({
      reloadDelayMs: durationMs.default(3000),
    })
    .default({}),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

export type FormConfig = z.infer<typeof formConfigSchema>;
export type FormConfigInput = z.input<typeof formConfigSchema>;

/**
 * Parse configuration overrides, filling in defaults.
 *
 * @throws {ConfigurationError} If a value has the wrong type or range
 */
export function loadFormConfig(input: unknown = {}): FormConfig {
  const result = formConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Read configuration from a `<script type="application/json">` element.
 * A missing element yields the defaults.
 *
 * @throws {ConfigurationError} If the element holds invalid JSON or values
 */
export function loadFormConfigFromElement(doc: Document, elementId: string): FormConfig {
  const element = doc.getElementById(elementId);
  const text = element?.textContent?.trim();
  if (!text) {
    return loadFormConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError([
      `#${elementId}: ${error instanceof Error ? error.message : 'invalid JSON'}`,
    ]);
  }
  return loadFormConfig(parsed);
}
