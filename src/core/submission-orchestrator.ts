/**
 * Submission Orchestrator - top-level state machine of the form
 *
 * Owns the FormState and composes the validator, the error presenter, the
 * field group manager and the progress queue. A submission validates the
 * whole form synchronously; only a valid form opens the progress stream and
 * sends the request, both at once. Every completed submission returns the
 * orchestrator to idle with the submit control restored.
 */

import type pino from 'pino';
import type { SubmissionTransport } from '../api/client';
import { TRANSPORT_MESSAGES } from '../api/client';
import { loadFormConfig, type FormConfig } from '../config';
import { createChildLogger } from '../logging';
import type {
  ClientValidationError,
  FormValidationReport,
  SubmissionOutcome,
  SubmissionResult,
} from '../types/error';
import type { FieldKey, GroupLayout } from '../types/form';
import { buildDownloadFilename } from '../utils/filename';
import { ErrorPresenter } from './error-presenter';
import { resolveRule, validateValue } from './field-validator';
import { buildGroupView, groupFieldKey, type FieldGroupView } from './field-group-view';
import { FormState, parseFieldKey, ruleNameOf } from './form-state';
import { Observable, TimerSet } from './observable';
import type { ProgressChannel, ProgressSource } from './progress-channel';
import { ProgressMessageQueue, type ProgressDisplay } from './progress-queue';
import { assertValidTransition, type OrchestratorState } from './state-machine';
import { DEFAULT_RULES, OTHER_ROLE_VALUE, type ValidationRuleSet } from './validation-rules';
import type { Field, Notice, ScalarFieldName } from '../types';

/**
 * Side effects that reach outside the form
 */
export interface FormEffects {
  /** Bring a field into view */
  scrollToField(key: FieldKey): void;
  /** Offer a file to the user */
  saveFile(payload: Blob, filename: string): void;
  /** Start over with a fresh page */
  reload(): void;
}

export interface SubmitControl {
  disabled: boolean;
  label: string;
}

export const SUBMIT_LABEL = 'Enviar';
export const SUBMIT_BUSY_LABEL = 'Enviando...';

export interface SubmissionOrchestratorOptions {
  client: SubmissionTransport;
  progressSource: ProgressSource;
  effects: FormEffects;
  /** Parsed configuration (default: all defaults) */
  config?: FormConfig;
  rules?: ValidationRuleSet;
  logger?: pino.Logger;
}

/**
 * Immutable view of the whole form for rendering
 */
export interface OrchestratorSnapshot {
  state: OrchestratorState;
  fields: Readonly<Record<ScalarFieldName, Field>>;
  groups: readonly FieldGroupView[];
  layout: GroupLayout;
  canAddGroup: boolean;
  annotations: Readonly<Partial<Record<FieldKey, string>>>;
  groupStatuses: Readonly<Partial<Record<FieldKey, Field['status']>>>;
  notices: readonly Notice[];
  progress: ProgressDisplay;
  submitControl: SubmitControl;
  successVisible: boolean;
  config: FormConfig;
}

/**
 * Aggregate notice shown next to the field annotations
 */
export function formatErrorCount(count: number): string {
  return `Formulário contém ${count} erro(s). Corrija os campos destacados.`;
}

/**
 * Notice text for a failed request
 */
export function describeTransportFailure(
  result: Extract<SubmissionResult, { kind: 'transport_failure' }>
): string {
  if (result.reason === 'network' || result.reason === 'timeout') {
    return result.message || TRANSPORT_MESSAGES[result.reason];
  }
  return `Erro ao gerar documento: ${result.message}`;
}

export class SubmissionOrchestrator extends Observable {
  readonly form: FormState;
  readonly presenter: ErrorPresenter;
  readonly progress: ProgressMessageQueue;
  readonly config: FormConfig;

  private readonly client: SubmissionTransport;
  private readonly progressSource: ProgressSource;
  private readonly effects: FormEffects;
  private readonly rules: ValidationRuleSet;
  private readonly logger: pino.Logger;
  private readonly timers = new TimerSet();

  private currentState: OrchestratorState = 'idle';
  private submitControl: SubmitControl = { disabled: false, label: SUBMIT_LABEL };
  private successVisible = false;
  private activeChannel: ProgressChannel | null = null;
  private snapshot: OrchestratorSnapshot | null = null;

  constructor(options: SubmissionOrchestratorOptions) {
    super();
    this.config = options.config ?? loadFormConfig();
    this.client = options.client;
    this.progressSource = options.progressSource;
    this.effects = options.effects;
    this.rules = options.rules ?? DEFAULT_RULES;
    this.logger = options.logger ?? createChildLogger({ logger: 'orchestrator' });
    if (this.config.logLevel) {
      this.logger.level = this.config.logLevel;
    }

    this.form = new FormState(this.config.groups);
    this.presenter = new ErrorPresenter(this.form, {
      noticeVisibleMs: this.config.notices.visibleMs,
      noticeExitMs: this.config.notices.exitMs,
    });
    this.progress = new ProgressMessageQueue(this.config.progress);

    const invalidate = () => this.changed();
    this.form.subscribe(invalidate);
    this.form.groups.subscribe(invalidate);
    this.presenter.subscribe(invalidate);
    this.progress.subscribe(invalidate);
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /**
   * Snapshot of the form. The same object is returned until something
   * changes.
   */
  getSnapshot = (): OrchestratorSnapshot => {
    if (!this.snapshot) {
      this.snapshot = this.buildSnapshot();
    }
    return this.snapshot;
  };

  /**
   * Record user input; an invalid field is optimistically cleared
   */
  setFieldValue(key: FieldKey, value: string): void {
    this.form.setValue(key, value);
    this.presenter.handleInput(key);
    // The other-role field is hidden unless its role is picked
    if (key === 'funcao' && value !== OTHER_ROLE_VALUE && this.form.getScalar('outrosFuncao')) {
      this.form.setValue('outrosFuncao', '');
      this.presenter.clearFieldError('outrosFuncao');
    }
  }

  /**
   * Validate a single field, as when it loses focus
   * @returns Whether the field is valid
   */
  blurField(key: FieldKey): boolean {
    const error = this.validateOne(key);
    if (error) {
      this.presenter.setFieldError(key, error.message);
      return false;
    }
    this.presenter.markValid(key);
    return true;
  }

  addGroup(): number | null {
    return this.form.groups.add()?.id ?? null;
  }

  removeGroup(id: number): boolean {
    return this.form.groups.remove(id);
  }

  /**
   * Validate every field and the cross-field asset rule, annotating
   * failures. Makes no network call.
   */
  validateAll(): FormValidationReport {
    this.presenter.clearAll();
    const errors: ClientValidationError[] = [];

    for (const key of this.form.fieldKeys()) {
      const error = this.validateOne(key);
      if (error) {
        errors.push(error);
        this.presenter.setFieldError(key, error.message);
      } else {
        this.presenter.markValid(key);
      }
    }

    const groups = this.form.groups.active();
    const hasAsset = groups.some((group) => group.asset.trim() !== '');
    const firstGroup = groups[0];
    if (!hasAsset && firstGroup) {
      const key = groupFieldKey('patrimonio', firstGroup.id);
      const message =
        this.rules.patrimonio.messages.required ?? 'Pelo menos um patrimônio é obrigatório';
      errors.push({ field: key, message });
      this.presenter.setFieldError(key, message);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Validate and, if the form is valid, submit it.
   *
   * Ignored unless the orchestrator is idle.
   */
  async submit(): Promise<SubmissionOutcome> {
    if (this.currentState !== 'idle') {
      this.logger.debug({ state: this.currentState }, 'Submit ignored while busy');
      return 'ignored';
    }

    this.transition('validating');
    const report = this.validateAll();
    if (!report.valid) {
      this.logger.info({ errorCount: report.errors.length }, 'Client validation failed');
      this.presenter.showNotice(formatErrorCount(report.errors.length));
      this.scrollToFirstInvalid();
      this.transition('idle');
      return 'invalid';
    }

    this.transition('submitting');
    this.setSubmitControl({ disabled: true, label: SUBMIT_BUSY_LABEL });
    this.progress.reset();

    let channel: ProgressChannel | null = null;
    try {
      channel = this.openProgress();
      const result: SubmissionResult = channel
        ? await this.send()
        : {
            kind: 'transport_failure',
            reason: 'network',
            message: TRANSPORT_MESSAGES.network,
          };
      this.transition('completed');
      return this.complete(result);
    } finally {
      channel?.close();
      this.settle();
    }
  }

  dispose(): void {
    this.activeChannel?.close();
    this.activeChannel = null;
    this.timers.clear();
    this.presenter.dispose();
    this.form.groups.dispose();
    this.progress.dispose();
  }

  /** End the attempt in idle with the submit control restored */
  private settle(): void {
    this.activeChannel = null;
    this.setSubmitControl({ disabled: false, label: SUBMIT_LABEL });
    if (this.currentState === 'submitting') {
      this.transition('completed');
    }
    this.transition('idle');
  }

  private openProgress(): ProgressChannel | null {
    try {
      const channel = this.progressSource.open();
      this.activeChannel = channel;
      this.progress.drain(channel).catch((err: unknown) => {
        this.logger.error({ err }, 'Progress stream consumer failed');
      });
      return channel;
    } catch (err) {
      this.logger.error({ err }, 'Progress stream could not be opened');
      return null;
    }
  }

  private async send(): Promise<SubmissionResult> {
    try {
      return await this.client.submit(this.form.toPayload());
    } catch (err) {
      this.logger.error({ err }, 'Submission transport threw');
      return {
        kind: 'transport_failure',
        reason: 'network',
        message: TRANSPORT_MESSAGES.network,
      };
    }
  }

  private complete(result: SubmissionResult): SubmissionOutcome {
    switch (result.kind) {
      case 'success': {
        const filename = buildDownloadFilename(this.form.getScalar('nome'));
        this.logger.info({ filename }, 'Document received');
        try {
          this.effects.saveFile(result.payload, filename);
        } catch (err) {
          this.logger.error({ err, filename }, 'Document could not be saved');
          this.presenter.showNotice(
            describeTransportFailure({
              kind: 'transport_failure',
              reason: 'unexpected',
              message: err instanceof Error ? err.message : String(err),
            })
          );
          return 'transport_failure';
        }
        this.successVisible = true;
        this.changed();
        this.timers.schedule(() => this.effects.reload(), this.config.success.reloadDelayMs);
        return result.kind;
      }
      case 'validation_failure': {
        this.logger.info({ errorCount: result.errors.length }, 'Server validation failed');
        for (const error of result.errors) {
          const key = this.resolveServerField(error.field);
          if (key) {
            this.presenter.setFieldError(key, error.message);
          } else {
            this.presenter.showNotice(error.message, error.field);
          }
        }
        this.presenter.showNotice(formatErrorCount(result.errors.length));
        this.scrollToFirstInvalid();
        return result.kind;
      }
      case 'transport_failure': {
        this.logger.warn({ reason: result.reason }, 'Submission failed');
        this.presenter.showNotice(describeTransportFailure(result));
        return result.kind;
      }
    }
  }

  private validateOne(key: FieldKey): ClientValidationError | null {
    const value = this.form.getValue(key);
    if (value === undefined) return null;

    const rule = resolveRule(this.rules[ruleNameOf(key)], (name) => this.form.getScalar(name));
    const result = validateValue(value, rule);
    return result.valid ? null : { field: key, message: result.message };
  }

  /**
   * Map a server field name to a field of the form. Group fields, with or
   * without "[]", resolve to the first group.
   */
  private resolveServerField(name: string): FieldKey | null {
    const bare = name.endsWith('[]') ? name.slice(0, -2) : name;
    const parsed = parseFieldKey(bare);
    if (parsed?.kind === 'scalar') {
      return parsed.name;
    }
    if (parsed?.kind === 'group') {
      const key = groupFieldKey(parsed.field, parsed.groupId);
      return this.form.has(key) ? key : null;
    }
    if (bare === 'patrimonio' || bare === 'observacao') {
      const firstGroup = this.form.groups.active()[0];
      return firstGroup ? groupFieldKey(bare, firstGroup.id) : null;
    }
    return null;
  }

  private scrollToFirstInvalid(): void {
    const key = this.form.firstInvalid();
    if (key) {
      this.effects.scrollToField(key);
    }
  }

  private transition(to: OrchestratorState): void {
    assertValidTransition(this.currentState, to);
    this.logger.debug({ from: this.currentState, to }, 'State transition');
    this.currentState = to;
    this.changed();
  }

  private setSubmitControl(control: SubmitControl): void {
    this.submitControl = control;
    this.changed();
  }

  private changed(): void {
    this.snapshot = null;
    this.notify();
  }

  private scalarField(name: ScalarFieldName): Field {
    return { name, value: this.form.getScalar(name), status: this.form.getStatus(name) };
  }

  private buildSnapshot(): OrchestratorSnapshot {
    const groupStatuses: Partial<Record<FieldKey, Field['status']>> = {};
    for (const group of this.form.groups.list()) {
      for (const kind of ['patrimonio', 'observacao'] as const) {
        const key = groupFieldKey(kind, group.id);
        groupStatuses[key] = this.form.getStatus(key);
      }
    }

    return {
      state: this.currentState,
      fields: {
        nome: this.scalarField('nome'),
        funcao: this.scalarField('funcao'),
        outrosFuncao: this.scalarField('outrosFuncao'),
        departamento: this.scalarField('departamento'),
        telefone: this.scalarField('telefone'),
        empresa: this.scalarField('empresa'),
      },
      groups: this.form.groups.list().map(buildGroupView),
      layout: this.form.groups.layout,
      canAddGroup: this.form.groups.addGuard === 'idle',
      annotations: this.presenter.annotations(),
      groupStatuses,
      notices: this.presenter.notices,
      progress: this.progress.display,
      submitControl: this.submitControl,
      successVisible: this.successVisible,
      config: this.config,
    };
  }
}
