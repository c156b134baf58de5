/**
 * Error Presenter - global notices and inline field annotations
 *
 * Global notices stack and expire independently. Each field carries at most
 * one annotation; setting a new one replaces the previous one.
 */

import type { Notice } from '../types/error';
import type { FieldKey } from '../types/form';
import type { FormState } from './form-state';
import { Observable, TimerSet } from './observable';

export interface ErrorPresenterOptions {
  /** How long a notice stays fully visible */
  noticeVisibleMs: number;
  /** Duration of the exit animation before the notice is removed */
  noticeExitMs: number;
}

export class ErrorPresenter extends Observable {
  private noticeList: Notice[] = [];
  private nextNoticeId = 1;
  private annotationMap = new Map<FieldKey, string>();
  private readonly timers = new TimerSet();

  constructor(
    private readonly form: FormState,
    private readonly options: ErrorPresenterOptions
  ) {
    super();
  }

  get notices(): readonly Notice[] {
    return this.noticeList;
  }

  /**
   * Show a transient global notice
   * @returns The notice id
   */
  showNotice(message: string, label?: string): number {
    const id = this.nextNoticeId++;
    const notice: Notice = label === undefined
      ? { id, message, phase: 'visible' }
      : { id, message, label, phase: 'visible' };
    this.noticeList = [...this.noticeList, notice];
    this.notify();

    this.timers.schedule(() => {
      this.noticeList = this.noticeList.map((current) =>
        current.id === id ? { ...current, phase: 'leaving' } : current
      );
      this.notify();
      this.timers.schedule(() => this.dismissNotice(id), this.options.noticeExitMs);
    }, this.options.noticeVisibleMs);

    return id;
  }

  dismissNotice(id: number): void {
    const remaining = this.noticeList.filter((notice) => notice.id !== id);
    if (remaining.length === this.noticeList.length) return;
    this.noticeList = remaining;
    this.notify();
  }

  /**
   * Mark a field invalid and annotate it, replacing any previous annotation
   */
  setFieldError(key: FieldKey, message: string): void {
    this.annotationMap.set(key, message);
    this.form.setStatus(key, 'invalid');
    this.notify();
  }

  /**
   * Remove a field's annotation; an invalid field returns to pristine
   */
  clearFieldError(key: FieldKey): void {
    const hadAnnotation = this.annotationMap.delete(key);
    if (this.form.getStatus(key) === 'invalid') {
      this.form.setStatus(key, 'pristine');
    }
    if (hadAnnotation) {
      this.notify();
    }
  }

  /**
   * Mark a field valid, dropping its annotation
   */
  markValid(key: FieldKey): void {
    const hadAnnotation = this.annotationMap.delete(key);
    this.form.setStatus(key, 'valid');
    if (hadAnnotation) {
      this.notify();
    }
  }

  /**
   * Optimistically clear an invalid field while the user types in it
   */
  handleInput(key: FieldKey): void {
    if (this.form.getStatus(key) === 'invalid') {
      this.clearFieldError(key);
    }
  }

  getFieldError(key: FieldKey): string | undefined {
    return this.form.has(key) ? this.annotationMap.get(key) : undefined;
  }

  /**
   * Annotations of fields that still exist; a removed group's annotations
   * disappear with it
   */
  annotations(): Readonly<Partial<Record<FieldKey, string>>> {
    const entries = [...this.annotationMap].filter(([key]) => this.form.has(key));
    return Object.fromEntries(entries);
  }

  /** Drop every annotation; notices keep their own lifetime */
  clearAll(): void {
    for (const key of [...this.annotationMap.keys()]) {
      this.annotationMap.delete(key);
      if (this.form.getStatus(key) === 'invalid') {
        this.form.setStatus(key, 'pristine');
      }
    }
    this.notify();
  }

  dispose(): void {
    this.timers.clear();
  }
}
