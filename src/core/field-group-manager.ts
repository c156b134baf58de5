/**
 * Field Group Manager - ordered collection of repeatable asset-entry groups
 *
 * Group ids come from a counter that only grows. Adding is guarded: while an
 * insertion animation is in flight the guard is `busy` and add() is a no-op.
 * Removal animates first and deletes afterwards; when a single group is left
 * the grouped layout collapses back to inline fields, values untouched.
 */

import type { FieldGroup, GroupFieldKind, GroupLayout } from '../types/form';
import { Observable, TimerSet } from './observable';
import { getLogger } from '../logging';

export interface FieldGroupManagerOptions {
  /** Container width with a single group */
  baseWidthPx: number;
  /** Extra width per additional group */
  widthIncrementPx: number;
  insertAnimationMs: number;
  removeAnimationMs: number;
  /** Called once a group has actually been deleted */
  onRemoved?: (group: FieldGroup) => void;
}

export type AddGuard = 'idle' | 'busy';

/** Id of the group that exists before any add() */
export const BASE_GROUP_ID = 0;

function createGroup(id: number, phase: FieldGroup['phase']): FieldGroup {
  return { id, asset: '', note: '', phase };
}

export class FieldGroupManager extends Observable {
  private groups: FieldGroup[] = [createGroup(BASE_GROUP_ID, 'present')];
  private nextId = BASE_GROUP_ID + 1;
  private guard: AddGuard = 'idle';
  private readonly timers = new TimerSet();

  constructor(private readonly options: FieldGroupManagerOptions) {
    super();
  }

  /** Groups in display (and submission) order, leaving ones included */
  list(): readonly FieldGroup[] {
    return this.groups;
  }

  /** Groups that take part in validation and submission */
  active(): readonly FieldGroup[] {
    return this.groups.filter((group) => group.phase !== 'leaving');
  }

  get(id: number): FieldGroup | undefined {
    return this.groups.find((group) => group.id === id);
  }

  get count(): number {
    return this.groups.length;
  }

  get addGuard(): AddGuard {
    return this.guard;
  }

  get layout(): GroupLayout {
    const { baseWidthPx, widthIncrementPx } = this.options;
    return {
      grouped: this.groups.length > 1,
      widthPx: baseWidthPx + (this.groups.length - 1) * widthIncrementPx,
    };
  }

  /**
   * Append a new empty group
   * @returns The new group, or null while a previous insertion is in flight
   */
  add(): FieldGroup | null {
    if (this.guard !== 'idle') {
      getLogger().debug({ logger: 'field-groups' }, 'Add ignored while insertion is in flight');
      return null;
    }

    this.guard = 'busy';
    const group = createGroup(this.nextId++, 'entering');
    this.groups = [...this.groups, group];
    this.notify();

    this.timers.schedule(() => {
      this.replace(group.id, (current) => ({ ...current, phase: 'present' }));
      this.guard = 'idle';
      this.notify();
    }, this.options.insertAnimationMs);

    return group;
  }

  /**
   * Start removing a group. The base group and groups already leaving
   * cannot be removed.
   * @returns Whether a removal was started
   */
  remove(id: number): boolean {
    const group = this.get(id);
    if (!group || group.phase === 'leaving' || id === BASE_GROUP_ID) {
      return false;
    }

    this.replace(id, (current) => ({ ...current, phase: 'leaving' }));
    this.notify();

    this.timers.schedule(() => {
      const removed = this.get(id);
      this.groups = this.groups.filter((current) => current.id !== id);
      if (removed) {
        this.options.onRemoved?.(removed);
      }
      this.notify();
    }, this.options.removeAnimationMs);

    return true;
  }

  setValue(id: number, kind: GroupFieldKind, value: string): void {
    if (!this.get(id)) {
      return;
    }
    this.replace(id, (current) =>
      kind === 'patrimonio' ? { ...current, asset: value } : { ...current, note: value }
    );
    this.notify();
  }

  getValue(id: number, kind: GroupFieldKind): string | undefined {
    const group = this.get(id);
    if (!group) return undefined;
    return kind === 'patrimonio' ? group.asset : group.note;
  }

  /** Drop every added group and empty the base one */
  reset(): void {
    this.timers.clear();
    this.groups = [createGroup(BASE_GROUP_ID, 'present')];
    this.guard = 'idle';
    this.notify();
  }

  /** Cancel pending animations; the add guard is re-armed */
  dispose(): void {
    this.timers.clear();
    this.guard = 'idle';
  }

  private replace(id: number, update: (group: FieldGroup) => FieldGroup): void {
    this.groups = this.groups.map((group) => (group.id === id ? update(group) : group));
  }
}
