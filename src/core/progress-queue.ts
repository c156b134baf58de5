/**
 * Progress Message Queue - paced display of progress lines
 *
 * Lines are buffered in arrival order and shown one at a time through an
 * enter / hold / exit cycle. A message only starts entering after the
 * previous one has fully exited.
 */

import { Observable, TimerSet } from './observable';
import { getLogger } from '../logging';

export type ProgressPhase = 'idle' | 'entering' | 'holding' | 'exiting';

export interface ProgressDisplay {
  /** Message on screen, or null before the first one */
  text: string | null;
  phase: ProgressPhase;
}

export interface ProgressQueueOptions {
  enterMs: number;
  /** Minimum time a message stays fully visible */
  holdMs: number;
  exitMs: number;
}

export class ProgressMessageQueue extends Observable {
  private buffer: string[] = [];
  private transitioning = false;
  private currentDisplay: ProgressDisplay = { text: null, phase: 'idle' };
  private shown: string[] = [];
  private readonly timers = new TimerSet();

  constructor(private readonly options: ProgressQueueOptions) {
    super();
  }

  get display(): ProgressDisplay {
    return this.currentDisplay;
  }

  /** Messages that have started displaying, in order */
  get history(): readonly string[] {
    return this.shown;
  }

  /** Messages waiting for their turn */
  get pending(): number {
    return this.buffer.length;
  }

  enqueue(message: string): void {
    this.buffer.push(message);
    if (!this.transitioning) {
      this.showNext();
    }
  }

  /**
   * Feed every line of a source into the queue until the source ends
   */
  async drain(source: AsyncIterable<string>): Promise<void> {
    for await (const line of source) {
      this.enqueue(line);
    }
    getLogger().debug({ logger: 'progress-queue' }, 'Progress stream closed');
  }

  /** Forget displayed history and hide the current message */
  reset(): void {
    this.timers.clear();
    this.buffer = [];
    this.shown = [];
    this.transitioning = false;
    this.setDisplay({ text: null, phase: 'idle' });
  }

  dispose(): void {
    this.timers.clear();
    this.buffer = [];
    this.transitioning = false;
  }

  private showNext(): void {
    const next = this.buffer.shift();
    if (next === undefined) {
      this.transitioning = false;
      this.setDisplay({ text: this.currentDisplay.text, phase: 'idle' });
      return;
    }

    this.transitioning = true;
    this.shown = [...this.shown, next];
    this.setDisplay({ text: next, phase: 'entering' });

    this.timers.schedule(() => {
      this.setDisplay({ text: next, phase: 'holding' });
      this.timers.schedule(() => {
        this.setDisplay({ text: next, phase: 'exiting' });
        this.timers.schedule(() => this.showNext(), this.options.exitMs);
      }, this.options.holdMs);
    }, this.options.enterMs);
  }

  private setDisplay(display: ProgressDisplay): void {
    this.currentDisplay = display;
    this.notify();
  }
}
