/**
 * Observable - minimal change notification shared by the form components.
 */

export type Listener = () => void;

export class Observable {
  private listeners = new Set<Listener>();

  /**
   * Register a change listener
   * @returns Function that removes the listener
   */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

/**
 * Tracks pending timeouts so an owner can cancel them all on dispose.
 */
export class TimerSet {
  private handles = new Set<ReturnType<typeof setTimeout>>();

  schedule(callback: () => void, delayMs: number): void {
    const handle = setTimeout(() => {
      this.handles.delete(handle);
      callback();
    }, delayMs);
    this.handles.add(handle);
  }

  clear(): void {
    for (const handle of this.handles) {
      clearTimeout(handle);
    }
    this.handles.clear();
  }

  get size(): number {
    return this.handles.size;
  }
}
