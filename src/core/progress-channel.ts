/**
 * Progress Channel - finite, cancellable sequence of progress lines
 *
 * A producer pushes lines as they arrive; a single consumer pulls them with
 * `for await`. The sentinel line closes the channel and is never yielded.
 * Lines buffered before close() are still delivered.
 */

export interface ProgressChannelOptions {
  /** Line that terminates the stream */
  sentinel: string;
  /** Called once when the channel closes, e.g. to release the transport */
  onClose?: () => void;
}

export class ProgressChannel implements AsyncIterable<string> {
  private buffer: string[] = [];
  private waiting: ((result: IteratorResult<string>) => void) | null = null;
  private isClosed = false;

  constructor(private readonly options: ProgressChannelOptions) {}

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Deliver a line from the producer. The sentinel closes the channel.
   */
  push(line: string): void {
    if (this.isClosed) return;

    if (line.trim() === this.options.sentinel) {
      this.close();
      return;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: line, done: false });
      return;
    }
    this.buffer.push(line);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
    this.options.onClose?.();
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: (): Promise<IteratorResult<string>> => {
        const line = this.buffer.shift();
        if (line !== undefined) {
          return Promise.resolve({ value: line, done: false });
        }
        if (this.isClosed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: (): Promise<IteratorResult<string>> => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

/**
 * Opens a progress channel for one submission
 */
export interface ProgressSource {
  open(): ProgressChannel;
}
