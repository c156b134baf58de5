/**
 * Server-sent progress stream
 * Adapts an EventSource on the progress endpoint to a ProgressChannel
 */

import { ProgressChannel, type ProgressSource } from '../core/progress-channel';
import { getLogger } from '../logging';

/**
 * The part of EventSource the adapter relies on
 */
export interface EventSourceLike {
  onmessage: ((event: MessageEvent<string>) => void) | null;
  onerror: ((event: Event) => void) | null;
  close(): void;
}

export interface EventSourceProgressOptions {
  /** Progress endpoint (default: "/progress") */
  url?: string;
  /** Line that terminates the stream (default: "DONE") */
  sentinel?: string;
  /** EventSource factory (default: the browser's EventSource) */
  createEventSource?: (url: string) => EventSourceLike;
}

function createBrowserEventSource(url: string): EventSourceLike {
  return new EventSource(url);
}

/**
 * Opens one EventSource per submission. The EventSource is closed when the
 * channel closes: on the sentinel, on a stream error, or by the consumer.
 */
export class EventSourceProgressSource implements ProgressSource {
  private readonly url: string;
  private readonly sentinel: string;
  private readonly createEventSource: (url: string) => EventSourceLike;

  constructor(options: EventSourceProgressOptions = {}) {
    this.url = options.url ?? '/progress';
    this.sentinel = options.sentinel ?? 'DONE';
    this.createEventSource = options.createEventSource ?? createBrowserEventSource;
  }

  open(): ProgressChannel {
    const source = this.createEventSource(this.url);
    const channel = new ProgressChannel({
      sentinel: this.sentinel,
      onClose: () => source.close(),
    });

    source.onmessage = (event) => {
      channel.push(event.data);
    };
    // EventSource reconnects on its own after an error; one submission
    // gets one stream, so stop here instead.
    source.onerror = () => {
      if (!channel.closed) {
        getLogger().warn({ logger: 'progress', url: this.url }, 'Progress stream failed');
        channel.close();
      }
    };

    return channel;
  }
}
