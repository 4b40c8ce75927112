/**
 * Unbounded single-consumer channel. The sending side learns that the
 * receiver is gone from `send` returning false.
 */

export interface Sender<T> {
  /** Queue a value. Returns false once the receiver has been closed. */
  send(value: T): boolean;
  readonly closed: boolean;
}

export interface Receiver<T> extends AsyncIterable<T> {
  /** Stop receiving. Queued values are discarded. */
  close(): void;
  readonly closed: boolean;
}

interface Slot<T> {
  readonly value: T;
}

class Channel<T> implements Sender<T>, Receiver<T> {
  private readonly queue: Slot<T>[] = [];
  private wake: (() => void) | undefined;
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  send(value: T): boolean {
    if (this.isClosed) return false;
    this.queue.push({ value });
    this.notify();
    return true;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.queue.length = 0;
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    try {
      while (!this.isClosed) {
        const next = this.queue.shift();
        if (next) {
          yield next.value;
          continue;
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      this.close();
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}

export function createChannel<T>(): { sender: Sender<T>; receiver: Receiver<T> } {
  const channel = new Channel<T>();
  return { sender: channel, receiver: channel };
}
