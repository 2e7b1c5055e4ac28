import { ChannelClosedError } from '../utils/errors.js';

interface Boxed<T> {
  value: T;
}

interface BlockedSender<T> {
  value: T;
  resolve: () => void;
}

interface WaitingReceiver<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Closeable FIFO channel between async producers and consumers.
 *
 * `send` waits while the buffer is at capacity. `receive` waits while the
 * buffer is empty and resolves `done` once the channel is closed and drained.
 * Any number of producers and consumers may share one channel.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Boxed<T>[] = [];
  private readonly blockedSenders: BlockedSender<T>[] = [];
  private readonly waitingReceivers: WaitingReceiver<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  constructor(readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`);
    }
  }

  async send(value: T): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError();
    }

    const receiver = this.waitingReceivers.shift();
    if (receiver) {
      receiver.resolve({ done: false, value });
      return;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return;
    }

    await new Promise<void>((resolve) => {
      this.blockedSenders.push({ value, resolve });
    });
  }

  /**
   * Closes the channel. Values already sent are still delivered.
   * With an error, receivers reject with it once the buffer is drained.
   */
  close(error?: unknown): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (error !== undefined) {
      this.failure = { error };
    }

    // receivers only wait on an empty buffer, so none of them can be owed a value
    for (const receiver of this.waitingReceivers.splice(0)) {
      if (this.failure) {
        receiver.reject(this.failure.error);
      } else {
        receiver.resolve({ done: true, value: undefined });
      }
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const item = this.takeBuffered();
    if (item) {
      return Promise.resolve<IteratorResult<T, undefined>>({ done: false, value: item.value });
    }

    if (this.closed) {
      if (this.failure) {
        return Promise.reject(this.failure.error);
      }
      return Promise.resolve<IteratorResult<T, undefined>>({ done: true, value: undefined });
    }

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      this.waitingReceivers.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive()
    };
  }

  private takeBuffered(): Boxed<T> | undefined {
    const item = this.buffer.shift();
    if (item) {
      const sender = this.blockedSenders.shift();
      if (sender) {
        this.buffer.push({ value: sender.value });
        sender.resolve();
      }
    }
    return item;
  }
}
