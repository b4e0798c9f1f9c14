/**
 * Unbuffered handoff channel.
 *
 * A value passes directly from the single writer to one waiting reader; the
 * writer's `send()` settles only when a reader has taken the value or the
 * writer's scope is cancelled. There is never more than one value in flight.
 * Readers are served FIFO. After `close()` every pending and future read
 * resolves `{ done: true }`.
 */

import type { CancellationScope } from "@metronome/core";

type ReadResult<T> = IteratorResult<T, undefined>;

interface Reader<T> {
  readonly deliver: (result: ReadResult<T>) => void;
}

interface Offer<T> {
  readonly value: T;
  readonly take: () => void;
  readonly drop: () => void;
}

export interface ReceiveOptions {
  /** Abandon the read; the returned promise rejects with `signal.reason`. */
  readonly signal?: AbortSignal;
}

/** Consumer view of a channel: reads only, no way to write or close it. */
export interface ReadChannel<T> extends AsyncIterable<T> {
  readonly closed: boolean;
  receive(options?: ReceiveOptions): Promise<ReadResult<T>>;
  [Symbol.asyncIterator](): AsyncIterator<T, undefined>;
}

export class HandoffChannel<T> implements ReadChannel<T> {
  private readonly _readers: Reader<T>[] = [];
  private _offer: Offer<T> | undefined;
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  /** Number of readers currently parked in `receive()`. */
  get waitingReaders(): number {
    return this._readers.length;
  }

  /**
   * Take the next value, waiting for the writer if necessary.
   */
  receive(options: ReceiveOptions = {}): Promise<ReadResult<T>> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const offer = this._offer;
    if (offer !== undefined) {
      this._offer = undefined;
      offer.take();
      return Promise.resolve<ReadResult<T>>({ done: false, value: offer.value });
    }
    if (this._closed) {
      return Promise.resolve<ReadResult<T>>({ done: true, value: undefined });
    }

    return new Promise<ReadResult<T>>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this._readers.indexOf(reader);
        if (index !== -1) this._readers.splice(index, 1);
        reject(signal?.reason);
      };
      const reader: Reader<T> = {
        deliver: (result) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(result);
        },
      };
      this._readers.push(reader);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Hand `value` to a reader.
   *
   * @returns true once a reader took the value; false if `scope` was
   *   cancelled first or the channel is closed
   */
  send(value: T, scope: CancellationScope): Promise<boolean> {
    if (this._closed || scope.isCancelled) {
      return Promise.resolve(false);
    }
    if (this._offer !== undefined) {
      return Promise.reject(new Error("HandoffChannel supports a single writer"));
    }

    const reader = this._readers.shift();
    if (reader !== undefined) {
      reader.deliver({ done: false, value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const offer: Offer<T> = {
        value,
        take: () => {
          unsubscribe();
          resolve(true);
        },
        drop: () => {
          unsubscribe();
          resolve(false);
        },
      };
      this._offer = offer;
      const unsubscribe = scope.onCancel(() => {
        if (this._offer === offer) this._offer = undefined;
        resolve(false);
      });
    });
  }

  /**
   * Close the channel. Idempotent. Parked readers are released with
   * `{ done: true }`; an untaken offer is dropped and its `send()` resolves false.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    const offer = this._offer;
    this._offer = undefined;
    offer?.drop();
    for (const reader of this._readers.splice(0)) {
      reader.deliver({ done: true, value: undefined });
    }
  }

  /** A read-only view backed by this channel, safe to hand to consumers. */
  readSide(): ReadChannel<T> {
    const isClosed = (): boolean => this._closed;
    return {
      get closed() {
        return isClosed();
      },
      receive: (options) => this.receive(options),
      [Symbol.asyncIterator]: () => this[Symbol.asyncIterator](),
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: () => Promise.resolve<ReadResult<T>>({ done: true, value: undefined }),
    };
  }
}
