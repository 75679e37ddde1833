/**
 * Bounded FIFO channel: the direct delivery path into an agent.
 *
 * `offer` never blocks; it reports `false` when the channel is full so the
 * bus can fall back to the indirect path. `receive` waits until an item is
 * available or the abort signal fires.
 */
import { MeshError } from '@/core/errors.js';

export class ReceiveAbortedError extends MeshError {
  constructor() {
    super({ message: 'Channel receive aborted', code: 'RECEIVE_ABORTED' });
    this.name = 'ReceiveAbortedError';
  }
}

export interface BoundedChannel<T> {
  readonly capacity: number;
  size(): number;
  isFull(): boolean;
  /** Enqueue without waiting. `false` when the channel is full. */
  offer(item: T): boolean;
  /** Resolve with the next item, or reject with ReceiveAbortedError on abort. */
  receive(signal?: AbortSignal): Promise<T>;
}

interface Waiter<T> {
  resolve: (item: T) => void;
}

export function createBoundedChannel<T>(capacity: number): BoundedChannel<T> {
  const items: T[] = [];
  const waiters: Waiter<T>[] = [];

  return {
    capacity,

    size: () => items.length,

    isFull: () => items.length >= capacity,

    offer(item) {
      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve(item);
        return true;
      }
      if (items.length >= capacity) return false;
      items.push(item);
      return true;
    },

    receive(signal) {
      if (items.length > 0) {
        const next = items.shift();
        if (next !== undefined) return Promise.resolve(next);
      }
      if (signal?.aborted) return Promise.reject(new ReceiveAbortedError());

      return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => {
          const index = waiters.indexOf(waiter);
          if (index !== -1) waiters.splice(index, 1);
          reject(new ReceiveAbortedError());
        };
        const waiter: Waiter<T> = {
          resolve: (item) => {
            signal?.removeEventListener('abort', onAbort);
            resolve(item);
          },
        };
        waiters.push(waiter);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}
