/**
 * Message Queue
 *
 * Single-producer/single-consumer FIFO mailbox between the relay loop and
 * the dispatcher. Offers a non-blocking try-receive, a receive with timeout,
 * and a wakeup-on-arrival wait so consumers do not have to spin.
 */

import { EventEmitter } from 'events';

// ============================================================================
// Types
// ============================================================================

/**
 * What happens when a bounded queue is full
 * - reject: the new item is refused and send() returns false
 * - drop-oldest: the oldest queued item is evicted to make room
 */
export type OverflowPolicy = 'reject' | 'drop-oldest';

export interface MessageQueueOptions {
  /** Maximum queued items (0 = unbounded) */
  capacity?: number;
  overflow?: OverflowPolicy;
  /** Name used in events and stats */
  name?: string;
}

export interface SendOptions {
  /** Enqueue past the capacity bound; used for the shutdown signal */
  force?: boolean;
}

export interface MessageQueueStats {
  name: string;
  size: number;
  capacity: number;
  sent: number;
  received: number;
  dropped: number;
  closed: boolean;
}

export interface MessageQueueEvents<T> {
  'full': (item: T) => void;
  'dropped': (item: T) => void;
  'closed': () => void;
}

const DEFAULT_OPTIONS: Required<MessageQueueOptions> = {
  capacity: 1000,
  overflow: 'reject',
  name: 'queue',
};

type Waiter = () => void;

// ============================================================================
// Message Queue
// ============================================================================

export class MessageQueue<T> extends EventEmitter {
  private items: T[] = [];
  private waiters: Set<Waiter> = new Set();
  private closed = false;
  private readonly options: Required<MessageQueueOptions>;
  private sentCount = 0;
  private receivedCount = 0;
  private droppedCount = 0;

  constructor(options: MessageQueueOptions = {}) {
    super();
    this.options = {
      capacity: options.capacity ?? DEFAULT_OPTIONS.capacity,
      overflow: options.overflow ?? DEFAULT_OPTIONS.overflow,
      name: options.name ?? DEFAULT_OPTIONS.name,
    };
  }

  get size(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue an item. Returns false if the queue is closed or refused the item.
   */
  send(item: T, options: SendOptions = {}): boolean {
    if (this.closed) {
      return false;
    }

    const { capacity, overflow } = this.options;
    if (!options.force && capacity > 0 && this.items.length >= capacity) {
      if (overflow === 'reject') {
        this.droppedCount++;
        this.emit('full', item);
        return false;
      }
      const evicted = this.items.shift();
      if (evicted !== undefined) {
        this.droppedCount++;
        this.emit('dropped', evicted);
      }
    }

    this.items.push(item);
    this.sentCount++;
    this.wake();
    return true;
  }

  /**
   * Dequeue the oldest item without waiting
   */
  tryReceive(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    this.receivedCount++;
    return this.items.shift();
  }

  /**
   * Dequeue the oldest item, waiting up to timeoutMs for one to arrive.
   * Resolves undefined on timeout, abort, or once the queue is closed and empty.
   */
  async receive(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    const item = this.tryReceive();
    if (item !== undefined) {
      return item;
    }
    await this.waitForMessage(timeoutMs, signal);
    return this.tryReceive();
  }

  /**
   * Wait until an item is queued, the queue closes, the timeout elapses or
   * the signal aborts. Resolves true when an item is available.
   */
  waitForMessage(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.items.length > 0) {
      return Promise.resolve(true);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.waiters.delete(finish);
        signal?.removeEventListener('abort', finish);
        resolve(this.items.length > 0);
      };
      const timer = setTimeout(finish, timeoutMs);
      this.waiters.add(finish);
      signal?.addEventListener('abort', finish, { once: true });
    });
  }

  /**
   * Close the queue. Queued items can still be drained; new sends are ignored.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
    this.emit('closed');
  }

  /**
   * Remove and return every queued item
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    this.receivedCount += drained.length;
    return drained;
  }

  getStats(): MessageQueueStats {
    return {
      name: this.options.name,
      size: this.items.length,
      capacity: this.options.capacity,
      sent: this.sentCount,
      received: this.receivedCount,
      dropped: this.droppedCount,
      closed: this.closed,
    };
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }

  // ============================================================================
  // Type Declarations for EventEmitter
  // ============================================================================

  on<K extends keyof MessageQueueEvents<T>>(event: K, listener: MessageQueueEvents<T>[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof MessageQueueEvents<T>>(event: K, ...args: Parameters<MessageQueueEvents<T>[K]>): boolean {
    return super.emit(event, ...args);
  }
}

// ============================================================================
// Channel Pair
// ============================================================================

export interface ChannelPairOptions {
  capacity?: number;
  overflow?: OverflowPolicy;
}

export interface ChannelPair<In, Out> {
  /** Gateway -> plugin direction */
  inbound: MessageQueue<In>;
  /** Plugin -> gateway direction */
  outbound: MessageQueue<Out>;
}

/**
 * Create the two independent queues connecting the relay loop and the dispatcher
 */
export function createChannelPair<In, Out>(options: ChannelPairOptions = {}): ChannelPair<In, Out> {
  return {
    inbound: new MessageQueue<In>({ ...options, name: 'inbound' }),
    outbound: new MessageQueue<Out>({ ...options, name: 'outbound' }),
  };
}
