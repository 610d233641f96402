export interface ChannelMessage {
  channel: string;
  message: string;
}

export interface Subscription {
  /** Next message on any subscribed channel, or null after `timeoutMs` or once closed. */
  next(timeoutMs: number): Promise<ChannelMessage | null>;
  close(): Promise<void>;
}

/**
 * Shared key-value service with TTLs, append-only lists and pub/sub.
 * Pub/sub is a wake-up signal only: delivery may repeat, reorder or drop.
 */
export interface CoordinationStore {
  /** Sets the key only if it is absent; true when this call created it. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  /** false when the key does not exist. */
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  /** Appends to a list; resolves to the new length. */
  append(key: string, value: string): Promise<number>;
  /** Inclusive range; negative indexes count from the end. */
  range(key: string, start: number, stop: number): Promise<string[]>;
  publish(channel: string, message: string): Promise<void>;
  subscribe(channels: string[]): Promise<Subscription>;
}

type Waiter = (msg: ChannelMessage | null) => void;

/**
 * Queue behind a subscription: pushes from the transport are buffered until
 * a reader asks for them.
 */
export class BufferedSubscription implements Subscription {
  private readonly queue: ChannelMessage[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  constructor(private readonly onClose: () => Promise<void>) {}

  push(channel: string, message: string): void {
    if (this.closed) return;
    const msg = { channel, message };
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(msg);
      return;
    }
    this.queue.push(msg);
  }

  next(timeoutMs: number): Promise<ChannelMessage | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error("subscription already has a pending reader"));

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (msg) => {
        clearTimeout(timer);
        resolve(msg);
      };
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
    await this.onClose();
  }
}
