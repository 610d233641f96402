import { EventEmitter } from "events";
import { BufferedSubscription, type CoordinationStore, type Subscription } from "./store";

interface Entry {
  value: string | string[];
  expiresAt: number | null;
}

/**
 * In-process CoordinationStore used when REDIS_URL is unset and in tests.
 * Only coordinates runs inside a single process.
 */
export default class MemoryCoordinationStore implements CoordinationStore {
  private readonly entries = new Map<string, Entry>();
  private readonly bus = new EventEmitter();

  constructor(private readonly now: () => number = Date.now) {
    this.bus.setMaxListeners(0);
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    return true;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry || Array.isArray(entry.value)) return null;
    return entry.value;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    return true;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async append(key: string, value: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      this.entries.set(key, { value: [value], expiresAt: null });
      return 1;
    }
    if (!Array.isArray(entry.value)) {
      throw new Error(`WRONGTYPE key ${key} does not hold a list`);
    }
    entry.value.push(value);
    return entry.value.length;
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    const entry = this.live(key);
    if (!entry || !Array.isArray(entry.value)) return [];
    const list = entry.value;
    const from = start < 0 ? Math.max(0, list.length + start) : start;
    const to = stop < 0 ? list.length + stop : Math.min(stop, list.length - 1);
    if (from > to) return [];
    return list.slice(from, to + 1);
  }

  async publish(channel: string, message: string): Promise<void> {
    this.bus.emit(channel, message);
  }

  async subscribe(channels: string[]): Promise<Subscription> {
    const listeners = channels.map((channel) => {
      const listener = (message: string) => sub.push(channel, message);
      this.bus.on(channel, listener);
      return { channel, listener };
    });
    const sub = new BufferedSubscription(async () => {
      for (const { channel, listener } of listeners) this.bus.off(channel, listener);
    });
    return sub;
  }

  /** Remaining TTL in seconds, -1 without expiry, -2 when absent (as Redis TTL). */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }
}
