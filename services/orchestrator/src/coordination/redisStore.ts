import { createClient } from "redis";
import { BufferedSubscription, type CoordinationStore, type Subscription } from "./store";
import { moduleLogger } from "../observability/logger";

type RedisClient = ReturnType<typeof createClient>;

const log = moduleLogger("redis-store");

/**
 * Redis-backed CoordinationStore using node-redis v4.
 * Lazy-connects on first use; each subscription gets its own duplicated connection.
 */
export default class RedisCoordinationStore implements CoordinationStore {
  private client: RedisClient | null = null;
  private connecting: Promise<RedisClient> | null = null;

  constructor(private readonly url: string = process.env.REDIS_URL ?? "") {}

  private async clientReady(): Promise<RedisClient> {
    if (this.client && this.client.isOpen) return this.client;
    if (!this.connecting) {
      const client = createClient({ url: this.url });
      client.on("error", (err: unknown) => {
        log.error({ err }, "redis client error");
      });
      this.connecting = client
        .connect()
        .then(() => {
          this.client = client;
          return client;
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const client = await this.clientReady();
    const reply = await client.set(key, value, { NX: true, EX: ttlSeconds });
    return reply === "OK";
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = await this.clientReady();
    await client.set(key, value, { EX: ttlSeconds });
  }

  async get(key: string): Promise<string | null> {
    const client = await this.clientReady();
    return client.get(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const client = await this.clientReady();
    return client.expire(key, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    const client = await this.clientReady();
    await client.del(key);
  }

  async append(key: string, value: string): Promise<number> {
    const client = await this.clientReady();
    return client.rPush(key, value);
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    const client = await this.clientReady();
    return client.lRange(key, start, stop);
  }

  async publish(channel: string, message: string): Promise<void> {
    const client = await this.clientReady();
    await client.publish(channel, message);
  }

  async subscribe(channels: string[]): Promise<Subscription> {
    const client = await this.clientReady();
    const subscriber = client.duplicate();
    subscriber.on("error", (err: unknown) => {
      log.error({ err }, "redis subscriber error");
    });
    await subscriber.connect();

    const sub = new BufferedSubscription(async () => {
      await subscriber.unsubscribe();
      await subscriber.quit();
    });
    await subscriber.subscribe(channels, (message: string, channel: string) => sub.push(channel, message));
    return sub;
  }

  async close(): Promise<void> {
    if (this.client?.isOpen) await this.client.quit();
    this.client = null;
  }
}
