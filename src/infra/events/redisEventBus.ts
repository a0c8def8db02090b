import type { RedisConnection } from '../redis.js';

/**
 * Transport contract for domain events: fire a message at a topic.
 */
export interface EventBus {
  publish(topic: string, message: string): Promise<void>;
  ping(): Promise<void>;
}

/**
 * Redis pub/sub as the event bus. Each topic is a channel; subscribers that
 * are not connected at publish time miss the event.
 */
export class RedisEventBus implements EventBus {
  constructor(private readonly client: RedisConnection) {}

  async publish(topic: string, message: string): Promise<void> {
    await this.client.publish(topic, message);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }
}
