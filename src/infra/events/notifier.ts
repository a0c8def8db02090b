/**
 * Domain Event Notifier
 * =====================
 * Best-effort publication of domain events (e.g. `user.registered`).
 *
 * - `dispatch` starts an independent unit of work and returns at once. It is
 *   not tied to the request that spawned it; failures are logged and counted.
 * - A bus that is missing or unhealthy at start-up disables the notifier for
 *   the life of the process. There is no reconnection loop.
 */

import { Deadline, withDeadline } from '../../application/deadline.js';
import { PublishFailure } from '../../application/errors.js';
import type { EventNotifier, EventPayload, Metrics } from '../../application/ports.js';
import { errorMessage, type Logger } from '../logger.js';
import { noopMetrics } from '../metrics.js';
import type { EventBus } from './redisEventBus.js';

export class Notifier implements EventNotifier {
  private disabledNoticeLogged = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly bus: EventBus | null,
    private readonly logger: Logger,
    private readonly metrics: Metrics = noopMetrics
  ) {}

  get enabled(): boolean {
    return this.bus !== null;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Publish and wait. Rejects with PublishFailure when the bus rejects;
   * resolves without doing anything when the notifier is disabled.
   */
  async publish(topic: string, payload: EventPayload): Promise<void> {
    if (!this.bus) {
      if (!this.disabledNoticeLogged) {
        this.disabledNoticeLogged = true;
        this.logger.warn('Event bus disabled, domain events are dropped', { topic });
      }
      return;
    }

    try {
      await this.bus.publish(topic, JSON.stringify(payload));
    } catch (error) {
      throw new PublishFailure(topic, error);
    }
    this.metrics.increment('events_published_total', { topic });
  }

  dispatch(topic: string, payload: EventPayload): void {
    const task = this.publish(topic, payload)
      .catch((error: unknown) => {
        this.metrics.increment('events_failed_total', { topic });
        this.logger.error('Failed to publish domain event', {
          topic,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /**
   * Wait for dispatched events to settle. Used on shutdown.
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }
}

export interface NotifierOptions {
  bus: EventBus | null;
  probeTimeoutMs: number;
  logger: Logger;
  metrics?: Metrics;
}

/**
 * Probe the bus once, bounded by `probeTimeoutMs`, and build the notifier.
 */
export async function createNotifier(options: NotifierOptions): Promise<Notifier> {
  const { bus, logger, metrics } = options;
  if (!bus) {
    logger.warn('Event bus not configured, notifier disabled');
    return new Notifier(null, logger, metrics);
  }

  try {
    await withDeadline(bus.ping(), Deadline.after(options.probeTimeoutMs), 'event bus ping');
  } catch (error) {
    logger.warn('Event bus unavailable, notifier disabled', { error: errorMessage(error) });
    return new Notifier(null, logger, metrics);
  }

  return new Notifier(bus, logger, metrics);
}
