/**
 * In-process event bus.
 *
 * Messages wait in a bounded queue and are delivered to subscribers
 * asynchronously, in publish order. A full queue rejects the publish;
 * a failing subscriber is logged and does not stop delivery to the others.
 */

import { v4 as uuid } from 'uuid';
import { errorMessage, statusError } from '../domain/errors';
import { EventHandler, EventMessage, EventPublisher } from '../domain/events';
import { Logger, logger as rootLogger } from '../logger';

interface EventSubscription {
  id: string;
  topic: string;
  handler: EventHandler;
}

export class InMemoryEventBus implements EventPublisher {
  private subscriptions: EventSubscription[] = [];
  private queue: EventMessage[] = [];
  private delivering = false;
  private idleWaiters: Array<() => void> = [];
  private readonly log: Logger;

  constructor(
    private readonly capacity: number,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'event-bus' });
  }

  /** Enqueue a message; throws ResourceExhausted when the queue is full. */
  async publish(topic: string, payload: unknown): Promise<void> {
    if (this.queue.length >= this.capacity) {
      throw statusError('ResourceExhausted', `event queue is full (${this.capacity} messages)`);
    }
    this.queue.push({
      id: `evt_${uuid()}`,
      topic,
      timestamp: new Date().toISOString(),
      payload: JSON.stringify(payload),
    });
    this.scheduleDelivery();
  }

  /** Subscribe to a topic; returns the unsubscribe function. */
  subscribe(topic: string, handler: EventHandler): () => void {
    const subscription: EventSubscription = { id: `sub_${uuid()}`, topic, handler };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Messages accepted but not yet delivered. */
  pending(): number {
    return this.queue.length;
  }

  /** Resolves once every queued message has been delivered. */
  drain(): Promise<void> {
    if (!this.delivering && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private scheduleDelivery(): void {
    if (this.delivering) return;
    this.delivering = true;
    setImmediate(() => {
      this.deliverAll().catch((err: unknown) => {
        this.log.error('Event delivery stopped', { error: errorMessage(err) });
      });
    });
  }

  private async deliverAll(): Promise<void> {
    try {
      let message = this.queue.shift();
      while (message) {
        await this.deliver(message);
        message = this.queue.shift();
      }
    } finally {
      this.delivering = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async deliver(message: EventMessage): Promise<void> {
    for (const sub of this.subscriptions) {
      if (sub.topic !== message.topic) continue;
      try {
        await sub.handler(message);
      } catch (err) {
        this.log.error('Event subscriber failed', {
          topic: message.topic,
          eventId: message.id,
          subscription: sub.id,
          error: errorMessage(err),
        });
      }
    }
  }
}
