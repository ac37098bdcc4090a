import type { z } from "zod";

export type EventHandler<T> = (event: T) => Promise<void>;

export interface DeliveryFailure {
  subscription: string;
  error: unknown;
}

export interface PublishResult {
  delivered: string[];
  failed: DeliveryFailure[];
}

/** What the outbox relay needs from a topic: a name and an untyped publish. */
export interface PublishTarget {
  readonly name: string;
  publishRaw(payload: unknown): Promise<PublishResult>;
}

/**
 * In-process pub/sub topic with named subscriptions.
 *
 * A publish hands the event to every subscription and reports which ones
 * failed. It does not retry; redelivery belongs to whoever called publish
 * (the outbox relay). Handlers must tolerate duplicates.
 */
export class Topic<T> implements PublishTarget {
  readonly name: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly subscriptions = new Map<string, EventHandler<T>>();

  constructor(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    this.name = name;
    this.schema = schema;
  }

  subscribe(subscription: string, handler: EventHandler<T>): void {
    if (this.subscriptions.has(subscription)) {
      throw new Error(`[events] Subscription "${subscription}" already registered on ${this.name}`);
    }
    this.subscriptions.set(subscription, handler);
    console.log(`[events] ${subscription} subscribed to ${this.name}`);
  }

  get subscriptionNames(): string[] {
    return [...this.subscriptions.keys()];
  }

  async publish(event: T): Promise<PublishResult> {
    const entries = [...this.subscriptions.entries()];
    const outcomes = await Promise.allSettled(entries.map(([, handler]) => handler(event)));

    const result: PublishResult = { delivered: [], failed: [] };
    outcomes.forEach((outcome, i) => {
      const [subscription] = entries[i];
      if (outcome.status === "fulfilled") {
        result.delivered.push(subscription);
      } else {
        console.error(`[events] ${subscription} failed to handle ${this.name}:`, outcome.reason);
        result.failed.push({ subscription, error: outcome.reason });
      }
    });
    return result;
  }

  /** Validates a stored payload against the topic schema, then publishes it. */
  async publishRaw(payload: unknown): Promise<PublishResult> {
    const event = this.schema.parse(payload);
    return this.publish(event);
  }
}
