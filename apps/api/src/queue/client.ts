import { EventEmitter } from "node:events";
import { Queue } from "bullmq";
import { Redis } from "ioredis";
import { log, type HostActions, type HostRequest } from "@script-scout/engine";

export const HOST_ACTIONS_QUEUE = "host-actions";
export const DISCOVERY_CHANNEL = "discoveries";

// ---------------------------------------------------------------------------
// Host action delivery: BullMQ queue consumed by the interception host, or an
// in-memory outbox the host polls over HTTP.
// ---------------------------------------------------------------------------

export type HostActionJob =
  | { target: "repeater"; request: HostRequest; label: string }
  | { target: "organizer"; request: HostRequest };

export type PendingHostAction = HostActionJob & { queuedAt: string };

export interface ClosableHostActions extends HostActions {
  close(): Promise<void>;
}

export interface PubSubClient {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, onMessage: (message: string) => void): Promise<() => Promise<void>>;
}

export function createNodeHostActions(redisUrl: string): ClosableHostActions {
  const redis = new Redis(redisUrl, { maxRetriesPerRequest: null });
  const queue = new Queue<HostActionJob>(HOST_ACTIONS_QUEUE, {
    connection: redis,
    defaultJobOptions: {
      removeOnComplete: 100,
      removeOnFail: 100,
      attempts: 1,
    },
  });

  return {
    async sendToRepeater(request, label) {
      await queue.add("repeater", { target: "repeater", request, label });
    },
    async sendToOrganizer(request) {
      await queue.add("organizer", { target: "organizer", request });
    },
    async close() {
      await queue.close();
      await redis.quit();
    },
  };
}

export class HostActionOutbox implements HostActions {
  private pending: PendingHostAction[] = [];

  async sendToRepeater(request: HostRequest, label: string): Promise<void> {
    this.pending.push({ target: "repeater", request, label, queuedAt: new Date().toISOString() });
  }

  async sendToOrganizer(request: HostRequest): Promise<void> {
    this.pending.push({ target: "organizer", request, queuedAt: new Date().toISOString() });
  }

  get size(): number {
    return this.pending.length;
  }

  /** Hand every pending action to the caller and forget them. */
  drain(): PendingHostAction[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }
}

// ---------------------------------------------------------------------------
// Refresh notifications for the live view
// ---------------------------------------------------------------------------

export function createNodePubSubClient(redisUrl: string): PubSubClient & { close(): Promise<void> } {
  const pubClient = new Redis(redisUrl);

  return {
    async publish(channel, message) {
      await pubClient.publish(channel, message);
    },
    async subscribe(channel, onMessage) {
      const subscriber = new Redis(redisUrl);
      await subscriber.subscribe(channel);
      subscriber.on("message", (ch: string, msg: string) => {
        if (ch === channel) onMessage(msg);
      });
      return async () => {
        await subscriber.unsubscribe(channel);
        await subscriber.quit();
      };
    },
    async close() {
      await pubClient.quit();
    },
  };
}

export function createLocalPubSubClient(): PubSubClient {
  const emitter = new EventEmitter();
  emitter.setMaxListeners(0);

  return {
    async publish(channel, message) {
      emitter.emit(channel, message);
    },
    async subscribe(channel, onMessage) {
      emitter.on(channel, onMessage);
      return async () => {
        emitter.off(channel, onMessage);
      };
    },
  };
}

/** Tell live views to re-read the snapshot. Delivery problems are logged, not raised. */
export async function publishRefresh(
  events: PubSubClient,
  reason: string,
  detail: Record<string, unknown> = {}
): Promise<void> {
  try {
    await events.publish(DISCOVERY_CHANNEL, JSON.stringify({ type: "refresh", reason, ...detail }));
  } catch (error) {
    log.warn(`Failed to publish refresh event: ${String(error)}`);
  }
}
