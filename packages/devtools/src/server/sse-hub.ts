/**
 * Server-sent events fan-out and the push-channel sink built on it.
 *
 * @module @shadowtree/devtools/server/sse
 */

import { Logger } from "@shadowtree/kernel";
import { HostDisconnectedError, SinkNotReadyError, type TimelineEventDto } from "@shadowtree/shared";
import type { LifecycleEvent, LifecycleEventSink } from "@shadowtree/core";

const log = Logger.for("SseHub");

/** The part of `ServerResponse` an SSE client needs. */
export interface SseStream {
  write(chunk: string): boolean;
  end(): void;
  readonly writableEnded: boolean;
}

export type SsePayload =
  | { type: "connected"; timestamp: number }
  | { type: "timeline"; event: TimelineEventDto }
  | { type: "lifecycle"; event: LifecycleEvent };

export function formatSse(payload: SsePayload): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export class SseHub {
  private readonly clients = new Set<SseStream>();

  get size(): number {
    return this.clients.size;
  }

  add(stream: SseStream): () => void {
    this.clients.add(stream);
    return () => {
      this.clients.delete(stream);
    };
  }

  /**
   * Write a payload to every open client. Returns how many took it; closed
   * streams are dropped.
   */
  broadcast(payload: SsePayload): number {
    const data = formatSse(payload);
    let delivered = 0;
    for (const client of this.clients) {
      if (client.writableEnded) {
        this.clients.delete(client);
        continue;
      }
      try {
        client.write(data);
        delivered++;
      } catch (error) {
        log.debug({ err: error }, "SSE write failed, dropping client");
        this.clients.delete(client);
      }
    }
    return delivered;
  }

  /** Write a comment line that keeps idle connections open. */
  heartbeat(): void {
    for (const client of this.clients) {
      if (!client.writableEnded) client.write(":heartbeat\n\n");
    }
  }

  closeAll(): void {
    for (const client of this.clients) {
      client.end();
    }
    this.clients.clear();
  }
}

/**
 * Sink for a {@link LifecycleEventChannel} that pushes over the hub. With no
 * client connected the sink is not ready; when every client has gone away
 * mid-delivery the inspector is disconnected.
 */
export function createHubSink(hub: SseHub): LifecycleEventSink {
  return {
    send(event) {
      if (hub.size === 0) {
        throw new SinkNotReadyError("No inspector connected");
      }
      if (hub.broadcast({ type: "lifecycle", event }) === 0) {
        throw new HostDisconnectedError();
      }
    },
  };
}
