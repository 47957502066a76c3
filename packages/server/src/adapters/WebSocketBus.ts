/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { WebSocket } from "ws";

import type { Logger } from "../core.js";
import type { SocketBus } from "../socketGateway.js";

/**
 * Channel fan-out over raw sockets. A socket may sit on several channels at once (its own
 * connection channel and the lobby); it leaves all of them when it closes.
 */
export class WebSocketBus implements SocketBus {
  #subscribers: Map<string, Set<WebSocket>> = new Map();
  #channelsOf: Map<WebSocket, Set<string>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: object): Promise<void> {
    const type = "type" in event ? event.type : undefined;
    const sockets = this.#subscribers.get(channel);
    if (!sockets) {
      this.#logger?.debug?.("Event has no subscribers", { channel, type });
      return;
    }

    const frame = JSON.stringify(event);
    let delivered = 0;
    for (const socket of sockets) {
      if (socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      try {
        socket.send(frame);
        delivered += 1;
      } catch (error) {
        this.#logger?.warn?.("Failed to deliver event", { channel, type, error });
      }
    }

    this.#logger?.debug?.("Event published", { channel, type, delivered });
  }

  attach(channel: string, socket: WebSocket): void {
    let channels = this.#channelsOf.get(socket);
    if (!channels) {
      channels = new Set<string>();
      this.#channelsOf.set(socket, channels);
      socket.on("close", () => {
        this.detachAll(socket);
      });
      socket.on("error", (error: Error) => {
        this.#logger?.warn?.("WebSocket client error", {
          channels: this.#channelsFor(socket),
          error,
        });
      });
    }
    channels.add(channel);

    let sockets = this.#subscribers.get(channel);
    if (!sockets) {
      sockets = new Set<WebSocket>();
      this.#subscribers.set(channel, sockets);
    }
    sockets.add(socket);
  }

  detach(channel: string, socket: WebSocket): void {
    const sockets = this.#subscribers.get(channel);
    if (!sockets?.delete(socket)) {
      return;
    }
    if (sockets.size === 0) {
      this.#subscribers.delete(channel);
    }
    this.#channelsOf.get(socket)?.delete(channel);
  }

  /** Removes a socket from every channel it is on. */
  detachAll(socket: WebSocket): void {
    for (const channel of this.#channelsFor(socket)) {
      this.detach(channel, socket);
    }
    this.#channelsOf.delete(socket);
  }

  subscribers(channel: string): number {
    return this.#subscribers.get(channel)?.size ?? 0;
  }

  #channelsFor(socket: WebSocket): string[] {
    return [...(this.#channelsOf.get(socket) ?? [])];
  }
}
