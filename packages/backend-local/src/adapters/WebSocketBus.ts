/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { chatChannel, type ChatId, type Logger, type MessageBus } from "../core.js";

/** The part of a `ws` socket the bus relies on. */
export interface ChatSocket {
  send(data: string): void;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

/**
 * Fans chat events out to the relays subscribed to each `chat:<chatId>` channel. Events published on
 * a channel nobody listens to are dropped.
 */
export class WebSocketBus implements MessageBus {
  #clients: Map<string, Set<ChatSocket>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: object): Promise<void> {
    const connections = this.#clients.get(channel);

    if (connections) {
      const message = JSON.stringify({ channel, ...event });
      for (const socket of connections) {
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn?.("Failed to deliver event", {
            channel,
            error,
          });
        }
      }
    }

    this.#logger?.debug?.("Event published", {
      channel,
      subscribers: connections?.size ?? 0,
      event,
    });
  }

  subscriberCount(chatId: ChatId): number {
    return this.#clients.get(chatChannel(chatId))?.size ?? 0;
  }

  attach(chatId: ChatId, socket: ChatSocket): void {
    const channel = chatChannel(chatId);
    let connections = this.#clients.get(channel);
    if (!connections) {
      connections = new Set<ChatSocket>();
      this.#clients.set(channel, connections);
    }
    connections.add(socket);

    this.#logger?.info?.("Relay attached", {
      channel,
      size: connections.size,
    });

    socket.on("close", () => {
      const currentConnections = this.#clients.get(channel);
      if (!currentConnections) {
        return;
      }
      currentConnections.delete(socket);
      if (currentConnections.size === 0) {
        this.#clients.delete(channel);
      }
      this.#logger?.info?.("Relay disconnected", {
        channel,
        size: currentConnections.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("Relay socket error", { channel, error });
    });
  }
}
