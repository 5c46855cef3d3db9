/**
 * Outbound channel for game events. Session events are published on
 * `chat:<chatId>` so relays can render turns that resolve without a request
 * (timeouts in particular).
 */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
}
