/**
 * Outbound event channel. Channels are plain strings: `connection:<id>` addresses one
 * connection, `lobby` every connected client.
 */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
}
