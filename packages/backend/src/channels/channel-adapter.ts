/**
 * A messaging platform the assistant replies through. `deliver` is only ever
 * called for the winning turn of a client.
 */
export interface ChannelAdapter {
  readonly name: string;
  deliver(clientId: string, text: string): Promise<void>;
}
