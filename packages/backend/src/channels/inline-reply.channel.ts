import type { ChannelAdapter } from './channel-adapter';

/**
 * Holds the reply so the webhook handler can return it in its own response,
 * for platforms that show whatever the webhook answers with.
 */
export class InlineReplyChannel implements ChannelAdapter {
  readonly name = 'inline';
  private captured: string | null = null;

  async deliver(_clientId: string, text: string): Promise<void> {
    this.captured = text;
  }

  get reply(): string | null {
    return this.captured;
  }
}
