import type {
  Channel,
  ChannelMessage,
  ChannelProvider,
  ProviderResult,
} from '../ports/channel-provider.port';

type Responder = (
  message: ChannelMessage,
  signal?: AbortSignal,
) => Promise<ProviderResult>;

/**
 * Scriptable provider that records every call.
 * Answers SUCCESS unless told otherwise.
 */
export class FakeChannelProvider implements ChannelProvider {
  readonly sent: ChannelMessage[] = [];
  private responder: Responder;

  constructor(readonly channel: Channel) {
    this.responder = async () => ({
      kind: 'SUCCESS',
      providerMessageId: `fake-${this.sent.length}`,
      responseCode: '250',
    });
  }

  get callCount(): number {
    return this.sent.length;
  }

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  alwaysReturn(result: ProviderResult): void {
    this.responder = async () => result;
  }

  async send(
    message: ChannelMessage,
    signal?: AbortSignal,
  ): Promise<ProviderResult> {
    this.sent.push(message);
    return this.responder(message, signal);
  }
}
