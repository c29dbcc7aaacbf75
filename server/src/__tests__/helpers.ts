import type { Channel } from '../hub/channel.js';
import { ConnectionHub } from '../hub/connectionHub.js';
import type { HubOptions, SessionBinding } from '../hub/connectionHub.js';
import { decodeMessage } from '../ws/codec.js';
import type { Envelope } from '../ws/codec.js';
import type { MessageType } from '../ws/schemas.js';

export class FakeChannel implements Channel {
  readonly sent: string[] = [];
  open = true;
  failSends = false;
  closedWith: { code: number; reason: string } | null = null;

  constructor(readonly remoteAddress = '192.168.1.20') {}

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    if (this.failSends || !this.open) {
      throw new Error('CHANNEL_CLOSED');
    }
    this.sent.push(data);
  }

  close(code: number, reason: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  messages(): Envelope[] {
    return this.sent.map((raw) => decodeMessage(raw));
  }

  ofType(type: MessageType): Envelope[] {
    return this.messages().filter((message) => message.type === type);
  }
}

export const TEST_CODE = 'ABCD2345';
export const TEST_PASSWORD = 'test-secret';

export function makeHub(
  options: Partial<HubOptions> = {},
  binding: Partial<SessionBinding> = {},
): ConnectionHub {
  return new ConnectionHub(
    {
      code: binding.code ?? TEST_CODE,
      password: binding.password ?? TEST_PASSWORD,
      isActive: binding.isActive ?? (() => true),
    },
    { heartbeatMs: 1_000, connectionTimeoutMs: 3_000, maxParticipants: 10, ...options },
  );
}

export function joinAs(hub: ConnectionHub, displayName: string, channel = new FakeChannel()) {
  const participant = hub.authenticate({
    code: TEST_CODE,
    password: TEST_PASSWORD,
    displayName,
    remoteAddress: channel.remoteAddress,
    channel,
  });
  return { participant, channel };
}
