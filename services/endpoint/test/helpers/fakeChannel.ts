import type { PeerChannel } from '../../src/contracts/channel';

/** In-memory PeerChannel that records every frame it is asked to send. */
export class FakeChannel implements PeerChannel {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  failSends = false;

  async send(payload: string): Promise<void> {
    if (this.failSends) throw new Error('send failed');
    this.sent.push(payload);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  /** Parsed frames, oldest first. */
  frames(): Array<Record<string, unknown>> {
    return this.sent.map((payload): Record<string, unknown> => JSON.parse(payload));
  }

  last(): Record<string, unknown> | undefined {
    const frames = this.frames();
    return frames[frames.length - 1];
  }
}
