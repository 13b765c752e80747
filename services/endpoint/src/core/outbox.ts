import type { FastifyBaseLogger } from 'fastify';

/**
 * Holds deliveries started outside a request handler (timer expiry, disconnect
 * cascades) until they settle. Failures are logged, and `drain()` waits for
 * everything still in flight.
 */
export class Outbox {
  private readonly inflight = new Set<Promise<void>>();

  constructor(private readonly logger: FastifyBaseLogger) {}

  track(task: Promise<unknown>, context: string): void {
    const settled = task.then(
      () => undefined,
      (err: unknown) => {
        this.logger.error({ err }, context);
      },
    );
    this.inflight.add(settled);
    void settled.then(() => {
      this.inflight.delete(settled);
    });
  }

  get size(): number {
    return this.inflight.size;
  }

  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }
}
