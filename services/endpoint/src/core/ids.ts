export type ForwardTag = 'call' | 'bcast' | 'probe';

/**
 * Issues the ids the broker puts on frames it sends to providers. One counter is
 * shared by every tag, so ids are unique across clients and request kinds.
 */
export class IdSequence {
  private counter = 0;

  next(tag: ForwardTag): string {
    this.counter += 1;
    return `${tag}-${this.counter}`;
  }
}
