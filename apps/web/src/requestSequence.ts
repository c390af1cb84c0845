/**
 * Numbers overlapping requests so that only the latest one applies its result.
 */
export class RequestSequence {
  private latest = 0;

  /** Starts a request; earlier ones become stale. */
  next(): number {
    this.latest += 1;
    return this.latest;
  }

  isCurrent(id: number): boolean {
    return id === this.latest;
  }
}
