/**
 * Run-wide record of URLs already claimed for a visit
 */
export class VisitedLedger {
  private readonly seen = new Set<string>();

  /** Claim a URL. Returns true exactly once per URL; check and mark happen in one synchronous step. */
  shouldVisit(url: string): boolean {
    if (this.seen.has(url)) return false;
    this.seen.add(url);
    return true;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  get size(): number {
    return this.seen.size;
  }
}
