export class DiscoveryTracker {
  private readonly announced = new Set<string>();

  /** True exactly once per serial; the serial is marked before returning. */
  shouldAnnounce(serial: string): boolean {
    if (this.announced.has(serial)) {
      return false;
    }
    this.announced.add(serial);
    return true;
  }

  has(serial: string): boolean {
    return this.announced.has(serial);
  }

  get size(): number {
    return this.announced.size;
  }
}
