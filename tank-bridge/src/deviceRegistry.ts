/**
 * Hardware address → tank serial, populated from identity advertisements.
 * Entries live for the whole process; a later identity for the same address
 * replaces the earlier serial.
 */
export class DeviceRegistry {
  private readonly serials = new Map<string, string>();

  lookup(address: string): string | undefined {
    return this.serials.get(address);
  }

  /** Returns the serial that was replaced, if it differed. */
  record(address: string, serial: string): string | undefined {
    const previous = this.serials.get(address);
    this.serials.set(address, serial);
    return previous !== undefined && previous !== serial ? previous : undefined;
  }

  get size(): number {
    return this.serials.size;
  }
}
