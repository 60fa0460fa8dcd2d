import { describe, expect, it } from 'vitest';
import { DeviceRegistry } from '../src/deviceRegistry.js';
import { DiscoveryTracker } from '../src/discoveryTracker.js';

describe('DeviceRegistry', () => {
  it('returns undefined for unknown addresses', () => {
    expect(new DeviceRegistry().lookup('AA:BB:CC:DD:EE:FF')).toBeUndefined();
  });

  it('keeps the last serial recorded for an address', () => {
    const registry = new DeviceRegistry();

    expect(registry.record('AA:BB:CC:DD:EE:FF', '111')).toBeUndefined();
    expect(registry.record('AA:BB:CC:DD:EE:FF', '222')).toBe('111');

    expect(registry.lookup('AA:BB:CC:DD:EE:FF')).toBe('222');
    expect(registry.size).toBe(1);
  });

  it('does not report a replacement when the serial repeats', () => {
    const registry = new DeviceRegistry();
    registry.record('AA:BB:CC:DD:EE:FF', '111');

    expect(registry.record('AA:BB:CC:DD:EE:FF', '111')).toBeUndefined();
  });
});

describe('DiscoveryTracker', () => {
  it('announces each serial exactly once', () => {
    const tracker = new DiscoveryTracker();
    const results = Array.from({ length: 5 }, () => tracker.shouldAnnounce('20479133'));

    expect(results).toEqual([true, false, false, false, false]);
    expect(tracker.has('20479133')).toBe(true);
  });

  it('tracks serials independently', () => {
    const tracker = new DiscoveryTracker();

    expect(tracker.shouldAnnounce('1')).toBe(true);
    expect(tracker.shouldAnnounce('2')).toBe(true);
    expect(tracker.shouldAnnounce('1')).toBe(false);
    expect(tracker.size).toBe(2);
  });
});
