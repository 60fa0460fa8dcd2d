import { logger } from '../src/logger.js';
import type { AdvertisementRecord, BusPublisher, Publication, PublishOptions } from '../src/types.js';

export const silentLogger = () => logger.child({}, { level: 'silent' });

export class RecordingBus implements BusPublisher {
  public readonly publications: Publication[] = [];

  publish(topic: string, payload: string, options: PublishOptions): void {
    this.publications.push({ topic, payload, retain: options.retain });
  }

  topics(): string[] {
    return this.publications.map((publication) => publication.topic);
  }
}

export const statusPayload = (serial: number): Buffer => {
  const payload = Buffer.alloc(16);
  payload.write('OTOSTAT', 0, 'ascii');
  payload.writeUInt32LE(serial, 7);
  return payload;
};

export const identityAdvertisement = (
  address: string,
  serial: number,
  rssi = -68
): AdvertisementRecord => ({
  address,
  manufacturerData: new Map([[945, statusPayload(serial)]]),
  rssi
});

/** A vendor payload that carries no status frame, as sent alongside the model name. */
export const VENDOR_BEACON = Buffer.from([0x01, 0x02, 0x03]);

export const levelAdvertisement = (
  address: string,
  localName: string,
  rssi = -70,
  vendorPayload?: Buffer
): AdvertisementRecord => {
  const manufacturerData = new Map<number, Buffer>();
  if (vendorPayload) {
    manufacturerData.set(945, vendorPayload);
  }
  return { address, manufacturerData, localName, rssi };
};
