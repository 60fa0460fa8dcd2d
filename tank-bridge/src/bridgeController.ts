import type { Logger } from 'pino';
import { decodeAdvertisement } from './decoders/otodataDecoder.js';
import { buildDiscoveryPublications, buildStatePublication } from './discovery.js';
import { DeviceRegistry } from './deviceRegistry.js';
import { DiscoveryTracker } from './discoveryTracker.js';
import type { AdvertisementRecord, BusPublisher, Identity, Publication, Reading } from './types.js';

export interface BridgeControllerOptions {
  availabilityTopic: string;
  discoveryPrefix: string;
  modelPrefix: string;
  logger: Logger;
}

export const ONLINE_PAYLOAD = 'online';

/**
 * Correlates identity and level advertisements per hardware address and
 * republishes them. Registry and discovery state belong to this instance;
 * `run` is the only consumer, so every mutation happens on one loop.
 */
export class BridgeController {
  private readonly registry = new DeviceRegistry();
  private readonly discovery = new DiscoveryTracker();
  private readonly logger: Logger;

  constructor(
    private readonly bus: BusPublisher,
    private readonly options: BridgeControllerOptions
  ) {
    this.logger = options.logger;
  }

  announceOnline(): void {
    this.logger.info({ topic: this.options.availabilityTopic }, 'Publishing bridge availability');
    this.bus.publish(this.options.availabilityTopic, ONLINE_PAYLOAD, { retain: true });
  }

  async run(source: AsyncIterable<AdvertisementRecord>): Promise<void> {
    for await (const record of source) {
      try {
        this.handleAdvertisement(record);
      } catch (error) {
        this.logger.error({ err: error, address: record.address }, 'Unhandled error processing advertisement');
      }
    }
    this.logger.info('Advertisement stream closed');
  }

  handleAdvertisement(record: AdvertisementRecord): void {
    const events = decodeAdvertisement(record, { modelPrefix: this.options.modelPrefix });

    for (const event of events) {
      switch (event.type) {
        case 'identity':
          this.handleIdentity(event);
          break;
        case 'reading':
          this.handleReading(event);
          break;
        case 'error':
          this.logger.warn(
            { address: event.address, localName: event.localName, reason: event.reason },
            'Dropping malformed Otodata advertisement'
          );
          break;
      }
    }
  }

  lookupSerial(address: string): string | undefined {
    return this.registry.lookup(address);
  }

  isAnnounced(serial: string): boolean {
    return this.discovery.has(serial);
  }

  private handleIdentity(identity: Identity): void {
    const replaced = this.registry.record(identity.address, identity.serial);
    if (replaced !== undefined) {
      this.logger.warn(
        { address: identity.address, previous: replaced, serial: identity.serial, framing: identity.framing },
        'Address reported a different serial'
      );
    }

    if (!this.discovery.shouldAnnounce(identity.serial)) {
      return;
    }

    const publications = buildDiscoveryPublications(identity.serial, {
      availabilityTopic: this.options.availabilityTopic,
      discoveryPrefix: this.options.discoveryPrefix
    });
    publications.forEach((publication) => this.publish(publication));
    this.logger.info(
      { serial: identity.serial, address: identity.address, availabilityTopic: this.options.availabilityTopic },
      'Discovered tank'
    );
  }

  private handleReading(reading: Reading): void {
    const serial = this.registry.lookup(reading.address);
    if (serial === undefined) {
      this.logger.debug({ address: reading.address }, 'Ignoring level from unidentified address');
      return;
    }

    this.publish(
      buildStatePublication(serial, { level: reading.level, rssi: reading.rssi, mac: reading.address })
    );
    this.logger.info({ serial, level: reading.level, rssi: reading.rssi }, 'Published tank level');
  }

  private publish(publication: Publication): void {
    this.bus.publish(publication.topic, publication.payload, { retain: publication.retain });
  }
}
