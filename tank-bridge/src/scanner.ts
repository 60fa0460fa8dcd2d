import type { Peripheral } from '@abandonware/noble';
import type { Logger } from 'pino';
import type { AdvertisementRecord } from './types.js';

/** The part of noble the bridge drives; the real module satisfies it. */
export interface NobleScanner {
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  on(event: 'discover', listener: (peripheral: Peripheral) => void): unknown;
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

export interface AdvertisementSink {
  push(record: AdvertisementRecord): void;
}

export interface ScannerHandle {
  stop(): Promise<void>;
}

type PeripheralLike = Pick<Peripheral, 'address' | 'id' | 'rssi'> & {
  advertisement: Partial<Pick<Peripheral['advertisement'], 'localName' | 'manufacturerData'>>;
};

/**
 * noble hands over the raw manufacturer-specific AD structure: a two byte
 * little endian company identifier followed by the vendor payload.
 */
export const splitManufacturerData = (raw: Buffer | undefined): Map<number, Buffer> => {
  const result = new Map<number, Buffer>();
  if (!raw || raw.length < 2) {
    return result;
  }
  result.set(raw.readUInt16LE(0), raw.subarray(2));
  return result;
};

export const toAdvertisementRecord = (peripheral: PeripheralLike): AdvertisementRecord | null => {
  const address = (peripheral.address || peripheral.id || '').toUpperCase();
  if (!address) {
    return null;
  }

  const localName = peripheral.advertisement.localName;
  return {
    address,
    manufacturerData: splitManufacturerData(peripheral.advertisement.manufacturerData),
    localName: localName ? localName : undefined,
    rssi: peripheral.rssi
  };
};

export const startScanner = (noble: NobleScanner, sink: AdvertisementSink, logger: Logger): ScannerHandle => {
  let scanning = false;
  let stopped = false;

  const startScanning = async (): Promise<void> => {
    if (scanning || stopped) {
      return;
    }
    // marked before the await so a concurrent stop() still stops noble
    scanning = true;
    try {
      await noble.startScanningAsync([], true);
    } catch (error) {
      scanning = false;
      throw error;
    }
    logger.info('Listening for Otodata broadcasts');
  };

  noble.on('stateChange', (state: string) => {
    if (state === 'poweredOn') {
      startScanning().catch((error) => {
        logger.error({ err: error }, 'Failed to start BLE scanning');
      });
      return;
    }

    if (scanning) {
      scanning = false;
      logger.warn({ state }, 'Bluetooth adapter left poweredOn, scanning paused');
    } else {
      logger.info({ state }, 'Waiting for Bluetooth adapter');
    }
  });

  noble.on('discover', (peripheral: Peripheral) => {
    if (stopped) {
      return;
    }
    const record = toAdvertisementRecord(peripheral);
    if (record) {
      sink.push(record);
    }
  });

  return {
    stop: async () => {
      stopped = true;
      if (!scanning) {
        return;
      }
      scanning = false;
      await noble.stopScanningAsync();
    }
  };
};
