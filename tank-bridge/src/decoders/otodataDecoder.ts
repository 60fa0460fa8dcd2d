import type { AdvertisementRecord, DecodedEvent, Identity, ReadingOutcome } from '../types.js';
import { readUInt32LE, startsWithAscii } from './utils.js';

/** Bluetooth SIG company identifier assigned to Otodata (0x03B1). */
export const OTODATA_MANUFACTURER_ID = 945;
export const OTODATA_STATUS_TAG = 'OTO';
export const SERIAL_OFFSET = 7;
export const DEFAULT_MODEL_PREFIX = 'TM6030';

const LEVEL_TOKEN = 'level:';
const LEVEL_VALUE = /^level:\s*(\d+(?:\.\d*)?|\.\d+)/;

export interface DecoderOptions {
  modelPrefix: string;
}

const defaultOptions: DecoderOptions = { modelPrefix: DEFAULT_MODEL_PREFIX };

export type StatusFrame =
  | { kind: 'none' }
  | { kind: 'serial'; serial: string }
  | { kind: 'malformed'; reason: string };

export const parseStatusFrame = (payload: Buffer): StatusFrame => {
  if (!startsWithAscii(payload, OTODATA_STATUS_TAG)) {
    return { kind: 'none' };
  }
  const serial = readUInt32LE(payload, SERIAL_OFFSET);
  if (serial === null) {
    return { kind: 'malformed', reason: 'status frame too short for serial' };
  }
  return { kind: 'serial', serial: serial.toString(10) };
};

export const decodeBinarySerial = (payload: Buffer): string | null => {
  const frame = parseStatusFrame(payload);
  return frame.kind === 'serial' ? frame.serial : null;
};

export const decodeNameSerial = (localName: string, modelPrefix: string): string | null => {
  if (!modelPrefix || !localName.startsWith(modelPrefix)) {
    return null;
  }
  const serial = localName.slice(modelPrefix.length).trim();
  return serial.length > 0 ? serial : null;
};

/**
 * Resolves the tank serial carried by an advertisement. Only records with a
 * payload under the Otodata company id qualify; the status frame is tried
 * before the advertised model name.
 */
export const decodeIdentity = (
  record: AdvertisementRecord,
  options: DecoderOptions = defaultOptions
): Identity | null => {
  const payload = record.manufacturerData.get(OTODATA_MANUFACTURER_ID);
  if (!payload) {
    return null;
  }

  const serial = decodeBinarySerial(payload);
  if (serial !== null) {
    return { address: record.address, serial, framing: 'binary' };
  }

  if (record.localName) {
    const nameSerial = decodeNameSerial(record.localName, options.modelPrefix);
    if (nameSerial !== null) {
      return { address: record.address, serial: nameSerial, framing: 'name' };
    }
  }

  return null;
};

export const decodeReading = (record: AdvertisementRecord): ReadingOutcome => {
  const localName = record.localName;
  if (!localName) {
    return { kind: 'none' };
  }

  const tokenIndex = localName.indexOf(LEVEL_TOKEN);
  if (tokenIndex === -1) {
    return { kind: 'none' };
  }

  const match = LEVEL_VALUE.exec(localName.slice(tokenIndex));
  const level = match ? Number.parseFloat(match[1]) : Number.NaN;
  if (!Number.isFinite(level)) {
    return {
      kind: 'error',
      address: record.address,
      localName,
      reason: 'level token without a numeric value'
    };
  }

  return { kind: 'reading', address: record.address, level, rssi: record.rssi };
};

/**
 * Classifies one advertisement. Each framing yields at most one event; a
 * packet carrying both an identity and a level reports the identity first.
 */
export const decodeAdvertisement = (
  record: AdvertisementRecord,
  options: DecoderOptions = defaultOptions
): DecodedEvent[] => {
  const events: DecodedEvent[] = [];

  const identity = decodeIdentity(record, options);
  if (identity) {
    events.push({ type: 'identity', ...identity });
  } else {
    const payload = record.manufacturerData.get(OTODATA_MANUFACTURER_ID);
    const frame = payload ? parseStatusFrame(payload) : null;
    if (frame?.kind === 'malformed') {
      events.push({ type: 'error', address: record.address, reason: frame.reason });
    }
  }

  const reading = decodeReading(record);
  if (reading.kind === 'reading') {
    events.push({ type: 'reading', address: reading.address, level: reading.level, rssi: reading.rssi });
  } else if (reading.kind === 'error') {
    events.push({
      type: 'error',
      address: reading.address,
      localName: reading.localName,
      reason: reading.reason
    });
  }

  return events;
};
