/** One raw advertisement as observed by the scanner. */
export interface AdvertisementRecord {
  address: string;
  /** Company identifier → payload with the identifier already stripped. */
  manufacturerData: ReadonlyMap<number, Buffer>;
  localName?: string;
  rssi: number;
}

export interface Identity {
  address: string;
  serial: string;
  framing: 'binary' | 'name';
}

export interface Reading {
  address: string;
  level: number;
  rssi: number;
}

export type ReadingOutcome =
  | { kind: 'none' }
  | ({ kind: 'reading' } & Reading)
  | { kind: 'error'; address: string; localName: string; reason: string };

export type DecodedEvent =
  | ({ type: 'identity' } & Identity)
  | ({ type: 'reading' } & Reading)
  | { type: 'error'; address: string; reason: string; localName?: string };

export interface PublishOptions {
  retain: boolean;
}

/** Narrow view of the message bus the controller publishes through. */
export interface BusPublisher {
  publish(topic: string, payload: string, options: PublishOptions): void;
}

export interface StatePayload {
  level: number;
  rssi: number;
  mac: string;
}

export interface DiscoveryDevice {
  identifiers: string[];
  name: string;
  manufacturer: string;
  model: string;
}

export interface SensorDiscoveryConfig {
  name: string;
  unique_id: string;
  state_topic: string;
  availability_topic: string;
  unit_of_measurement: string;
  value_template: string;
  device_class: string;
  icon?: string;
  entity_category?: string;
  device: DiscoveryDevice;
}

export interface Publication {
  topic: string;
  payload: string;
  retain: boolean;
}
