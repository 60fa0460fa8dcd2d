import type { DiscoveryDevice, Publication, SensorDiscoveryConfig, StatePayload } from './types.js';

export const VENDOR = 'otodata';
const MANUFACTURER = 'Otodata';
const MODEL = 'TM6030';

export interface DiscoveryTopics {
  availabilityTopic: string;
  discoveryPrefix: string;
}

export const stateTopicFor = (serial: string): string => `${VENDOR}/${serial}/state`;

const configTopicFor = (prefix: string, serial: string, sensor: 'level' | 'rssi'): string =>
  `${prefix}/sensor/${VENDOR}_${serial}/${sensor}/config`;

const buildDevice = (serial: string): DiscoveryDevice => ({
  identifiers: [`${VENDOR}_${serial}`],
  name: `Propane Tank ${serial}`,
  manufacturer: MANUFACTURER,
  model: MODEL
});

export const buildLevelConfig = (serial: string, availabilityTopic: string): SensorDiscoveryConfig => ({
  name: 'Propane Level',
  unique_id: `${VENDOR}_${serial}_level`,
  state_topic: stateTopicFor(serial),
  availability_topic: availabilityTopic,
  unit_of_measurement: '%',
  value_template: '{{ value_json.level }}',
  device_class: 'gas',
  icon: 'mdi:propane-tank',
  device: buildDevice(serial)
});

export const buildRssiConfig = (serial: string, availabilityTopic: string): SensorDiscoveryConfig => ({
  name: 'Signal Strength',
  unique_id: `${VENDOR}_${serial}_rssi`,
  state_topic: stateTopicFor(serial),
  availability_topic: availabilityTopic,
  unit_of_measurement: 'dBm',
  value_template: '{{ value_json.rssi }}',
  device_class: 'signal_strength',
  entity_category: 'diagnostic',
  device: buildDevice(serial)
});

/** Level config first, then signal strength; both retained. */
export const buildDiscoveryPublications = (serial: string, topics: DiscoveryTopics): Publication[] => [
  {
    topic: configTopicFor(topics.discoveryPrefix, serial, 'level'),
    payload: JSON.stringify(buildLevelConfig(serial, topics.availabilityTopic)),
    retain: true
  },
  {
    topic: configTopicFor(topics.discoveryPrefix, serial, 'rssi'),
    payload: JSON.stringify(buildRssiConfig(serial, topics.availabilityTopic)),
    retain: true
  }
];

/** Levels are floats on the wire: a whole percentage keeps its `.0`. */
export const formatLevel = (level: number): string =>
  Number.isInteger(level) ? level.toFixed(1) : JSON.stringify(level);

export const serializeState = (state: StatePayload): string =>
  `{"level":${formatLevel(state.level)},"rssi":${Math.trunc(state.rssi)},"mac":${JSON.stringify(state.mac)}}`;

export const buildStatePublication = (serial: string, state: StatePayload): Publication => ({
  topic: stateTopicFor(serial),
  payload: serializeState(state),
  retain: true
});
