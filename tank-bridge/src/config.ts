import dotenv from 'dotenv';

dotenv.config();

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parsePort = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > 65535) {
    return fallback;
  }

  return parsed;
};

const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const parseProtocolVersion = (value: string | undefined, fallback: 3 | 4 | 5): 3 | 4 | 5 => {
  if (!value) {
    return fallback;
  }

  const normalized = Number.parseInt(value, 10);
  if (normalized === 3 || normalized === 4 || normalized === 5) {
    return normalized;
  }

  return fallback;
};

const parseQoS = (value: string | undefined, fallback: 0 | 1 | 2): 0 | 1 | 2 => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (parsed === 0 || parsed === 1 || parsed === 2) {
    return parsed;
  }

  return fallback;
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const stripTrailingSlashes = (value: string): string => value.replace(/\/+$/, '');

export interface MqttConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  clientId: string;
  keepalive: number;
  reconnectPeriod: number;
  clean: boolean;
  protocolVersion: 3 | 4 | 5;
  qos: 0 | 1 | 2;
}

export interface BridgeConfig {
  availabilityTopic: string;
  discoveryPrefix: string;
  modelPrefix: string;
}

export interface AppConfig {
  logLevel: LogLevel;
  mqtt: MqttConfig;
  bridge: BridgeConfig;
}

export const loadConfig = (env: Env): AppConfig => ({
  logLevel: parseLogLevel(env.LOG_LEVEL),
  mqtt: {
    host: nonEmpty(env.MQTT_BROKER) ?? nonEmpty(env.MQTT_HOST) ?? '127.0.0.1',
    port: parsePort(env.MQTT_PORT, 1883),
    username: nonEmpty(env.MQTT_USER),
    password: env.MQTT_PASS || undefined,
    clientId: nonEmpty(env.MQTT_CLIENT_ID) ?? 'otodata',
    keepalive: parseNonNegativeInt(env.MQTT_KEEPALIVE, 60),
    reconnectPeriod: parseNonNegativeInt(env.MQTT_RECONNECT_PERIOD, 1000),
    clean: parseBoolean(env.MQTT_CLEAN, true),
    protocolVersion: parseProtocolVersion(env.MQTT_PROTOCOL_VERSION, 4),
    qos: parseQoS(env.MQTT_QOS, 0)
  },
  bridge: {
    availabilityTopic: nonEmpty(env.BRIDGE_TOPIC) ?? 'otodata/bridge/status',
    discoveryPrefix: stripTrailingSlashes(
      nonEmpty(env.HA_PREFIX) ?? nonEmpty(env.DISCOVERY_PREFIX) ?? 'homeassistant'
    ),
    modelPrefix: nonEmpty(env.OTODATA_MODEL_PREFIX) ?? 'TM6030'
  }
});

export const config: AppConfig = loadConfig(process.env);
