import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { Logger } from 'pino';
import type { MqttConfig } from './config.js';
import type { BusPublisher, PublishOptions } from './types.js';

export const OFFLINE_PAYLOAD = 'offline';

export type MqttConnect = (url: string, options: IClientOptions) => MqttClient;

export interface MqttBusOptions {
  mqtt: MqttConfig;
  availabilityTopic: string;
  logger: Logger;
  connect?: MqttConnect;
}

export const buildClientOptions = (config: MqttConfig, availabilityTopic: string): IClientOptions => ({
  username: config.username,
  password: config.password,
  keepalive: config.keepalive,
  reconnectPeriod: config.reconnectPeriod,
  clean: config.clean,
  clientId: config.clientId,
  protocolVersion: config.protocolVersion,
  will: {
    topic: availabilityTopic,
    payload: OFFLINE_PAYLOAD,
    qos: 1,
    retain: true
  }
});

/**
 * Owns the broker connection. The last will carries the offline marker, so
 * the bridge never publishes it itself.
 */
export class MqttBus implements BusPublisher {
  private client: MqttClient | null = null;
  private readonly logger: Logger;
  private readonly connectFn: MqttConnect;

  constructor(private readonly options: MqttBusOptions) {
    this.logger = options.logger;
    this.connectFn = options.connect ?? mqtt.connect;
  }

  get connected(): boolean {
    return this.client?.connected ?? false;
  }

  connect(onConnect: () => void): MqttClient {
    if (this.client) {
      return this.client;
    }

    const { host, port, clientId } = this.options.mqtt;
    const url = `mqtt://${host}:${port}`;
    this.logger.info({ url, clientId }, 'Initializing MQTT connection');

    const client = this.connectFn(url, buildClientOptions(this.options.mqtt, this.options.availabilityTopic));
    this.client = client;

    client.on('connect', () => {
      this.logger.info({ host, port, clientId }, 'Connected to MQTT broker');
      onConnect();
    });

    client.on('reconnect', () => {
      this.logger.info({ host, port }, 'Reconnecting to MQTT broker');
    });

    client.on('offline', () => {
      this.logger.warn({ host, port }, 'MQTT client offline');
    });

    client.on('error', (error: Error) => {
      this.logger.error({ err: error, host, port }, 'MQTT client error');
    });

    return client;
  }

  publish(topic: string, payload: string, options: PublishOptions): void {
    const client = this.client;
    if (!client) {
      this.logger.warn({ topic }, 'Dropping publication before MQTT connection was initialized');
      return;
    }

    client.publish(topic, payload, { qos: this.options.mqtt.qos, retain: options.retain }, (error?: Error) => {
      if (error) {
        this.logger.error({ err: error, topic }, 'Failed to publish MQTT message');
      }
    });
  }

  /**
   * Drops the socket without a DISCONNECT packet so the broker treats the
   * session as lost and publishes the last will.
   */
  close(): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.resolve();
    }
    this.client = null;

    return new Promise((resolve) => {
      client.end(true, {}, () => {
        resolve();
      });
    });
  }
}
