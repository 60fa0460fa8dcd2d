import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import type { IClientOptions, IClientPublishOptions, MqttClient } from 'mqtt';
import { loadConfig } from '../src/config.js';
import { MqttBus } from '../src/mqttBus.js';
import { silentLogger } from './helpers.js';

class FakeMqttClient extends EventEmitter {
  public connected = false;
  public publishCalls: Array<{ topic: string; payload: string; opts: IClientPublishOptions }> = [];
  public endCalls: boolean[] = [];
  public failNextPublish: Error | null = null;

  publish(
    topic: string,
    payload: string,
    opts: IClientPublishOptions,
    cb?: (error?: Error) => void
  ): this {
    this.publishCalls.push({ topic, payload, opts });
    const error = this.failNextPublish ?? undefined;
    this.failNextPublish = null;
    cb?.(error);
    return this;
  }

  end(force: boolean, _opts: object, cb?: () => void): this {
    this.endCalls.push(force);
    this.connected = false;
    cb?.();
    return this;
  }

  simulateConnect() {
    this.connected = true;
    this.emit('connect', { cmd: 'connack', returnCode: 0 });
  }
}

const createBus = (env: Record<string, string> = {}) => {
  const fake = new FakeMqttClient();
  const config = loadConfig(env);
  const logger = silentLogger();
  const connections: Array<{ url: string; options: IClientOptions }> = [];
  const bus = new MqttBus({
    mqtt: config.mqtt,
    availabilityTopic: config.bridge.availabilityTopic,
    logger,
    connect: (url, options) => {
      connections.push({ url, options });
      return fake as unknown as MqttClient;
    }
  });
  return { bus, fake, logger, connections };
};

describe('MqttBus', () => {
  it('connects with credentials and an offline last will', () => {
    const { bus, connections } = createBus({
      MQTT_BROKER: 'broker.local',
      MQTT_USER: 'bridge',
      MQTT_PASS: 'test-secret'
    });

    bus.connect(() => undefined);

    expect(connections).toHaveLength(1);
    expect(connections[0].url).toBe('mqtt://broker.local:1883');
    expect(connections[0].options).toMatchObject({
      username: 'bridge',
      password: 'test-secret',
      clientId: 'otodata',
      will: { topic: 'otodata/bridge/status', payload: 'offline', qos: 1, retain: true }
    });
  });

  it('notifies on every connack, including reconnects', () => {
    const { bus, fake } = createBus();
    const onConnect = vi.fn();

    bus.connect(onConnect);
    fake.simulateConnect();
    fake.simulateConnect();

    expect(onConnect).toHaveBeenCalledTimes(2);
    expect(bus.connected).toBe(true);
  });

  it('reuses the client on repeated connect calls', () => {
    const { bus, connections } = createBus();

    const first = bus.connect(() => undefined);
    const second = bus.connect(() => undefined);

    expect(second).toBe(first);
    expect(connections).toHaveLength(1);
  });

  it('publishes with the configured qos and retain flag', () => {
    const { bus, fake } = createBus({ MQTT_QOS: '1' });
    bus.connect(() => undefined);

    bus.publish('otodata/1/state', '{"level":1}', { retain: true });

    expect(fake.publishCalls).toEqual([
      { topic: 'otodata/1/state', payload: '{"level":1}', opts: { qos: 1, retain: true } }
    ]);
  });

  it('logs publish failures without throwing', () => {
    const { bus, fake, logger } = createBus();
    const error = vi.spyOn(logger, 'error');
    bus.connect(() => undefined);
    fake.failNextPublish = new Error('not connected');

    expect(() => bus.publish('otodata/1/state', '{}', { retain: true })).not.toThrow();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('drops publications made before connect', () => {
    const { bus, fake, logger } = createBus();
    const warn = vi.spyOn(logger, 'warn');

    bus.publish('otodata/1/state', '{}', { retain: true });

    expect(fake.publishCalls).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('logs client errors', () => {
    const { bus, fake, logger } = createBus();
    const error = vi.spyOn(logger, 'error');
    bus.connect(() => undefined);

    fake.emit('error', new Error('Connection refused: Not authorized'));

    expect(error).toHaveBeenCalledTimes(1);
  });

  it('closes the socket forcibly so the broker sends the last will', async () => {
    const { bus, fake } = createBus();
    bus.connect(() => undefined);

    await bus.close();
    await bus.close();

    expect(fake.endCalls).toEqual([true]);
  });
});
