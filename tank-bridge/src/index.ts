import { AdvertisementQueue } from './advertisementQueue.js';
import { BridgeController } from './bridgeController.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { MqttBus } from './mqttBus.js';
import { startScanner } from './scanner.js';
import { BridgeShutdown } from './shutdown.js';
import type { AdvertisementRecord } from './types.js';

const start = async (): Promise<void> => {
  const bus = new MqttBus({
    mqtt: config.mqtt,
    availabilityTopic: config.bridge.availabilityTopic,
    logger
  });
  const controller = new BridgeController(bus, {
    availabilityTopic: config.bridge.availabilityTopic,
    discoveryPrefix: config.bridge.discoveryPrefix,
    modelPrefix: config.bridge.modelPrefix,
    logger
  });
  const queue = new AdvertisementQueue<AdvertisementRecord>();

  bus.connect(() => controller.announceOnline());

  const processing = controller.run(queue).catch((error) => {
    logger.error({ err: error }, 'Advertisement processing loop failed');
  });

  const shutdown = new BridgeShutdown({
    queue,
    processing,
    bus,
    logger,
    exit: (code) => process.exit(code)
  });
  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown.shutdown(signal).catch((error) => {
      logger.error({ err: error, signal }, 'Unhandled error during shutdown');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  // noble binds to the HCI socket on load, so it is only pulled in here
  const { default: noble } = await import('@abandonware/noble');
  if (shutdown.inProgress) {
    return;
  }
  shutdown.attachScanner(startScanner(noble, queue, logger));
};

start().catch((error) => {
  logger.error({ err: error }, 'Failed to start tank bridge');
  process.exit(1);
});
