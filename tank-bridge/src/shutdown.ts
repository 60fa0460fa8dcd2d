import type { Logger } from 'pino';
import type { ScannerHandle } from './scanner.js';

export interface ShutdownDependencies {
  queue: { close(): void };
  processing: Promise<void>;
  bus: { close(): Promise<void> };
  exit: (code: number) => void;
  logger: Logger;
}

/**
 * Stops the bridge in order: scanner, queue, pending records, broker socket.
 * The scanner is attached once noble has loaded; a signal that arrives
 * earlier shuts down without one.
 */
export class BridgeShutdown {
  private scanner: ScannerHandle | null = null;
  private started = false;

  constructor(private readonly deps: ShutdownDependencies) {}

  get inProgress(): boolean {
    return this.started;
  }

  attachScanner(scanner: ScannerHandle): void {
    this.scanner = scanner;
  }

  async shutdown(signal: NodeJS.Signals): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    const { logger } = this.deps;
    logger.info({ signal }, 'Shutting down tank bridge');

    if (this.scanner) {
      await this.scanner.stop().catch((error) => {
        logger.error({ err: error }, 'Error stopping BLE scanner');
      });
    }

    try {
      this.deps.queue.close();
      await this.deps.processing;
      await this.deps.bus.close();
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      this.deps.exit(1);
      return;
    }

    this.deps.exit(0);
  }
}
