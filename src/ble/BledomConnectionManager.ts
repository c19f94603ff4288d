import type { Logger } from 'homebridge';
import type { BledomDevice } from '../protocol/BledomDevice';
import { InvalidParameterError } from '../errors';
import { errorMessage } from '../settings';

export type DeviceOperation = (device: BledomDevice) => Promise<void>;

interface QueuedOperation {
  label: string;
  run: DeviceOperation;
  resolve: () => void;
  reject: (err: unknown) => void;
}

export interface ConnectionManagerOptions {
  idleTimeout: number;
  syncTimeOnConnect: boolean;
}

/**
 * Owns the single handle to a light for a long-running host. Operations run
 * one at a time, the handle is acquired on first use, and it is released
 * after `idleTimeout` seconds without traffic or after any failed write. A
 * link the light drops on its own is forgotten, and the next operation
 * acquires a new one.
 */
export class BledomConnectionManager {
  private queue: QueuedOperation[] = [];
  private processing = false;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;
  private device: BledomDevice | null = null;
  private releaseLinkWatch: (() => void) | null = null;
  private connectPromise: Promise<BledomDevice> | null = null;
  private onConnectCallback: ((device: BledomDevice) => void) | null = null;

  constructor(
    private readonly acquire: () => Promise<BledomDevice>,
    private readonly options: ConnectionManagerOptions,
    private readonly log: Logger,
  ) {}

  onConnect(callback: (device: BledomDevice) => void): void {
    this.onConnectCallback = callback;
  }

  isConnected(): boolean {
    return this.device !== null;
  }

  enqueue(label: string, run: DeviceOperation): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.queue.push({ label, run, resolve, reject });
      this.processQueue().catch((err) => {
        this.log.error('Command queue failure: %s', errorMessage(err));
      });
    });
  }

  async ensureConnected(): Promise<BledomDevice> {
    if (this.device) {
      this.resetIdleTimer();
      return this.device;
    }

    // Reuse in-flight acquisition
    if (this.connectPromise) {
      return this.connectPromise;
    }

    this.connectPromise = this.doConnect();
    try {
      return await this.connectPromise;
    } finally {
      this.connectPromise = null;
    }
  }

  async disconnect(): Promise<void> {
    this.clearIdleTimer();
    const device = this.device;
    this.detach();
    if (device) {
      await device.disconnect();
    }
  }

  private async doConnect(): Promise<BledomDevice> {
    this.log.info('Connecting to light...');
    const device = await this.acquire();
    if (this.options.syncTimeOnConnect) {
      try {
        await device.syncTime();
      } catch (err) {
        await device.disconnect().catch((disconnectErr) => {
          this.log.debug('Disconnect after failed clock sync: %s', errorMessage(disconnectErr));
        });
        throw err;
      }
    }
    this.device = device;
    this.releaseLinkWatch = device.onDisconnect(() => this.handleLinkLost(device));
    this.resetIdleTimer();
    this.log.info('Connected to %s', device.id);
    if (this.onConnectCallback) {
      this.onConnectCallback(device);
    }
    return device;
  }

  private async processQueue(): Promise<void> {
    if (this.processing) {
      return;
    }
    this.processing = true;

    try {
      let item = this.queue.shift();
      while (item) {
        try {
          const device = await this.ensureConnected();
          await item.run(device);
          this.resetIdleTimer();
          item.resolve();
        } catch (err) {
          if (!(err instanceof InvalidParameterError)) {
            // Delivery state is unknown; drop the link so the next command starts clean
            this.log.warn('%s failed, dropping connection: %s', item.label, errorMessage(err));
            await this.dropConnection();
          }
          item.reject(err);
        }
        item = this.queue.shift();
      }
    } finally {
      this.processing = false;
    }
  }

  private handleLinkLost(device: BledomDevice): void {
    if (this.device !== device) {
      return;
    }
    this.log.warn('%s disconnected', device.id);
    this.clearIdleTimer();
    this.detach();
  }

  private detach(): void {
    if (this.releaseLinkWatch) {
      this.releaseLinkWatch();
      this.releaseLinkWatch = null;
    }
    this.device = null;
  }

  private async dropConnection(): Promise<void> {
    try {
      await this.disconnect();
    } catch (err) {
      this.log.debug('Disconnect after failure: %s', errorMessage(err));
    }
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer();
    if (this.options.idleTimeout <= 0) {
      return;
    }
    this.idleTimer = setTimeout(() => {
      this.log.info('Idle timeout, disconnecting');
      this.disconnect().catch((err) => {
        this.log.warn('Error during idle disconnect: %s', errorMessage(err));
      });
    }, this.options.idleTimeout * 1000);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
