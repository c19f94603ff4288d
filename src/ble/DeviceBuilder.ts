import type { Logger } from 'homebridge';
import { DEFAULT_ACQUISITION_OPTIONS, errorMessage, type AcquisitionOptions } from '../settings';
import { BledomError, InvalidParameterError, NoAdaptersFoundError } from '../errors';
import { BledomDevice } from '../protocol/BledomDevice';
import { CommandChannel } from './CommandChannel';
import { ConnectionEstablisher } from './ConnectionEstablisher';
import { DeviceLocator } from './DeviceLocator';
import { ServiceResolver } from './ServiceResolver';
import type { BleManager, BlePeripheral } from './transport';

export type AcquisitionState =
  | { stage: 'idle' }
  | { stage: 'scanning' }
  | { stage: 'located'; peripheralId: string }
  | { stage: 'connecting'; peripheralId: string }
  | { stage: 'connected'; peripheralId: string }
  | { stage: 'service-resolved'; peripheralId: string }
  | { stage: 'ready'; peripheralId: string }
  | { stage: 'failed'; reason: unknown };

export type AcquisitionStage = AcquisitionState['stage'];

export type StateListener = (state: AcquisitionState) => void;

export function validateAcquisitionOptions(options: AcquisitionOptions): void {
  const counts: [string, number][] = [
    ['scanRetries', options.scanRetries],
    ['connectionRetries', options.connectionRetries],
  ];
  for (const [field, value] of counts) {
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidParameterError(`${field} must be a positive integer, got ${value}.`);
    }
  }
  const intervals: [string, number][] = [
    ['scanIntervalMs', options.scanIntervalMs],
    ['connectionIntervalMs', options.connectionIntervalMs],
  ];
  for (const [field, value] of intervals) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidParameterError(`${field} must be a non-negative integer, got ${value}.`);
    }
  }
}

/**
 * Drives a light from nothing to a writable handle:
 *
 * idle -> scanning -> located -> connecting -> connected -> service-resolved -> ready
 *
 * Scanning and connecting are polled with their own retry budget and fixed
 * interval; any other failure ends in `failed` immediately.
 */
export class DeviceBuilder {
  private readonly requested: Partial<AcquisitionOptions>;
  private current: AcquisitionState = { stage: 'idle' };
  private started = false;
  // Connected but not yet handed over as a device
  private linked: BlePeripheral | null = null;
  private listeners: StateListener[] = [];

  constructor(
    private readonly manager: BleManager,
    private readonly log: Logger,
    options: Partial<AcquisitionOptions> = {},
  ) {
    this.requested = { ...options };
  }

  get state(): AcquisitionState {
    return this.current;
  }

  scanRetries(retries: number): this {
    return this.set('scanRetries', retries);
  }

  scanIntervalMs(interval: number): this {
    return this.set('scanIntervalMs', interval);
  }

  connectionRetries(retries: number): this {
    return this.set('connectionRetries', retries);
  }

  connectionIntervalMs(interval: number): this {
    return this.set('connectionIntervalMs', interval);
  }

  onStateChange(listener: StateListener): this {
    this.listeners.push(listener);
    return this;
  }

  async build(): Promise<BledomDevice> {
    if (this.started) {
      throw new BledomError(`Acquisition already started (state: ${this.current.stage})`);
    }
    const options: Readonly<AcquisitionOptions> = Object.freeze({ ...DEFAULT_ACQUISITION_OPTIONS, ...this.requested });
    validateAcquisitionOptions(options);
    this.started = true;

    try {
      return await this.acquire(options);
    } catch (err) {
      await this.releaseLink();
      this.transition({ stage: 'failed', reason: err });
      throw err;
    }
  }

  private async acquire(options: Readonly<AcquisitionOptions>): Promise<BledomDevice> {
    this.log.debug('BLE: Acquiring light (scan %dx%dms, connect %dx%dms)',
      options.scanRetries, options.scanIntervalMs, options.connectionRetries, options.connectionIntervalMs);

    this.transition({ stage: 'scanning' });
    const adapters = await this.manager.adapters();
    if (adapters.length === 0) {
      throw new NoAdaptersFoundError();
    }
    const adapter = adapters[0];

    const locator = new DeviceLocator(adapter, { retries: options.scanRetries, intervalMs: options.scanIntervalMs }, this.log);
    const peripheral = await locator.locate();
    const peripheralId = peripheral.id;
    this.transition({ stage: 'located', peripheralId });

    this.transition({ stage: 'connecting', peripheralId });
    const establisher = new ConnectionEstablisher(
      { retries: options.connectionRetries, intervalMs: options.connectionIntervalMs },
      this.log,
    );
    await establisher.connect(peripheral);
    this.linked = peripheral;
    this.transition({ stage: 'connected', peripheralId });

    const characteristic = await new ServiceResolver(this.log).resolve(peripheral);
    this.transition({ stage: 'service-resolved', peripheralId });

    const device = new BledomDevice(peripheral, new CommandChannel(peripheral, characteristic), this.log);
    this.linked = null;
    this.transition({ stage: 'ready', peripheralId });
    return device;
  }

  private async releaseLink(): Promise<void> {
    const peripheral = this.linked;
    this.linked = null;
    if (!peripheral) {
      return;
    }
    try {
      await peripheral.disconnect();
    } catch (err) {
      this.log.warn('BLE: Failed to disconnect %s after failed acquisition: %s', peripheral.id, errorMessage(err));
    }
  }

  private set(key: keyof AcquisitionOptions, value: number): this {
    if (this.started) {
      throw new BledomError(`Cannot change ${key} after acquisition started`);
    }
    this.requested[key] = value;
    return this;
  }

  private transition(next: AcquisitionState): void {
    this.log.debug('BLE: %s -> %s', this.current.stage, next.stage);
    this.current = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (err) {
        this.log.error('BLE: State listener error: %s', errorMessage(err));
      }
    }
  }
}
