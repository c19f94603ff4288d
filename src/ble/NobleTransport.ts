import type { Logger } from 'homebridge';
import noble from '@stoprocent/noble';
import { LinkLostError } from '../errors';
import { normalizeUuid } from '../settings';
import {
  WriteType,
  type BleAdapter,
  type BleCharacteristic,
  type BleManager,
  type BlePeripheral,
  type PeripheralProperties,
  type ScanFilter,
} from './transport';

const ADAPTER_STATE_TIMEOUT = 5000;

function waitForAdapterState(timeoutMs: number): Promise<string> {
  if (noble.state !== 'unknown' && noble.state !== 'resetting') {
    return Promise.resolve(noble.state);
  }
  return new Promise((resolve) => {
    const onStateChange = (state: string) => {
      if (state === 'resetting') {
        return;
      }
      clearTimeout(timeout);
      noble.removeListener('stateChange', onStateChange);
      resolve(state);
    };
    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      resolve(noble.state);
    }, timeoutMs);
    noble.on('stateChange', onStateChange);
  });
}

export class NoblePeripheral implements BlePeripheral {
  private discovered: noble.Characteristic[] = [];
  private readonly disconnectListeners = new Set<() => void>();

  private readonly handleDisconnect = () => {
    this.discovered = [];
    for (const listener of Array.from(this.disconnectListeners)) {
      listener();
    }
  };

  constructor(private readonly peripheral: noble.Peripheral) {}

  get id(): string {
    return this.peripheral.address !== '' && this.peripheral.address !== 'unknown'
      ? this.peripheral.address
      : this.peripheral.id ?? this.peripheral.uuid ?? 'unknown';
  }

  async properties(): Promise<PeripheralProperties | null> {
    const advertisement = this.peripheral.advertisement;
    if (!advertisement) {
      return null;
    }
    return {
      localName: advertisement.localName,
      address: this.peripheral.address,
      rssi: this.peripheral.rssi,
    };
  }

  async connect(): Promise<void> {
    await this.peripheral.connectAsync();
  }

  async disconnect(): Promise<void> {
    await this.peripheral.disconnectAsync();
    this.discovered = [];
  }

  async discoverServices(): Promise<void> {
    const { characteristics } = await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
    this.discovered = characteristics;
  }

  characteristics(): BleCharacteristic[] {
    return this.discovered.map((char) => ({ uuid: char.uuid, properties: char.properties }));
  }

  async write(characteristic: BleCharacteristic, data: Buffer, writeType: WriteType): Promise<void> {
    const target = normalizeUuid(characteristic.uuid);
    const char = this.discovered.find((c) => normalizeUuid(c.uuid) === target);
    if (!char) {
      throw new Error(`Characteristic ${characteristic.uuid} not found. Available: ${this.discovered.map((c) => c.uuid).join(', ')}`);
    }
    // noble never calls back a write issued after the link dropped
    if (this.peripheral.state !== 'connected') {
      throw new LinkLostError(this.id);
    }
    let release: () => void = () => undefined;
    const lost = new Promise<never>((_, reject) => {
      release = this.onDisconnect(() => reject(new LinkLostError(this.id)));
    });
    try {
      await Promise.race([char.writeAsync(data, writeType === WriteType.WithoutResponse), lost]);
    } finally {
      release();
    }
  }

  onDisconnect(listener: () => void): () => void {
    if (this.disconnectListeners.size === 0) {
      this.peripheral.on('disconnect', this.handleDisconnect);
    }
    this.disconnectListeners.add(listener);
    return () => {
      if (this.disconnectListeners.delete(listener) && this.disconnectListeners.size === 0) {
        this.peripheral.removeListener('disconnect', this.handleDisconnect);
      }
    };
  }
}

export class NobleAdapter implements BleAdapter {
  private readonly seen = new Map<string, NoblePeripheral>();

  private readonly onDiscover = (peripheral: noble.Peripheral) => {
    if (!this.seen.has(peripheral.id)) {
      this.log.debug('BLE: Discovered %s (%s)', peripheral.advertisement?.localName ?? '(unnamed)', peripheral.id);
      this.seen.set(peripheral.id, new NoblePeripheral(peripheral));
    }
  };

  constructor(private readonly log: Logger) {}

  async startScan(filter: ScanFilter): Promise<void> {
    noble.on('discover', this.onDiscover);
    try {
      await noble.startScanningAsync(filter.services ?? [], false);
    } catch (err) {
      noble.removeListener('discover', this.onDiscover);
      throw err;
    }
  }

  async stopScan(): Promise<void> {
    noble.removeListener('discover', this.onDiscover);
    await noble.stopScanningAsync();
  }

  async peripherals(): Promise<BlePeripheral[]> {
    return Array.from(this.seen.values());
  }
}

/**
 * noble drives a single HCI adapter, so the list is either that adapter or
 * empty when the radio never reaches `poweredOn`.
 */
export class NobleBleManager implements BleManager {
  constructor(
    private readonly log: Logger,
    private readonly stateTimeout = ADAPTER_STATE_TIMEOUT,
  ) {}

  async adapters(): Promise<BleAdapter[]> {
    const state = await waitForAdapterState(this.stateTimeout);
    if (state !== 'poweredOn') {
      this.log.warn('BLE: Bluetooth adapter state: %s', state);
      return [];
    }
    return [new NobleAdapter(this.log)];
  }
}
