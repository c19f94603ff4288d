import { vi } from 'vitest';
import type { Logger } from 'homebridge';
import { LinkLostError } from '../../src/errors';
import {
  WriteType,
  type BleAdapter,
  type BleCharacteristic,
  type BleManager,
  type BlePeripheral,
  type PeripheralProperties,
  type ScanFilter,
} from '../../src/ble/transport';

export const LIGHT_CHAR: BleCharacteristic = { uuid: 'fff3', properties: ['writeWithoutResponse', 'write'] };
export const NOTIFY_CHAR: BleCharacteristic = { uuid: 'fff4', properties: ['notify'] };

export function createTestLogger(): Logger {
  const log = {
    prefix: 'test',
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    log: vi.fn(),
  };
  return log as unknown as Logger;
}

export interface WriteRecord {
  uuid: string;
  data: Buffer;
  writeType: WriteType;
}

export interface FakePeripheralOptions {
  props?: PeripheralProperties | null;
  characteristics?: BleCharacteristic[];
  connectFailures?: number;
  discoverError?: Error;
  writeError?: Error;
}

export class FakePeripheral implements BlePeripheral {
  connectAttempts = 0;
  connectTimes: number[] = [];
  discoverCalls = 0;
  disconnectCalls = 0;
  writes: WriteRecord[] = [];
  writeError: Error | undefined;
  // Writes hang until the link drops, as noble's do on a dead link
  stallWrites = false;
  private discovered: BleCharacteristic[] = [];
  private readonly disconnectListeners = new Set<() => void>();

  constructor(readonly id: string, private readonly options: FakePeripheralOptions = {}) {
    this.writeError = options.writeError;
  }

  async properties(): Promise<PeripheralProperties | null> {
    return this.options.props === undefined ? { localName: 'ELK-BLEDOM   ' } : this.options.props;
  }

  async connect(): Promise<void> {
    this.connectAttempts++;
    this.connectTimes.push(Date.now());
    if (this.connectAttempts <= (this.options.connectFailures ?? 0)) {
      throw new Error(`connect attempt ${this.connectAttempts} refused`);
    }
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  async discoverServices(): Promise<void> {
    this.discoverCalls++;
    if (this.options.discoverError) {
      throw this.options.discoverError;
    }
    this.discovered = this.options.characteristics ?? [NOTIFY_CHAR, LIGHT_CHAR];
  }

  characteristics(): BleCharacteristic[] {
    return this.discovered;
  }

  async write(characteristic: BleCharacteristic, data: Buffer, writeType: WriteType): Promise<void> {
    if (this.writeError) {
      throw this.writeError;
    }
    if (this.stallWrites) {
      return new Promise<void>((_, reject) => {
        const release = this.onDisconnect(() => {
          release();
          reject(new LinkLostError(this.id));
        });
      });
    }
    this.writes.push({ uuid: characteristic.uuid, data: Buffer.from(data), writeType });
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  get disconnectListenerCount(): number {
    return this.disconnectListeners.size;
  }

  // The light ends the link on its own
  dropLink(): void {
    for (const listener of Array.from(this.disconnectListeners)) {
      listener();
    }
  }
}

/**
 * Adapter whose peripheral list is revealed over time: `visibleFrom[i]` is the
 * 1-based poll on which `peripherals[i]` first shows up.
 */
export class FakeAdapter implements BleAdapter {
  scanStarts: ScanFilter[] = [];
  scanStops = 0;
  pollTimes: number[] = [];
  startError: Error | undefined;
  stopError: Error | undefined;
  pollError: Error | undefined;

  constructor(
    private readonly entries: { peripheral: BlePeripheral; visibleFrom: number }[] = [],
  ) {}

  get polls(): number {
    return this.pollTimes.length;
  }

  async startScan(filter: ScanFilter): Promise<void> {
    if (this.startError) {
      throw this.startError;
    }
    this.scanStarts.push(filter);
  }

  async stopScan(): Promise<void> {
    this.scanStops++;
    if (this.stopError) {
      throw this.stopError;
    }
  }

  async peripherals(): Promise<BlePeripheral[]> {
    this.pollTimes.push(Date.now());
    if (this.pollError) {
      throw this.pollError;
    }
    const poll = this.pollTimes.length;
    return this.entries.filter((e) => poll >= e.visibleFrom).map((e) => e.peripheral);
  }
}

export class FakeManager implements BleManager {
  adapterCalls = 0;

  constructor(private readonly list: BleAdapter[]) {}

  async adapters(): Promise<BleAdapter[]> {
    this.adapterCalls++;
    return this.list;
  }
}
