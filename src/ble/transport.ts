/**
 * Capabilities the acquisition pipeline and command channel need from a
 * Bluetooth stack. `NobleTransport` implements them on top of noble; tests
 * supply in-process doubles.
 */

export enum WriteType {
  WithResponse = 'with-response',
  WithoutResponse = 'without-response',
}

export interface ScanFilter {
  services?: string[];
}

export interface PeripheralProperties {
  localName?: string;
  address?: string;
  rssi?: number;
}

export interface BleCharacteristic {
  readonly uuid: string;
  readonly properties: readonly string[];
}

export interface BlePeripheral {
  readonly id: string;
  properties(): Promise<PeripheralProperties | null>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  discoverServices(): Promise<void>;
  characteristics(): BleCharacteristic[];
  write(characteristic: BleCharacteristic, data: Buffer, writeType: WriteType): Promise<void>;
  /**
   * Called when the link drops without a `disconnect()` from this side.
   * Returns a function that removes the listener.
   */
  onDisconnect(listener: () => void): () => void;
}

export interface BleAdapter {
  startScan(filter: ScanFilter): Promise<void>;
  stopScan(): Promise<void>;
  peripherals(): Promise<BlePeripheral[]>;
}

export interface BleManager {
  adapters(): Promise<BleAdapter[]>;
}
