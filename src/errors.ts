/**
 * Error taxonomy for device acquisition and command encoding.
 *
 * Transport failures that are not listed here (adapter enumeration, writes)
 * reach the caller unchanged.
 */

export class BledomError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BledomError';
  }
}

export class NoAdaptersFoundError extends BledomError {
  constructor() {
    super('No Bluetooth adapters found');
    this.name = 'NoAdaptersFoundError';
  }
}

export class ScanError extends BledomError {
  constructor(message: string, cause?: unknown) {
    super(`Failed to start BLE scan: ${message}`, { cause });
    this.name = 'ScanError';
  }
}

export class PeripheralPropertiesError extends BledomError {
  constructor(peripheralId: string) {
    super(`Peripheral properties not available for ${peripheralId}`);
    this.name = 'PeripheralPropertiesError';
  }
}

export class DeviceNotFoundError extends BledomError {
  constructor(readonly attempts: number) {
    super(`Could not find device after ${attempts} scan attempts`);
    this.name = 'DeviceNotFoundError';
  }
}

export class ConnectionFailedError extends BledomError {
  constructor(readonly attempts: number, cause: unknown) {
    super(
      `Failed to connect to device after ${attempts} attempts: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'ConnectionFailedError';
  }
}

export class ServiceDiscoveryError extends BledomError {
  constructor(message: string, cause?: unknown) {
    super(`Failed to discover services: ${message}`, { cause });
    this.name = 'ServiceDiscoveryError';
  }
}

export class CharacteristicNotFoundError extends BledomError {
  constructor(readonly uuid: string) {
    super(`Light characteristic (UUID: ${uuid}) not found on device`);
    this.name = 'CharacteristicNotFoundError';
  }
}

export class LinkLostError extends BledomError {
  constructor(readonly peripheralId: string) {
    super(`Lost connection to ${peripheralId}`);
    this.name = 'LinkLostError';
  }
}

export class InvalidParameterError extends BledomError {
  constructor(message: string) {
    super(`Invalid parameter: ${message}`);
    this.name = 'InvalidParameterError';
  }
}

// Raised when an encoder produced a frame that breaks the 9-byte shape
export class FrameIntegrityError extends BledomError {
  constructor(message: string) {
    super(message);
    this.name = 'FrameIntegrityError';
  }
}
