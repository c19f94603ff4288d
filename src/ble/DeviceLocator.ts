import type { Logger } from 'homebridge';
import { DEVICE_NAME_MATCH, errorMessage, sleep } from '../settings';
import { DeviceNotFoundError, PeripheralPropertiesError, ScanError } from '../errors';
import type { BleAdapter, BlePeripheral } from './transport';

export interface ScanPolicy {
  retries: number;
  intervalMs: number;
}

/**
 * One poll of the adapter's peripheral list. Resolves `null` when nothing
 * matches yet; every other failure is thrown and ends the scan.
 */
export async function findLight(adapter: BleAdapter, nameMatch = DEVICE_NAME_MATCH): Promise<BlePeripheral | null> {
  for (const peripheral of await adapter.peripherals()) {
    const props = await peripheral.properties();
    if (!props) {
      throw new PeripheralPropertiesError(peripheral.id);
    }
    if (props.localName?.includes(nameMatch)) {
      return peripheral;
    }
  }
  return null;
}

export class DeviceLocator {
  constructor(
    private readonly adapter: BleAdapter,
    private readonly policy: ScanPolicy,
    private readonly log: Logger,
  ) {}

  async locate(): Promise<BlePeripheral> {
    try {
      await this.adapter.startScan({});
    } catch (err) {
      throw new ScanError(errorMessage(err), err);
    }

    try {
      for (let attempt = 1; attempt <= this.policy.retries; attempt++) {
        this.log.debug('BLE: Looking for %s (attempt %d/%d)...', DEVICE_NAME_MATCH, attempt, this.policy.retries);
        const peripheral = await findLight(this.adapter);
        if (peripheral) {
          this.log.info('BLE: Found light %s', peripheral.id);
          return peripheral;
        }
        if (attempt < this.policy.retries) {
          await sleep(this.policy.intervalMs);
        }
      }
      throw new DeviceNotFoundError(this.policy.retries);
    } finally {
      await this.stopScan();
    }
  }

  private async stopScan(): Promise<void> {
    try {
      await this.adapter.stopScan();
    } catch (err) {
      this.log.warn('BLE: Failed to stop scan: %s', errorMessage(err));
    }
  }
}
