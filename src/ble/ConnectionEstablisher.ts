import type { Logger } from 'homebridge';
import { errorMessage, sleep } from '../settings';
import { ConnectionFailedError } from '../errors';
import type { BlePeripheral } from './transport';

export interface ConnectPolicy {
  retries: number;
  intervalMs: number;
}

export class ConnectionEstablisher {
  constructor(
    private readonly policy: ConnectPolicy,
    private readonly log: Logger,
  ) {}

  async connect(peripheral: BlePeripheral): Promise<void> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.policy.retries; attempt++) {
      this.log.debug('BLE: Connecting to %s (attempt %d/%d)...', peripheral.id, attempt, this.policy.retries);
      try {
        await peripheral.connect();
        this.log.info('BLE: Connected to %s', peripheral.id);
        return;
      } catch (err) {
        lastError = err;
        this.log.warn('BLE: Failed to connect to %s: %s', peripheral.id, errorMessage(err));
      }
      if (attempt < this.policy.retries) {
        await sleep(this.policy.intervalMs);
      }
    }
    throw new ConnectionFailedError(this.policy.retries, lastError);
  }
}
