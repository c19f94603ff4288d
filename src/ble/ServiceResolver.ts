import type { Logger } from 'homebridge';
import { LIGHT_CHARACTERISTIC_UUID, errorMessage, normalizeUuid } from '../settings';
import { CharacteristicNotFoundError, ServiceDiscoveryError } from '../errors';
import type { BleCharacteristic, BlePeripheral } from './transport';

export class ServiceResolver {
  constructor(
    private readonly log: Logger,
    private readonly characteristicUuid = LIGHT_CHARACTERISTIC_UUID,
  ) {}

  // Discovery runs once: a failure on an established link is not transient.
  async resolve(peripheral: BlePeripheral): Promise<BleCharacteristic> {
    this.log.debug('BLE: Discovering services and characteristics...');
    try {
      await peripheral.discoverServices();
    } catch (err) {
      throw new ServiceDiscoveryError(errorMessage(err), err);
    }

    const characteristics = peripheral.characteristics();
    this.log.debug('BLE: Found %d characteristics', characteristics.length);

    const target = normalizeUuid(this.characteristicUuid);
    const match = characteristics.find((c) => normalizeUuid(c.uuid) === target);
    if (!match) {
      throw new CharacteristicNotFoundError(this.characteristicUuid);
    }
    return match;
  }
}
