import type {
  API,
  DynamicPlatformPlugin,
  Logger,
  PlatformAccessory,
} from 'homebridge';
import { PLUGIN_NAME, errorMessage, resolveDeviceConfig } from './settings';
import type { BledomPlatformConfig } from './settings';
import { BledomAccessory } from './accessory';
import { NobleBleManager } from './ble/NobleTransport';
import { BledomConnectionManager } from './ble/BledomConnectionManager';
import { BledomDevice } from './protocol/BledomDevice';
import { BledomLight } from './protocol/BledomLight';

export class ElkBledomPlatform implements DynamicPlatformPlugin {
  private readonly accessories: BledomAccessory[] = [];
  private light: BledomLight | null = null;

  constructor(
    public readonly log: Logger,
    public readonly config: BledomPlatformConfig,
    public readonly api: API,
  ) {
    this.log.info('ELK-BLEDOM platform initialized');

    this.api.on('didFinishLaunching', () => {
      this.setupDevice();
    });

    this.api.on('shutdown', () => {
      this.light?.shutdown().catch((err) => {
        this.log.debug('Disconnect on shutdown failed: %s', errorMessage(err));
      });
    });
  }

  // Lights are published as external accessories, so nothing is restored from cache
  configureAccessory(_accessory: PlatformAccessory): void {
  }

  private setupDevice(): void {
    let devices = this.config.devices ?? [];

    if (devices.length === 0) {
      this.log.info('No devices configured; will auto-discover via BLE.');
      devices = [{}];
    }

    // Discovery matches the first ELK-BLEDOM advertiser, so a second entry could not be told apart
    if (devices.length > 1) {
      this.log.warn('Multiple devices configured; only the first device is supported.');
    }

    const deviceConfig = resolveDeviceConfig(devices[0]);
    this.log.info('Setting up light: %s', deviceConfig.name);

    const uuid = this.api.hap.uuid.generate('elk-bledom:' + deviceConfig.name);
    const accessory = new this.api.platformAccessory(deviceConfig.name, uuid);

    const manager = new NobleBleManager(this.log);
    const connectionManager = new BledomConnectionManager(
      () => BledomDevice.builder(manager, this.log, {
        scanRetries: deviceConfig.scanRetries,
        scanIntervalMs: deviceConfig.scanIntervalMs,
        connectionRetries: deviceConfig.connectionRetries,
        connectionIntervalMs: deviceConfig.connectionIntervalMs,
      }).build(),
      { idleTimeout: deviceConfig.idleTimeout, syncTimeOnConnect: deviceConfig.syncTimeOnConnect },
      this.log,
    );
    this.light = new BledomLight(connectionManager, this.log);

    this.accessories.push(new BledomAccessory(this, accessory, deviceConfig, this.light));

    accessory.category = this.api.hap.Categories.LIGHTBULB;

    this.api.publishExternalAccessories(PLUGIN_NAME, [accessory]);
  }
}
