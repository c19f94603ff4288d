import type {
  PlatformAccessory,
  Service,
  Characteristic,
  CharacteristicValue,
} from 'homebridge';
import { HapStatusError, HAPStatus } from 'hap-nodejs';
import type { ElkBledomPlatform } from './platform';
import type { BledomDeviceConfig } from './settings';
import { errorMessage } from './settings';
import type { BledomLight } from './protocol/BledomLight';
import { Effect, type EffectName } from './protocol/constants';

interface EffectSwitch {
  service: Service;
  name: EffectName;
}

function effectLabel(name: EffectName): string {
  return name
    .toLowerCase()
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export class BledomAccessory {
  private readonly lightService: Service;
  private readonly effectSwitches: EffectSwitch[] = [];

  private colorDebounceTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingHue: number;
  private pendingSaturation: number;

  private readonly Characteristic: typeof Characteristic;

  constructor(
    private readonly platform: ElkBledomPlatform,
    private readonly accessory: PlatformAccessory,
    private readonly config: BledomDeviceConfig,
    private readonly light: BledomLight,
  ) {
    this.Characteristic = this.platform.api.hap.Characteristic;
    const Service = this.platform.api.hap.Service;
    this.pendingHue = this.light.state.hue;
    this.pendingSaturation = this.light.state.saturation;

    // --- Accessory Information ---
    const infoService = this.accessory.getService(Service.AccessoryInformation) ??
      this.accessory.addService(Service.AccessoryInformation);
    infoService
      .setCharacteristic(this.Characteristic.Manufacturer, 'ELK')
      .setCharacteristic(this.Characteristic.Model, 'BLEDOM')
      .setCharacteristic(this.Characteristic.SerialNumber, 'Auto');

    // Serial number becomes the BLE address once a light has been found
    this.light.onConnect((deviceId) => {
      infoService.updateCharacteristic(this.Characteristic.SerialNumber, deviceId);
    });

    // --- Lightbulb (primary) ---
    this.lightService = this.accessory.addService(Service.Lightbulb, this.config.name, 'light');
    this.lightService.setPrimaryService(true);

    this.lightService.getCharacteristic(this.Characteristic.On)
      .onGet(() => this.light.state.on)
      .onSet(this.setOn.bind(this));

    this.lightService.getCharacteristic(this.Characteristic.Brightness)
      .onGet(() => this.light.state.brightness)
      .onSet(this.setBrightness.bind(this));

    this.lightService.getCharacteristic(this.Characteristic.Hue)
      .onGet(() => this.light.state.hue)
      .onSet(this.setHue.bind(this));

    this.lightService.getCharacteristic(this.Characteristic.Saturation)
      .onGet(() => this.light.state.saturation)
      .onSet(this.setSaturation.bind(this));

    // --- Effect Switches ---
    for (const name of this.config.effects) {
      const label = effectLabel(name);
      const switchService = this.accessory.addService(Service.Switch, label, `effect-${name.toLowerCase()}`);
      switchService.addOptionalCharacteristic(this.Characteristic.ConfiguredName);
      switchService.getCharacteristic(this.Characteristic.ConfiguredName).setValue(label);
      switchService.getCharacteristic(this.Characteristic.On)
        .onSet(async (value: CharacteristicValue) => {
          await this.setEffectSwitch(name, Boolean(value));
        });
      this.effectSwitches.push({ service: switchService, name });
    }
  }

  // --- Power ---

  private async setOn(value: CharacteristicValue): Promise<void> {
    try {
      await this.light.setPower(Boolean(value));
    } catch (err) {
      this.platform.log.error('setPower failed: %s', errorMessage(err));
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  // --- Brightness ---

  private async setBrightness(value: CharacteristicValue): Promise<void> {
    try {
      await this.light.setBrightness(Number(value));
    } catch (err) {
      this.platform.log.error('setBrightness failed: %s', errorMessage(err));
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  // --- Colour ---
  // HomeKit sends Hue and Saturation as two separate writes; coalesce them into one frame.

  private setHue(value: CharacteristicValue): void {
    this.pendingHue = Number(value);
    this.scheduleColorUpdate();
  }

  private setSaturation(value: CharacteristicValue): void {
    this.pendingSaturation = Number(value);
    this.scheduleColorUpdate();
  }

  private scheduleColorUpdate(): void {
    if (this.colorDebounceTimer) {
      clearTimeout(this.colorDebounceTimer);
    }
    this.colorDebounceTimer = setTimeout(() => {
      this.colorDebounceTimer = null;
      this.light.setHueSaturation(this.pendingHue, this.pendingSaturation)
        .then(() => this.updateEffectSwitches(null))
        .catch((err) => {
          this.platform.log.error('Failed to set color: %s', errorMessage(err));
        });
    }, 100);
  }

  // --- Effects ---

  private async setEffectSwitch(name: EffectName, on: boolean): Promise<void> {
    try {
      if (on) {
        await this.light.setEffectSpeed(this.config.effectSpeed);
        await this.light.setEffect(Effect[name]);
        this.updateEffectSwitches(name);
      } else {
        // Leaving an effect restores the last static colour
        await this.light.setHueSaturation(this.light.state.hue, this.light.state.saturation);
        this.updateEffectSwitches(null);
      }
    } catch (err) {
      this.platform.log.error('setEffect failed: %s', errorMessage(err));
      throw new HapStatusError(HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  private updateEffectSwitches(active: EffectName | null): void {
    for (const effectSwitch of this.effectSwitches) {
      effectSwitch.service.getCharacteristic(this.Characteristic.On)
        .updateValue(effectSwitch.name === active);
    }
  }
}
