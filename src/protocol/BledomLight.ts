import type { Logger } from 'homebridge';
import type { BledomConnectionManager } from '../ble/BledomConnectionManager';
import { hueSaturationToRgb } from './color';

// The controller never reports back, so this is the last state we sent.
export interface LightState {
  on: boolean;
  brightness: number; // 0-100
  hue: number;        // 0-360
  saturation: number; // 0-100
}

export function createDefaultLightState(): LightState {
  return { on: false, brightness: 100, hue: 0, saturation: 0 };
}

export class BledomLight {
  readonly state: LightState = createDefaultLightState();

  constructor(
    private readonly connectionManager: BledomConnectionManager,
    private readonly log: Logger,
  ) {}

  onConnect(callback: (deviceId: string) => void): void {
    this.connectionManager.onConnect((device) => callback(device.id));
  }

  async setPower(on: boolean): Promise<void> {
    await this.connectionManager.enqueue('setPower', (device) => device.setPower(on));
    this.state.on = on;
  }

  async setBrightness(level: number): Promise<void> {
    const clamped = Math.max(0, Math.min(100, Math.round(level)));
    await this.connectionManager.enqueue('setBrightness', (device) => device.setBrightness(clamped));
    this.state.brightness = clamped;
  }

  async setHueSaturation(hue: number, saturation: number): Promise<void> {
    const { red, green, blue } = hueSaturationToRgb(hue, saturation);
    this.log.debug('Hue %d / saturation %d -> rgb(%d, %d, %d)', hue, saturation, red, green, blue);
    await this.connectionManager.enqueue('setColor', (device) => device.setColor(red, green, blue));
    this.state.hue = hue;
    this.state.saturation = saturation;
  }

  async setEffect(code: number): Promise<void> {
    await this.connectionManager.enqueue('setEffect', (device) => device.setEffect(code));
  }

  async setEffectSpeed(speed: number): Promise<void> {
    await this.connectionManager.enqueue('setEffectSpeed', (device) => device.setEffectSpeed(speed));
  }

  async shutdown(): Promise<void> {
    await this.connectionManager.disconnect();
  }
}
