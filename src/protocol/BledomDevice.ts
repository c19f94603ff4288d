import type { Logger } from 'homebridge';
import type { CommandChannel } from '../ble/CommandChannel';
import { DeviceBuilder } from '../ble/DeviceBuilder';
import type { BleManager, BlePeripheral } from '../ble/transport';
import type { AcquisitionOptions } from '../settings';
import { effectName } from './constants';
import * as commands from './commands';

/**
 * A connected light with its command characteristic bound. Obtain one from
 * `BledomDevice.builder(...).build()`.
 *
 * Commands are not queued internally: callers must not overlap calls on the
 * same handle, or frames may interleave on the link.
 */
export class BledomDevice {
  constructor(
    private readonly peripheral: BlePeripheral,
    private readonly channel: CommandChannel,
    private readonly log: Logger,
  ) {}

  static builder(manager: BleManager, log: Logger, options: Partial<AcquisitionOptions> = {}): DeviceBuilder {
    return new DeviceBuilder(manager, log, options);
  }

  get id(): string {
    return this.peripheral.id;
  }

  // --- Power ---

  async powerOn(): Promise<void> {
    await this.setPower(true);
  }

  async powerOff(): Promise<void> {
    await this.setPower(false);
  }

  async setPower(on: boolean): Promise<void> {
    const frame = commands.setPower(on);
    this.log.info('Setting power %s', on ? 'ON' : 'OFF');
    await this.channel.send(frame);
  }

  // --- Brightness / colour ---

  async setBrightness(level: number): Promise<void> {
    const frame = commands.setBrightness(level);
    this.log.info('Setting brightness to %d%%', level);
    await this.channel.send(frame);
  }

  async setColor(red: number, green: number, blue: number): Promise<void> {
    const frame = commands.setColor(red, green, blue);
    this.log.info('Setting color to (%d, %d, %d)', red, green, blue);
    await this.channel.send(frame);
  }

  // --- Effects ---

  async setEffect(code: number): Promise<void> {
    const frame = commands.setEffect(code);
    this.log.info('Setting effect to %s', effectName(code) ?? `0x${code.toString(16)}`);
    await this.channel.send(frame);
  }

  async setEffectSpeed(speed: number): Promise<void> {
    const frame = commands.setEffectSpeed(speed);
    this.log.info('Setting effect speed to %d', speed);
    await this.channel.send(frame);
  }

  // --- Clock ---

  async syncTime(now: Date = new Date()): Promise<void> {
    const frame = commands.syncTime(now);
    this.log.info('Syncing clock to %s', now.toTimeString().slice(0, 8));
    await this.channel.send(frame);
  }

  async setCustomTime(hour: number, minute: number, second: number, dayOfWeek: number): Promise<void> {
    const frame = commands.setCustomTime(hour, minute, second, dayOfWeek);
    this.log.info('Setting clock to day %d %d:%d:%d', dayOfWeek, hour, minute, second);
    await this.channel.send(frame);
  }

  // --- Schedules ---

  async setScheduleOn(days: number, hour: number, minute: number, enabled: boolean): Promise<void> {
    const frame = commands.setScheduleOn(days, hour, minute, enabled);
    this.log.info('Setting power-on schedule %d:%d days=0x%s (%s)', hour, minute, days.toString(16), enabled ? 'enabled' : 'disabled');
    await this.channel.send(frame);
  }

  async setScheduleOff(days: number, hour: number, minute: number, enabled: boolean): Promise<void> {
    const frame = commands.setScheduleOff(days, hour, minute, enabled);
    this.log.info('Setting power-off schedule %d:%d days=0x%s (%s)', hour, minute, days.toString(16), enabled ? 'enabled' : 'disabled');
    await this.channel.send(frame);
  }

  // --- Raw ---

  async genericCommand(id: number, subId: number, arg1: number, arg2: number, arg3: number): Promise<void> {
    const frame = commands.genericCommand(id, subId, arg1, arg2, arg3);
    this.log.debug('Sending raw frame %s', frame.toString('hex'));
    await this.channel.send(frame);
  }

  onDisconnect(listener: () => void): () => void {
    return this.peripheral.onDisconnect(listener);
  }

  async disconnect(): Promise<void> {
    this.log.debug('BLE: Disconnecting from %s', this.peripheral.id);
    await this.peripheral.disconnect();
  }
}
