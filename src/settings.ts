import type { PlatformConfig } from 'homebridge';
import { Effect, type EffectName } from './protocol/constants';

export const PLUGIN_NAME = 'homebridge-elk-bledom';
export const PLATFORM_NAME = 'ElkBledom';

// Advertised local name fragment shared by every controller of this family
export const DEVICE_NAME_MATCH = 'ELK-BLEDOM';

const BASE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

// 16-bit UUID 0xFFF3 on the Bluetooth base UUID
export const LIGHT_CHARACTERISTIC_UUID = uuidFromShort(0xfff3);

// The controller drops back-to-back writes; every frame is followed by this pause.
export const COMMAND_SETTLE_DELAY_MS = 100;

export const BLE_SCAN_TIMEOUT = 15000;

export const DEFAULT_SCAN_RETRIES = 10;
export const DEFAULT_SCAN_INTERVAL_MS = 1000;
export const DEFAULT_CONNECTION_RETRIES = 10;
export const DEFAULT_CONNECTION_INTERVAL_MS = 100;

export function uuidFromShort(value: number): string {
  return value.toString(16).padStart(8, '0') + BASE_UUID_SUFFIX;
}

/**
 * Canonical comparison form: lowercase, no dashes, 16/32-bit forms expanded
 * onto the base UUID. Noble reports `fff3`, other stacks the dashed 128-bit form.
 */
export function normalizeUuid(uuid: string): string {
  const compact = uuid.toLowerCase().replace(/-/g, '');
  if (compact.length === 4 || compact.length === 8) {
    return (compact.padStart(8, '0') + BASE_UUID_SUFFIX).replace(/-/g, '');
  }
  return compact;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface AcquisitionOptions {
  scanRetries: number;
  scanIntervalMs: number;
  connectionRetries: number;
  connectionIntervalMs: number;
}

export const DEFAULT_ACQUISITION_OPTIONS: Readonly<AcquisitionOptions> = Object.freeze({
  scanRetries: DEFAULT_SCAN_RETRIES,
  scanIntervalMs: DEFAULT_SCAN_INTERVAL_MS,
  connectionRetries: DEFAULT_CONNECTION_RETRIES,
  connectionIntervalMs: DEFAULT_CONNECTION_INTERVAL_MS,
});

export interface BledomDeviceConfig extends AcquisitionOptions {
  name: string;
  idleTimeout: number;
  syncTimeOnConnect: boolean;
  effects: EffectName[];
  effectSpeed: number;
}

// As read from config.json, before effect names are checked
export type RawDeviceConfig = Partial<Omit<BledomDeviceConfig, 'effects'>> & { effects?: string[] };

export interface BledomPlatformConfig extends PlatformConfig {
  devices?: RawDeviceConfig[];
}

export function resolveDeviceConfig(raw: RawDeviceConfig): BledomDeviceConfig {
  return {
    name: raw.name ?? 'LED Strip',
    idleTimeout: raw.idleTimeout ?? 60,
    syncTimeOnConnect: raw.syncTimeOnConnect ?? true,
    effects: (raw.effects ?? []).filter(isEffectName),
    effectSpeed: raw.effectSpeed ?? 50,
    scanRetries: raw.scanRetries ?? DEFAULT_SCAN_RETRIES,
    scanIntervalMs: raw.scanIntervalMs ?? DEFAULT_SCAN_INTERVAL_MS,
    connectionRetries: raw.connectionRetries ?? DEFAULT_CONNECTION_RETRIES,
    connectionIntervalMs: raw.connectionIntervalMs ?? DEFAULT_CONNECTION_INTERVAL_MS,
  };
}

export function isEffectName(name: string): name is EffectName {
  return Object.prototype.hasOwnProperty.call(Effect, name);
}
