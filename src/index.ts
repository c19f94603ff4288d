import type { API } from 'homebridge';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings';
import { ElkBledomPlatform } from './platform';

export default (api: API) => {
  api.registerPlatform(PLUGIN_NAME, PLATFORM_NAME, ElkBledomPlatform);
};

// Driver API for use outside Homebridge
export { BledomDevice } from './protocol/BledomDevice';
export { DeviceBuilder } from './ble/DeviceBuilder';
export type { AcquisitionState, AcquisitionStage, StateListener } from './ble/DeviceBuilder';
export { NobleBleManager } from './ble/NobleTransport';
export * from './ble/transport';
export * from './protocol/commands';
export { WeekDay, Effect, effectName } from './protocol/constants';
export type { EffectName, EffectCode } from './protocol/constants';
export * from './errors';
export type { AcquisitionOptions } from './settings';
export { DEFAULT_ACQUISITION_OPTIONS, LIGHT_CHARACTERISTIC_UUID, COMMAND_SETTLE_DELAY_MS } from './settings';
