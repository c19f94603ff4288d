#!/usr/bin/env node
/**
 * Standalone BLE scanner to find ELK-BLEDOM light controllers.
 * Usage: npx elk-bledom-scan
 *    or: node dist/src/scan.js
 */

import noble from '@stoprocent/noble';
import { BLE_SCAN_TIMEOUT, DEVICE_NAME_MATCH, PLATFORM_NAME } from './settings';

console.log('Scanning for %s devices (%ds)...', DEVICE_NAME_MATCH, BLE_SCAN_TIMEOUT / 1000);
console.log('Make sure the controller is powered and no phone app is connected to it.\n');

const found = new Map<string, { name: string; rssi: number }>();

noble.on('discover', (peripheral: noble.Peripheral) => {
  const name = peripheral.advertisement?.localName ?? '';
  if (!name.includes(DEVICE_NAME_MATCH)) {
    return;
  }
  const id = peripheral.address !== '' && peripheral.address !== 'unknown'
    ? peripheral.address
    : peripheral.id ?? peripheral.uuid ?? '(unknown)';
  if (found.has(id)) {
    return;
  }

  const rssi = peripheral.rssi ?? 0;
  console.log('  Found: %s [%s] RSSI=%d', name, id, rssi);
  found.set(id, { name, rssi });
});

const startScan = () => {
  noble.startScanning([], false, (err?: Error) => {
    if (err) {
      console.error('Scan error:', err.message);
      process.exit(1);
    }
  });
};

if (noble.state === 'poweredOn') {
  startScan();
} else {
  noble.once('stateChange', (state: string) => {
    if (state === 'poweredOn') {
      startScan();
    } else {
      console.error('Bluetooth adapter state:', state);
      process.exit(1);
    }
  });
}

setTimeout(() => {
  noble.stopScanning();
  console.log('\nScan complete.');
  if (found.size === 0) {
    console.log('No %s devices found.', DEVICE_NAME_MATCH);
  } else {
    const ranked = Array.from(found.entries()).sort(([, a], [, b]) => b.rssi - a.rssi);
    const [nearestId, nearest] = ranked[0];
    console.log('\n%d controller(s) found; nearest is %s [%s] at RSSI %d.', found.size, nearest.name, nearestId, nearest.rssi);
    if (found.size > 1) {
      console.log('The plugin connects to the first match it sees; power off the others while pairing.');
    }
    console.log('\nAdd this to your Homebridge config:');
    console.log(JSON.stringify({
      platform: PLATFORM_NAME,
      devices: [{ name: 'LED Strip' }],
    }, null, 2));
  }
  process.exit(0);
}, BLE_SCAN_TIMEOUT);
