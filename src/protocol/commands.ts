import { FrameIntegrityError, InvalidParameterError } from '../errors';
import {
  FRAME_END,
  FRAME_LENGTH,
  FRAME_START,
  Opcode,
  SCHEDULE_ENABLED_OFFSET,
  ScheduleKind,
  WeekDay,
} from './constants';

export type CommandFrame = Buffer;

function checkRange(field: string, value: number, min: number, max: number, hint = ''): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidParameterError(
      `${field} value ${value} out of supported range (${min}-${max}${hint}).`,
    );
  }
}

function checkByte(field: string, value: number): void {
  checkRange(field, value, 0, 0xff);
}

// 7E 00 <opcode> <a0> <a1> <a2> <a3> <a4> EF
function frame(opcode: number, a0: number, a1 = 0, a2 = 0, a3 = 0, a4 = 0): CommandFrame {
  const data = Buffer.from([FRAME_START, 0x00, opcode, a0, a1, a2, a3, a4, FRAME_END]);
  assertFrame(data);
  return data;
}

export function isWellFormedFrame(data: Uint8Array): boolean {
  return data.length === FRAME_LENGTH && data[0] === FRAME_START && data[FRAME_LENGTH - 1] === FRAME_END;
}

export function assertFrame(data: Uint8Array): void {
  if (!isWellFormedFrame(data)) {
    throw new FrameIntegrityError(
      `Malformed command frame ${Buffer.from(data).toString('hex')} (expected 9 bytes, starting with 0x7e and ending with 0xef)`,
    );
  }
}

// Power: 7E 00 04 F0 00 01 FF 00 EF (on) / 7E 00 04 00 00 00 FF 00 EF (off)
export function setPower(on: boolean): CommandFrame {
  return on
    ? frame(Opcode.Power, 0xf0, 0x00, 0x01, 0xff)
    : frame(Opcode.Power, 0x00, 0x00, 0x00, 0xff);
}

export function powerOn(): CommandFrame {
  return setPower(true);
}

export function powerOff(): CommandFrame {
  return setPower(false);
}

// Brightness: 0-100
export function setBrightness(level: number): CommandFrame {
  checkRange('brightness', level, 0, 100);
  return frame(Opcode.Brightness, level);
}

// Effect speed: 0-100
export function setEffectSpeed(speed: number): CommandFrame {
  checkRange('effect speed', speed, 0, 100);
  return frame(Opcode.EffectSpeed, speed);
}

// Effect: one of the codes in `Effect`, sent as-is
export function setEffect(code: number): CommandFrame {
  checkByte('effect', code);
  return frame(Opcode.Effect, code, 0x03);
}

export function setColor(red: number, green: number, blue: number): CommandFrame {
  checkByte('red', red);
  checkByte('green', green);
  checkByte('blue', blue);
  return frame(Opcode.Color, 0x03, red, green, blue);
}

/**
 * Clock frame for an explicit time. `dayOfWeek` runs from 1 (Monday) to 7 (Sunday).
 */
export function setCustomTime(hour: number, minute: number, second: number, dayOfWeek: number): CommandFrame {
  checkRange('hour', hour, 0, 23);
  checkRange('minute', minute, 0, 59);
  checkRange('second', second, 0, 59);
  checkRange('day of week', dayOfWeek, 1, 7, ', 1=Monday');
  return frame(Opcode.Time, hour, minute, second, dayOfWeek);
}

// Date#getDay() counts from Sunday=0; the controller counts from Monday=1
export function isoDayOfWeek(date: Date): number {
  return ((date.getDay() + 6) % 7) + 1;
}

export function syncTime(now: Date = new Date()): CommandFrame {
  return setCustomTime(now.getHours(), now.getMinutes(), now.getSeconds(), isoDayOfWeek(now));
}

function schedule(kind: ScheduleKind, days: number, hour: number, minute: number, enabled: boolean): CommandFrame {
  if (!Number.isInteger(days) || days < WeekDay.NONE || days > WeekDay.ALL) {
    throw new InvalidParameterError(
      `days bitmask 0x${days.toString(16).padStart(2, '0')} is invalid (max 0x7f).`,
    );
  }
  checkRange('hour', hour, 0, 23);
  checkRange('minute', minute, 0, 59);
  const value = enabled ? days + SCHEDULE_ENABLED_OFFSET : days;
  return frame(Opcode.Schedule, hour, minute, 0x00, kind, value);
}

// Schedule on: 7E 00 82 <hh> <mm> 00 00 <days|+0x80> EF
export function setScheduleOn(days: number, hour: number, minute: number, enabled: boolean): CommandFrame {
  return schedule(ScheduleKind.On, days, hour, minute, enabled);
}

// Schedule off: 7E 00 82 <hh> <mm> 00 01 <days|+0x80> EF
export function setScheduleOff(days: number, hour: number, minute: number, enabled: boolean): CommandFrame {
  return schedule(ScheduleKind.Off, days, hour, minute, enabled);
}

// Raw passthrough for opcodes without a dedicated encoder
export function genericCommand(id: number, subId: number, arg1: number, arg2: number, arg3: number): CommandFrame {
  checkByte('command id', id);
  checkByte('sub id', subId);
  checkByte('arg1', arg1);
  checkByte('arg2', arg2);
  checkByte('arg3', arg3);
  return frame(id, subId, arg1, arg2, arg3);
}
