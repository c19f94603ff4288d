import { describe, expect, it } from 'vitest';

import * as commands from '../src/protocol/commands';
import { Effect, WeekDay, effectName } from '../src/protocol/constants';
import { FrameIntegrityError, InvalidParameterError } from '../src/errors';

const bytes = (frame: Buffer): number[] => Array.from(frame);

describe('frame shape', () => {
    const frames: [string, () => Buffer][] = [
        ['powerOn', () => commands.powerOn()],
        ['powerOff', () => commands.powerOff()],
        ['setBrightness', () => commands.setBrightness(42)],
        ['setEffectSpeed', () => commands.setEffectSpeed(7)],
        ['setEffect', () => commands.setEffect(Effect.BLINK_WHITE)],
        ['setColor', () => commands.setColor(1, 2, 3)],
        ['setCustomTime', () => commands.setCustomTime(12, 30, 15, 3)],
        ['syncTime', () => commands.syncTime(new Date(2024, 0, 1, 8, 0, 0))],
        ['setScheduleOn', () => commands.setScheduleOn(WeekDay.WEEKDAYS, 6, 45, true)],
        ['setScheduleOff', () => commands.setScheduleOff(WeekDay.WEEKEND, 23, 0, false)],
        ['genericCommand', () => commands.genericCommand(0x10, 1, 2, 3, 4)],
    ];

    it.each(frames)('%s emits 9 bytes framed by 0x7e/0xef', (_name, build) => {
        const frame = build();
        expect(frame).toHaveLength(9);
        expect(frame[0]).toBe(0x7e);
        expect(frame[8]).toBe(0xef);
        expect(commands.isWellFormedFrame(frame)).toBe(true);
    });

    it('assertFrame rejects malformed frames', () => {
        expect(() => commands.assertFrame(Buffer.from([0x7e, 0, 1, 0, 0, 0, 0, 0]))).toThrow(FrameIntegrityError);
        expect(() => commands.assertFrame(Buffer.from([0x7f, 0, 1, 0, 0, 0, 0, 0, 0xef]))).toThrow(FrameIntegrityError);
        expect(() => commands.assertFrame(Buffer.from([0x7e, 0, 1, 0, 0, 0, 0, 0, 0xee]))).toThrow(FrameIntegrityError);
    });
});

describe('power', () => {
    it('encodes on and off', () => {
        expect(bytes(commands.powerOn())).toEqual([0x7e, 0x00, 0x04, 0xf0, 0x00, 0x01, 0xff, 0x00, 0xef]);
        expect(bytes(commands.powerOff())).toEqual([0x7e, 0x00, 0x04, 0x00, 0x00, 0x00, 0xff, 0x00, 0xef]);
        expect(commands.setPower(true)).toEqual(commands.powerOn());
    });
});

describe('brightness and effect speed', () => {
    it('accepts the bounds', () => {
        expect(bytes(commands.setBrightness(0))).toEqual([0x7e, 0, 0x01, 0, 0, 0, 0, 0, 0xef]);
        expect(bytes(commands.setBrightness(100))).toEqual([0x7e, 0, 0x01, 100, 0, 0, 0, 0, 0xef]);
        expect(bytes(commands.setEffectSpeed(0))).toEqual([0x7e, 0, 0x02, 0, 0, 0, 0, 0, 0xef]);
        expect(bytes(commands.setEffectSpeed(100))).toEqual([0x7e, 0, 0x02, 100, 0, 0, 0, 0, 0xef]);
    });

    it.each([101, 255, -1, 50.5])('rejects %d', (value) => {
        expect(() => commands.setBrightness(value)).toThrow(InvalidParameterError);
        expect(() => commands.setEffectSpeed(value)).toThrow(InvalidParameterError);
    });

    it('names the field and range in the message', () => {
        expect(() => commands.setBrightness(101)).toThrow(
            'Invalid parameter: brightness value 101 out of supported range (0-100).',
        );
    });
});

describe('effect', () => {
    it('puts the code in arg0 and 0x03 in arg1', () => {
        expect(bytes(commands.setEffect(Effect.JUMP_RED_GREEN_BLUE))).toEqual([0x7e, 0, 0x03, 0x87, 0x03, 0, 0, 0, 0xef]);
    });

    it('maps codes back to names', () => {
        expect(effectName(0x8a)).toBe('CROSSFADE_RED_GREEN_BLUE_YELLOW_CYAN_MAGENTA_WHITE');
        expect(effectName(0x01)).toBeUndefined();
    });
});

describe('color', () => {
    it('encodes red', () => {
        expect(bytes(commands.setColor(255, 0, 0))).toEqual([0x7e, 0, 0x05, 0x03, 255, 0, 0, 0, 0xef]);
    });

    it('accepts the full byte range', () => {
        expect(bytes(commands.setColor(0, 128, 255))).toEqual([0x7e, 0, 0x05, 0x03, 0, 128, 255, 0, 0xef]);
    });

    it('rejects values that do not fit a byte', () => {
        expect(() => commands.setColor(256, 0, 0)).toThrow(InvalidParameterError);
        expect(() => commands.setColor(0, -1, 0)).toThrow(InvalidParameterError);
    });
});

describe('custom time', () => {
    it('accepts the upper bounds', () => {
        expect(bytes(commands.setCustomTime(23, 59, 59, 7))).toEqual([0x7e, 0, 0x83, 23, 59, 59, 7, 0, 0xef]);
    });

    it.each([
        [24, 0, 0, 1],
        [0, 60, 0, 1],
        [0, 0, 60, 1],
        [0, 0, 0, 0],
        [0, 0, 0, 8],
    ])('rejects %d:%d:%d day %d', (hour, minute, second, day) => {
        expect(() => commands.setCustomTime(hour, minute, second, day)).toThrow(InvalidParameterError);
    });
});

describe('syncTime', () => {
    it('reads local wall-clock fields with Monday as day 1', () => {
        // 2024-01-01 was a Monday
        expect(bytes(commands.syncTime(new Date(2024, 0, 1, 9, 5, 30)))).toEqual([0x7e, 0, 0x83, 9, 5, 30, 1, 0, 0xef]);
        // 2024-01-07 was a Sunday
        expect(bytes(commands.syncTime(new Date(2024, 0, 7, 21, 0, 1)))).toEqual([0x7e, 0, 0x83, 21, 0, 1, 7, 0, 0xef]);
    });

    it('converts every weekday', () => {
        const days = [0, 1, 2, 3, 4, 5, 6].map((offset) => commands.isoDayOfWeek(new Date(2024, 0, 1 + offset)));
        expect(days).toEqual([1, 2, 3, 4, 5, 6, 7]);
    });
});

describe('schedules', () => {
    it('adds 0x80 to the days mask when enabled', () => {
        expect(commands.setScheduleOn(WeekDay.MONDAY, 7, 30, true)[7]).toBe(0x81);
        expect(commands.setScheduleOn(WeekDay.MONDAY, 7, 30, false)[7]).toBe(0x01);
    });

    it('encodes the on/off sub flag', () => {
        expect(bytes(commands.setScheduleOn(WeekDay.ALL, 7, 30, true))).toEqual([0x7e, 0, 0x82, 7, 30, 0, 0x00, 0xff, 0xef]);
        expect(bytes(commands.setScheduleOff(WeekDay.WEEKEND, 22, 15, false))).toEqual([0x7e, 0, 0x82, 22, 15, 0, 0x01, 0x60, 0xef]);
    });

    it('accepts 0x7f and rejects 0x80', () => {
        expect(() => commands.setScheduleOn(0x7f, 0, 0, true)).not.toThrow();
        expect(() => commands.setScheduleOn(0x80, 0, 0, true)).toThrow('days bitmask 0x80 is invalid (max 0x7f).');
        expect(() => commands.setScheduleOff(0x80, 0, 0, false)).toThrow(InvalidParameterError);
    });

    it('validates hour and minute', () => {
        expect(() => commands.setScheduleOn(WeekDay.ALL, 24, 0, true)).toThrow(InvalidParameterError);
        expect(() => commands.setScheduleOff(WeekDay.ALL, 0, 60, true)).toThrow(InvalidParameterError);
    });
});

describe('week day table', () => {
    it('derives composites from the single days', () => {
        expect(WeekDay.ALL).toBe(0x7f);
        expect(WeekDay.WEEKDAYS).toBe(0x1f);
        expect(WeekDay.WEEKEND).toBe(0x60);
        expect(WeekDay.NONE).toBe(0);
        expect(Object.isFrozen(WeekDay)).toBe(true);
    });
});

describe('genericCommand', () => {
    it('passes the opcode and arguments through', () => {
        expect(bytes(commands.genericCommand(0x81, 0x8a, 0x8b, 0x01, 0x02))).toEqual([0x7e, 0, 0x81, 0x8a, 0x8b, 0x01, 0x02, 0, 0xef]);
    });

    it('rejects non-byte arguments', () => {
        expect(() => commands.genericCommand(0x100, 0, 0, 0, 0)).toThrow(InvalidParameterError);
    });
});

describe('determinism', () => {
    it('builds byte-identical fresh frames for identical calls', () => {
        const first = commands.setScheduleOff(WeekDay.FRIDAY, 18, 20, true);
        const second = commands.setScheduleOff(WeekDay.FRIDAY, 18, 20, true);
        expect(second).toEqual(first);
        expect(second).not.toBe(first);
    });
});
