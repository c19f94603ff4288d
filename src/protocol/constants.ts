// Frame layout: 7E 00 <opcode> <arg0> <arg1> <arg2> <arg3> <arg4> EF
export const FRAME_LENGTH = 9;
export const FRAME_START = 0x7e;
export const FRAME_END = 0xef;

export enum Opcode {
  Brightness   = 0x01,
  EffectSpeed  = 0x02,
  Effect       = 0x03,
  Power        = 0x04,
  Color        = 0x05,
  Schedule     = 0x82,
  Time         = 0x83,
}

// Schedule frames carry the "enabled" flag by adding this to the days mask
export const SCHEDULE_ENABLED_OFFSET = 0x80;

export enum ScheduleKind {
  On  = 0x00,
  Off = 0x01,
}

const MONDAY    = 0x01;
const TUESDAY   = 0x02;
const WEDNESDAY = 0x04;
const THURSDAY  = 0x08;
const FRIDAY    = 0x10;
const SATURDAY  = 0x20;
const SUNDAY    = 0x40;

export const WeekDay = Object.freeze({
  MONDAY,
  TUESDAY,
  WEDNESDAY,
  THURSDAY,
  FRIDAY,
  SATURDAY,
  SUNDAY,
  ALL: MONDAY | TUESDAY | WEDNESDAY | THURSDAY | FRIDAY | SATURDAY | SUNDAY,
  WEEKDAYS: MONDAY | TUESDAY | WEDNESDAY | THURSDAY | FRIDAY,
  WEEKEND: SATURDAY | SUNDAY,
  NONE: 0x00,
} as const);

export const Effect = Object.freeze({
  JUMP_RED_GREEN_BLUE: 0x87,
  JUMP_RED_GREEN_BLUE_YELLOW_CYAN_MAGENTA_WHITE: 0x88,
  CROSSFADE_RED_GREEN_BLUE: 0x89,
  CROSSFADE_RED_GREEN_BLUE_YELLOW_CYAN_MAGENTA_WHITE: 0x8a,
  CROSSFADE_RED: 0x8b,
  CROSSFADE_GREEN: 0x8c,
  CROSSFADE_BLUE: 0x8d,
  CROSSFADE_YELLOW: 0x8e,
  CROSSFADE_CYAN: 0x8f,
  CROSSFADE_MAGENTA: 0x90,
  CROSSFADE_WHITE: 0x91,
  CROSSFADE_RED_GREEN: 0x92,
  CROSSFADE_RED_BLUE: 0x93,
  CROSSFADE_GREEN_BLUE: 0x94,
  BLINK_RED_GREEN_BLUE_YELLOW_CYAN_MAGENTA_WHITE: 0x95,
  BLINK_RED: 0x96,
  BLINK_GREEN: 0x97,
  BLINK_BLUE: 0x98,
  BLINK_YELLOW: 0x99,
  BLINK_CYAN: 0x9a,
  BLINK_MAGENTA: 0x9b,
  BLINK_WHITE: 0x9c,
} as const);

export type EffectName = keyof typeof Effect;
export type EffectCode = (typeof Effect)[EffectName];

export function effectName(code: number): string | undefined {
  for (const [name, value] of Object.entries(Effect)) {
    if (value === code) {
      return name;
    }
  }
  return undefined;
}
