export interface Rgb {
  red: number;
  green: number;
  blue: number;
}

/**
 * HomeKit hue (0-360) and saturation (0-100) at full value. Brightness is a
 * separate command on these controllers, so the colour frame stays at full scale.
 */
export function hueSaturationToRgb(hue: number, saturation: number): Rgb {
  const h = (((hue % 360) + 360) % 360) / 60;
  const s = Math.max(0, Math.min(100, saturation)) / 100;
  const chroma = s;
  const x = chroma * (1 - Math.abs((h % 2) - 1));
  const m = 1 - chroma;

  let r = 0;
  let g = 0;
  let b = 0;
  if (h < 1) {
    [r, g, b] = [chroma, x, 0];
  } else if (h < 2) {
    [r, g, b] = [x, chroma, 0];
  } else if (h < 3) {
    [r, g, b] = [0, chroma, x];
  } else if (h < 4) {
    [r, g, b] = [0, x, chroma];
  } else if (h < 5) {
    [r, g, b] = [x, 0, chroma];
  } else {
    [r, g, b] = [chroma, 0, x];
  }

  return {
    red: Math.round((r + m) * 255),
    green: Math.round((g + m) * 255),
    blue: Math.round((b + m) * 255),
  };
}
