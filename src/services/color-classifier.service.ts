import { Rgb, WireColor } from '../models/wire.types';

export interface Hsv {
  /** Degrees, 0-360 */
  h: number;
  s: number;
  v: number;
}

/**
 * Maps stroke colors to wire color buckets.
 *
 * Checks run in a fixed order and the first match wins:
 * black, white, gray, then hue bands for saturated colors, then an RGB ratio
 * fallback. Every sample ends up in exactly one bucket; anything unrecognised
 * is OTHER.
 */
export class ColorClassifier {
  rgbToHsv(r: number, g: number, b: number): Hsv {
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const delta = max - min;

    const v = max;
    const s = max === 0 ? 0 : delta / max;

    if (delta === 0) {
      return { h: 0, s, v };
    }

    let h: number;
    if (max === r) {
      h = ((g - b) / delta) % 6;
    } else if (max === g) {
      h = (b - r) / delta + 2;
    } else {
      h = (r - g) / delta + 4;
    }

    h *= 60;
    if (h < 0) h += 360;

    return { h, s, v };
  }

  classify(rgb: Rgb): WireColor {
    const [r, g, b] = rgb;
    const { h, s, v } = this.rgbToHsv(r, g, b);

    if (v < 0.15) {
      return WireColor.BLACK;
    }

    // White before gray: both are unsaturated, white is the bright end
    if (v > 0.85 && s < 0.15) {
      return WireColor.WHITE;
    }

    if (s < 0.15 && v > 0.3 && v <= 0.85) {
      return WireColor.GRAY;
    }

    if (s >= 0.25) {
      if (h < 20 || h > 340) {
        return WireColor.RED;
      }

      // Orange is tested before brown, so dim hues in [20, 40) stay orange
      if (h >= 20 && h < 45) {
        return WireColor.ORANGE;
      }

      if (h >= 45 && h < 80) {
        return g > 0.5 && r > 0.5 ? WireColor.YELLOW_GREEN : WireColor.OTHER;
      }

      if (h >= 80 && h < 160) {
        return WireColor.GREEN;
      }

      if (h >= 200 && h < 260) {
        return WireColor.BLUE;
      }

      if (h >= 15 && h < 40 && v < 0.6) {
        return WireColor.BROWN;
      }
    }

    return this.rgbFallback(r, g, b);
  }

  private rgbFallback(r: number, g: number, b: number): WireColor {
    if (r > 0.5 && g < 0.4 && b < 0.4 && r > Math.max(g, b) * 1.5) {
      return WireColor.RED;
    }

    if (b > 0.5 && r < 0.4 && g < 0.4 && b > Math.max(r, g) * 1.5) {
      return WireColor.BLUE;
    }

    if (g > 0.5 && r < 0.4 && b < 0.4 && g > Math.max(r, b) * 1.5) {
      return WireColor.GREEN;
    }

    if (r > 0.3 && r < 0.7 && g < 0.4 && b < 0.3) {
      return WireColor.BROWN;
    }

    if (r < 0.25 && g < 0.25 && b < 0.25) {
      return WireColor.BLACK;
    }

    return WireColor.OTHER;
  }
}
