import { Point, Rgb, WireColor, voltageForColor } from './wire.types';

export interface LineSegmentInit {
  pageIndex: number;
  start: Point;
  end: Point;
  color: WireColor;
  rgb: Rgb;
  thickness: number;
}

/**
 * A straight stroke on one page, with its color already bucketed.
 */
export class LineSegment {
  readonly pageIndex: number;
  readonly start: Readonly<Point>;
  readonly end: Readonly<Point>;
  readonly color: WireColor;
  readonly rgb: Rgb;
  readonly thickness: number;

  constructor(init: LineSegmentInit) {
    this.pageIndex = init.pageIndex;
    this.start = Object.freeze({ x: init.start.x, y: init.start.y });
    this.end = Object.freeze({ x: init.end.x, y: init.end.y });
    this.color = init.color;
    this.rgb = init.rgb;
    this.thickness = init.thickness;
    Object.freeze(this);
  }

  get length(): number {
    return Math.hypot(this.end.x - this.start.x, this.end.y - this.start.y);
  }

  /** Δx more than three times Δy */
  get isHorizontal(): boolean {
    return Math.abs(this.end.x - this.start.x) > Math.abs(this.end.y - this.start.y) * 3;
  }

  get isVertical(): boolean {
    return Math.abs(this.end.y - this.start.y) > Math.abs(this.end.x - this.start.x) * 3;
  }

  get voltageType(): string {
    return voltageForColor(this.color);
  }

  toJSON(): SegmentDto {
    return {
      pageIndex: this.pageIndex,
      start: { x: this.start.x, y: this.start.y },
      end: { x: this.end.x, y: this.end.y },
      color: this.color,
      rgb: [this.rgb[0], this.rgb[1], this.rgb[2]],
      thickness: this.thickness,
      length: this.length,
    };
  }
}

export interface SegmentDto {
  pageIndex: number;
  start: Point;
  end: Point;
  color: WireColor;
  rgb: [number, number, number];
  thickness: number;
  length: number;
}
