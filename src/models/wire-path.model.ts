import { GeometryService } from '../services/geometry.service';
import { LineSegment } from './line-segment.model';
import { Point, UNKNOWN_VOLTAGE, WireColor, voltageForColor } from './wire.types';

const geometry = new GeometryService();

/**
 * A continuous route: same-colored wire segments connected end to end
 * (directly or across a small gap).
 */
export class WirePath {
  readonly segments: readonly LineSegment[];
  readonly color: WireColor;
  readonly pageIndex: number;

  constructor(segments: readonly LineSegment[] = [], color: WireColor = WireColor.OTHER, pageIndex: number = 0) {
    this.segments = segments;
    this.color = color;
    this.pageIndex = pageIndex;
  }

  /**
   * Start of the first segment followed by the end of every segment
   */
  get points(): Point[] {
    if (this.segments.length === 0) return [];

    const first = this.segments[0];
    return [
      { x: first.start.x, y: first.start.y },
      ...this.segments.map(s => ({ x: s.end.x, y: s.end.y }))
    ];
  }

  get totalLength(): number {
    return this.segments.reduce((sum, s) => sum + s.length, 0);
  }

  get voltageType(): string {
    return this.segments.length > 0 ? voltageForColor(this.color) : UNKNOWN_VOLTAGE;
  }

  simplifiedPoints(tolerance: number = 1.0): Point[] {
    return geometry.simplifyPath(this.points, tolerance);
  }

  toJSON(): WirePathDto {
    const points = this.points;
    return {
      pageIndex: this.pageIndex,
      color: this.color,
      voltageType: this.voltageType,
      segmentCount: this.segments.length,
      totalLength: this.totalLength,
      points,
      simplifiedPoints: this.simplifiedPoints(),
      bounds: geometry.getBoundingBox(points),
    };
  }
}

export interface WirePathDto {
  pageIndex: number;
  color: WireColor;
  voltageType: string;
  segmentCount: number;
  totalLength: number;
  points: Point[];
  /** `points` with collinear and near-collinear vertices removed */
  simplifiedPoints: Point[];
  bounds: ReturnType<GeometryService['getBoundingBox']>;
}
