import simplify from 'simplify-js';
import { Point } from '../models/wire.types';

export class GeometryService {
  /** Resolution of endpoint keys: coordinates are rounded to 1 / KEY_SCALE units */
  private readonly KEY_SCALE = 10;

  /**
   * Simplify a path using Ramer-Douglas-Peucker algorithm
   */
  simplifyPath(points: Point[], tolerance: number = 1.0): Point[] {
    if (points.length <= 2) return points;
    return simplify(points, tolerance, true);
  }

  distance(a: Point, b: Point): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
  }

  /**
   * Endpoint grouping key. Points that round to the same tenth of a unit on
   * both axes share a key and count as one endpoint.
   */
  pointKey(p: Point): string {
    return `${Math.round(p.x * this.KEY_SCALE)},${Math.round(p.y * this.KEY_SCALE)}`;
  }

  pointsEqual(a: Point, b: Point): boolean {
    return this.pointKey(a) === this.pointKey(b);
  }

  /**
   * Shortest distance from a point to a line segment
   */
  pointToSegmentDistance(p: Point, start: Point, end: Point): number {
    const dx = end.x - start.x;
    const dy = end.y - start.y;

    if (dx === 0 && dy === 0) {
      return this.distance(p, start);
    }

    // Projection parameter, clamped to the segment
    const t = Math.max(0, Math.min(1, ((p.x - start.x) * dx + (p.y - start.y) * dy) / (dx * dx + dy * dy)));

    return this.distance(p, { x: start.x + t * dx, y: start.y + t * dy });
  }

  /**
   * Get bounding box of points
   */
  getBoundingBox(points: Point[]): {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
    width: number;
    height: number;
  } {
    if (points.length === 0) {
      return { minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 };
    }

    const xs = points.map(p => p.x);
    const ys = points.map(p => p.y);

    const minX = Math.min(...xs);
    const minY = Math.min(...ys);
    const maxX = Math.max(...xs);
    const maxY = Math.max(...ys);

    return {
      minX,
      minY,
      maxX,
      maxY,
      width: maxX - minX,
      height: maxY - minY
    };
  }
}
