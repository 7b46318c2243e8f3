import { GeometryService } from '../services/geometry.service';
import { Point } from '../models/wire.types';

describe('GeometryService', () => {
  let service: GeometryService;

  beforeEach(() => {
    service = new GeometryService();
  });

  describe('simplifyPath', () => {
    it('should drop collinear points', () => {
      const points: Point[] = [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 0 },
        { x: 3, y: 0 },
        { x: 3, y: 3 },
      ];

      expect(service.simplifyPath(points, 1.0)).toEqual([
        { x: 0, y: 0 },
        { x: 3, y: 0 },
        { x: 3, y: 3 },
      ]);
    });

    it('should return short paths unchanged', () => {
      const points: Point[] = [{ x: 0, y: 0 }, { x: 5, y: 5 }];
      expect(service.simplifyPath(points)).toBe(points);
    });
  });

  describe('pointKey', () => {
    it('should round coordinates to a tenth of a unit', () => {
      expect(service.pointKey({ x: 1.04, y: 2 })).toBe('10,20');
      expect(service.pointKey({ x: 300, y: 200 })).toBe('3000,2000');
    });

    it('should treat points in the same tenth as equal', () => {
      expect(service.pointsEqual({ x: 1.04, y: 2 }, { x: 1.01, y: 2 })).toBe(true);
      expect(service.pointsEqual({ x: 1, y: 2 }, { x: 1.1, y: 2 })).toBe(false);
    });
  });

  describe('pointToSegmentDistance', () => {
    it('should measure perpendicular distance inside the segment', () => {
      expect(service.pointToSegmentDistance({ x: 5, y: 5 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
    });

    it('should clamp to the nearest endpoint beyond the segment', () => {
      expect(service.pointToSegmentDistance({ x: 13, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
    });

    it('should handle degenerate segments', () => {
      expect(service.pointToSegmentDistance({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(5);
    });
  });

  describe('getBoundingBox', () => {
    it('should compute bounds of a point set', () => {
      const box = service.getBoundingBox([
        { x: 10, y: 20 },
        { x: 40, y: 5 },
        { x: 25, y: 60 },
      ]);

      expect(box).toEqual({ minX: 10, minY: 5, maxX: 40, maxY: 60, width: 30, height: 55 });
    });

    it('should return an empty box for no points', () => {
      expect(service.getBoundingBox([])).toEqual({ minX: 0, minY: 0, maxX: 0, maxY: 0, width: 0, height: 0 });
    });
  });
});
