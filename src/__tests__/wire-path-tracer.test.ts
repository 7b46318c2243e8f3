import { WirePathTracer } from '../services/wire-path-tracer.service';
import { WireColor } from '../models/wire.types';
import { makeSegment } from './helpers/segment-factory.helper';

describe('WirePathTracer', () => {
  let tracer: WirePathTracer;

  beforeEach(() => {
    tracer = new WirePathTracer(5.0);
  });

  describe('tracePaths', () => {
    it('should return no paths for no segments', () => {
      expect(tracer.tracePaths([])).toEqual([]);
    });

    it('should join a closed loop into one path', () => {
      const square = [
        makeSegment(0, 0, 10, 0),
        makeSegment(10, 0, 10, 10),
        makeSegment(10, 10, 0, 10),
        makeSegment(0, 10, 0, 0),
      ];

      const paths = tracer.tracePaths(square);

      expect(paths).toHaveLength(1);
      expect(paths[0].segments).toHaveLength(4);
      expect(paths[0].segments[0]).toBe(square[0]);
      expect(paths[0].color).toBe(WireColor.RED);
    });

    it('should bridge gaps within the tolerance', () => {
      const a = makeSegment(0, 0, 100, 0);
      const b = makeSegment(104.9, 0, 200, 0);

      const paths = tracer.tracePaths([a, b]);

      expect(paths).toHaveLength(1);
      expect(paths[0].segments).toEqual([a, b]);
    });

    it('should not bridge gaps beyond the tolerance', () => {
      const paths = tracer.tracePaths([makeSegment(0, 0, 100, 0), makeSegment(105.1, 0, 200, 0)]);

      expect(paths).toHaveLength(2);
    });

    it('should not bridge anything with zero tolerance', () => {
      const exact = new WirePathTracer(0);
      const paths = exact.tracePaths([makeSegment(0, 0, 100, 0), makeSegment(100.5, 0, 200, 0)]);

      expect(paths).toHaveLength(2);
    });

    it('should split touching segments of different colors', () => {
      const chain = [
        makeSegment(0, 0, 50, 0, WireColor.RED),
        makeSegment(50, 0, 100, 0, WireColor.BLUE),
        makeSegment(100, 0, 150, 0, WireColor.RED),
      ];

      const paths = tracer.tracePaths(chain);

      expect(paths.map(path => path.color)).toEqual([WireColor.RED, WireColor.BLUE, WireColor.RED]);
      expect(paths.every(path => path.segments.length === 1)).toBe(true);
    });

    it('should keep a zero-length segment as its own path', () => {
      const dot = makeSegment(10, 10, 10, 10);
      const paths = tracer.tracePaths([dot]);

      expect(paths).toHaveLength(1);
      expect(paths[0].segments).toEqual([dot]);
    });

    it('should put every segment in exactly one path', () => {
      const segments = [
        makeSegment(0, 0, 50, 0),
        makeSegment(50, 0, 50, 50),
        makeSegment(300, 300, 350, 300, WireColor.BLUE),
        makeSegment(352, 300, 400, 300, WireColor.BLUE),
        makeSegment(0, 200, 80, 200, WireColor.GREEN),
      ];

      const paths = tracer.tracePaths(segments);
      const members = paths.flatMap(path => [...path.segments]);

      expect(paths).toHaveLength(3);
      expect(members).toHaveLength(segments.length);
      expect(new Set(members).size).toBe(segments.length);
    });
  });

  describe('findJunctions', () => {
    it('should report points where three segments meet', () => {
      const junctions = tracer.findJunctions([
        makeSegment(0, 50, 100, 50),
        makeSegment(100, 50, 200, 50),
        makeSegment(100, 50, 100, 150),
      ]);

      expect(junctions).toEqual([{ x: 100, y: 50 }]);
    });

    it('should not report plain corners', () => {
      expect(tracer.findJunctions([makeSegment(0, 0, 50, 0), makeSegment(50, 0, 50, 50)])).toEqual([]);
    });

    it('should not count tolerance bridges', () => {
      const junctions = tracer.findJunctions([
        makeSegment(0, 50, 100, 50),
        makeSegment(100, 50, 200, 50),
        makeSegment(102, 50, 102, 150),
      ]);

      expect(junctions).toEqual([]);
    });
  });
});
