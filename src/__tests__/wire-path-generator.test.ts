import { WirePathGenerator } from '../services/wire-path-generator.service';
import { UNKNOWN_VOLTAGE } from '../models/wire.types';

describe('WirePathGenerator', () => {
  let generator: WirePathGenerator;

  beforeEach(() => {
    generator = new WirePathGenerator();
  });

  describe('generateManhattanPath', () => {
    it('should leave vertically when the axes tie', () => {
      expect(generator.generateManhattanPath(0, 0, 100, 100)).toEqual([
        { x: 0, y: 0 },
        { x: 0, y: 50 },
        { x: 100, y: 50 },
        { x: 100, y: 100 },
      ]);
    });

    it('should leave horizontally along a dominant x axis', () => {
      expect(generator.generateManhattanPath(0, 0, 200, 50)).toEqual([
        { x: 0, y: 0 },
        { x: 100, y: 0 },
        { x: 100, y: 50 },
        { x: 200, y: 50 },
      ]);
    });

    it('should honour an explicit exit direction', () => {
      expect(generator.generateManhattanPath(0, 0, 100, 100, 'horizontal')).toEqual([
        { x: 0, y: 0 },
        { x: 50, y: 0 },
        { x: 50, y: 100 },
        { x: 100, y: 100 },
      ]);
    });

    it('should only produce axis-aligned steps', () => {
      const points = generator.generateManhattanPath(13, 7, -40, 90);

      for (let i = 1; i < points.length; i++) {
        const sameX = points[i].x === points[i - 1].x;
        const sameY = points[i].y === points[i - 1].y;
        expect(sameX || sameY).toBe(true);
      }
    });
  });

  describe('generateLPath', () => {
    it('should bend at the target x when going horizontal first', () => {
      expect(generator.generateLPath(0, 0, 100, 100, true)).toEqual([
        { x: 0, y: 0 },
        { x: 100, y: 0 },
        { x: 100, y: 100 },
      ]);
    });

    it('should bend once', () => {
      expect(generator.generateLPath(0, 0, 100, 50)).toEqual([
        { x: 0, y: 0 },
        { x: 100, y: 0 },
        { x: 100, y: 50 },
      ]);
      expect(generator.generateLPath(0, 0, 100, 50, false)).toEqual([
        { x: 0, y: 0 },
        { x: 0, y: 50 },
        { x: 100, y: 50 },
      ]);
    });
  });

  describe('generateStraightLine', () => {
    it('should return the endpoints unchanged', () => {
      expect(generator.generateStraightLine(0, 0, 100, 100)).toEqual([
        { x: 0, y: 0 },
        { x: 100, y: 100 },
      ]);
    });
  });

  describe('generateSmoothPath', () => {
    it('should sample a curve bowed to one side', () => {
      const points = generator.generateSmoothPath(0, 0, 100, 0);

      expect(points).toHaveLength(11);
      expect(points[0]).toEqual({ x: 0, y: 0 });
      expect(points[10]).toEqual({ x: 100, y: 0 });
      expect(points[5].x).toBeCloseTo(50);
      expect(points[5].y).toBeCloseTo(5);
    });

    it('should honour the sample count', () => {
      expect(generator.generateSmoothPath(0, 0, 0, 100, 4)).toHaveLength(5);
    });

    it('should degrade to a straight line for coincident points', () => {
      expect(generator.generateSmoothPath(5, 5, 5.5, 5)).toEqual([
        { x: 5, y: 5 },
        { x: 5.5, y: 5 },
      ]);
    });
  });

  describe('generatePath', () => {
    it('should dispatch on style', () => {
      const from = { x: 0, y: 0 };
      const to = { x: 30, y: 40 };

      expect(generator.generatePath('straight', from, to)).toEqual([from, to]);
      expect(generator.generatePath('l_path', from, to)).toHaveLength(3);
      expect(generator.generatePath('manhattan', from, to)).toHaveLength(4);
      expect(generator.generatePath('smooth', from, to)).toHaveLength(11);
    });
  });

  describe('routeConnections', () => {
    const positions = {
      K1: { x: 0, y: 0, width: 40, height: 30 },
      M1: { x: 200, y: 100, width: 40, height: 30 },
    };

    it('should route between device centres', () => {
      const wires = generator.routeConnections(
        [{ sourceDevice: 'K1', targetDevice: 'M1', voltageLevel: '24VDC', wireColor: 'red' }],
        positions
      );

      expect(wires).toEqual([
        {
          fromComponentId: 'K1',
          toComponentId: 'M1',
          voltageLevel: '24VDC',
          wireColor: 'red',
          path: [
            { x: 20, y: 15 },
            { x: 120, y: 15 },
            { x: 120, y: 115 },
            { x: 220, y: 115 },
          ],
        },
      ]);
    });

    it('should skip connections to unplaced devices', () => {
      const wires = generator.routeConnections(
        [
          { sourceDevice: 'K1', targetDevice: 'X9' },
          { sourceDevice: 'M1', targetDevice: 'K1' },
        ],
        positions,
        'straight'
      );

      expect(wires).toHaveLength(1);
      expect(wires[0].voltageLevel).toBe(UNKNOWN_VOLTAGE);
      expect(wires[0].wireColor).toBe('');
      expect(wires[0].path).toEqual([{ x: 220, y: 115 }, { x: 20, y: 15 }]);
    });
  });
});
