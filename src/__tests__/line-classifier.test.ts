import { LineClassifier } from '../services/line-classifier.service';
import { LineType, WireColor } from '../models/wire.types';
import { makeSegment } from './helpers/segment-factory.helper';

describe('LineClassifier', () => {
  let classifier: LineClassifier;

  beforeEach(() => {
    classifier = new LineClassifier(800, 600);
  });

  describe('structural lines', () => {
    it('should classify long lines along the page edge as border', () => {
      const top = makeSegment(0, 5, 590, 5, WireColor.BLACK);
      const left = makeSegment(5, 0, 5, 450, WireColor.BLACK);

      expect(classifier.classifyLine(top)).toBe(LineType.BORDER);
      expect(classifier.classifyLine(left)).toBe(LineType.BORDER);
    });

    it('should not call a short edge line a border', () => {
      const line = makeSegment(100, 5, 300, 5, WireColor.BLACK);

      expect(classifier.isBorder(line)).toBe(false);
      expect(classifier.classifyLine(line)).toBe(LineType.TITLE_BLOCK);
    });

    it('should classify lines in the bottom title block', () => {
      expect(classifier.classifyLine(makeSegment(600, 550, 700, 550, WireColor.BLACK))).toBe(LineType.TITLE_BLOCK);
      expect(classifier.classifyLine(makeSegment(50, 560, 750, 560, WireColor.BLACK))).toBe(LineType.TITLE_BLOCK);
    });

    it('should classify short lines in the header band', () => {
      expect(classifier.classifyLine(makeSegment(100, 10, 100, 15, WireColor.BLACK))).toBe(LineType.TITLE_BLOCK);
    });

    it('should apply the size condition in the header band as well', () => {
      const longHeaderRule = makeSegment(100, 10, 450, 10, WireColor.BLACK);
      const fullHeaderRule = makeSegment(100, 10, 500, 10, WireColor.BLACK);

      expect(classifier.isTitleBlock(longHeaderRule)).toBe(false);
      expect(classifier.classifyLine(longHeaderRule)).toBe(LineType.WIRE);
      expect(classifier.classifyLine(fullHeaderRule)).toBe(LineType.TITLE_BLOCK);
    });
  });

  describe('table grids', () => {
    const rows = [10, 20, 30, 40, 50].map(y => makeSegment(100, y, 450, y, WireColor.BLACK));

    it('should classify evenly spaced parallel lines as grid', () => {
      for (const row of rows) {
        expect(classifier.classifyLine(row, rows)).toBe(LineType.TABLE_GRID);
      }
    });

    it('should need the rest of the page to see a grid', () => {
      expect(classifier.classifyLine(rows[2])).toBe(LineType.WIRE);
    });

    it('should not treat irregular spacing as a grid', () => {
      const irregular = [100, 110, 160].map(y => makeSegment(100, y, 450, y, WireColor.BLACK));

      expect(classifier.isGridLine(irregular[0], irregular)).toBe(false);
      expect(classifier.classifyLine(irregular[0], irregular)).toBe(LineType.WIRE);
    });
  });

  describe('component outlines', () => {
    const box = [
      makeSegment(100, 100, 120, 100, WireColor.BLACK),
      makeSegment(120, 100, 120, 120, WireColor.BLACK),
      makeSegment(120, 120, 100, 120, WireColor.BLACK),
      makeSegment(100, 120, 100, 100, WireColor.BLACK),
    ];

    it('should classify the sides of a small box as outline', () => {
      for (const side of box) {
        expect(classifier.classifyLine(side, box)).toBe(LineType.COMPONENT_OUTLINE);
      }
    });

    it('should respect the configured neighbour count', () => {
      const strict = new LineClassifier(800, 600, { minOutlineNeighbours: 3 });
      expect(strict.classifyLine(box[0], box)).toBe(LineType.UNKNOWN);
    });

    it('should never treat wire-colored edges as outline', () => {
      const redBox = box.map(side =>
        makeSegment(side.start.x, side.start.y, side.end.x, side.end.y, WireColor.RED)
      );
      expect(classifier.isComponentOutline(redBox[0], redBox)).toBe(false);
      expect(classifier.classifyLine(redBox[0], redBox)).toBe(LineType.WIRE);
    });
  });

  describe('determinism', () => {
    it('should give the same labels when a page is classified twice', () => {
      const page = [
        makeSegment(0, 5, 590, 5, WireColor.BLACK),
        ...[10, 20, 30, 40, 50].map(y => makeSegment(100, y, 450, y, WireColor.BLACK)),
        makeSegment(100, 100, 120, 100, WireColor.BLACK),
        makeSegment(120, 100, 120, 120, WireColor.BLACK),
        makeSegment(120, 120, 100, 120, WireColor.BLACK),
        makeSegment(300, 300, 372, 396, WireColor.RED),
        makeSegment(300, 300, 324, 332, WireColor.BLACK),
        makeSegment(600, 550, 700, 550, WireColor.BLACK),
      ];

      const first = page.map(line => classifier.classifyLine(line, page));
      const second = page.map(line => new LineClassifier(800, 600).classifyLine(line, page));

      expect(second).toEqual(first);
      expect(first[0]).toBe(LineType.BORDER);
      expect(first[3]).toBe(LineType.TABLE_GRID);
      expect(first[7]).toBe(LineType.COMPONENT_OUTLINE);
      expect(first[9]).toBe(LineType.WIRE);
      expect(first[11]).toBe(LineType.TITLE_BLOCK);
    });
  });

  describe('wire characteristics', () => {
    it('should accept long lines of any color', () => {
      expect(classifier.classifyLine(makeSegment(300, 300, 372, 396, WireColor.RED))).toBe(LineType.WIRE);
    });

    it('should accept medium black lines only when orthogonal', () => {
      expect(classifier.classifyLine(makeSegment(300, 300, 340, 300, WireColor.BLACK))).toBe(LineType.WIRE);
      expect(classifier.classifyLine(makeSegment(300, 300, 324, 332, WireColor.BLACK))).toBe(LineType.UNKNOWN);
    });

    it('should accept short gray lines only when orthogonal', () => {
      expect(classifier.classifyLine(makeSegment(300, 300, 300, 320, WireColor.GRAY))).toBe(LineType.WIRE);
      expect(classifier.classifyLine(makeSegment(300, 300, 320, 300, WireColor.BLACK))).toBe(LineType.UNKNOWN);
    });

    it('should accept short red, blue and green connector stubs', () => {
      expect(classifier.classifyLine(makeSegment(100, 200, 110, 210, WireColor.BLUE))).toBe(LineType.WIRE);
      expect(classifier.classifyLine(makeSegment(100, 200, 106, 208, WireColor.ORANGE))).toBe(LineType.UNKNOWN);
    });

    it('should reject stubs shorter than the minimum', () => {
      expect(classifier.hasWireCharacteristics(makeSegment(0, 0, 5, 0, WireColor.RED))).toBe(false);
    });
  });
});
