import { LineSegment } from '../models/line-segment.model';
import { LineType, WireColor } from '../models/wire.types';
import { GeometryService } from './geometry.service';

export interface LineClassifierOptions {
  /** Distance from a page edge within which a long line counts as frame */
  borderMargin?: number;
  /** Fraction of page height below which the title block starts */
  titleBlockRatio?: number;
  /** Alignment tolerance for table grid detection */
  gridTolerance?: number;
  /** Endpoint proximity for component outline detection */
  outlineTolerance?: number;
  /** Similar-sized neighbours needed before a short edge counts as an outline */
  minOutlineNeighbours?: number;
}

/** Colored ink is reserved for conductors */
const WIRE_INK: ReadonlySet<WireColor> = new Set<WireColor>([
  WireColor.RED,
  WireColor.BLUE,
  WireColor.GREEN,
  WireColor.BROWN,
  WireColor.ORANGE,
]);

const UNCOLORED: ReadonlySet<WireColor> = new Set<WireColor>([
  WireColor.BLACK,
  WireColor.GRAY,
  WireColor.WHITE,
  WireColor.OTHER,
]);

const CONNECTOR_STUB_INK: ReadonlySet<WireColor> = new Set<WireColor>([
  WireColor.RED,
  WireColor.BLUE,
  WireColor.GREEN,
]);

const HEADER_BAND = 20;
const MAX_OUTLINE_LENGTH = 50;
const STRICT_OUTLINE_LENGTH = 25;

/**
 * Tells wires apart from page frames, title blocks, table grids and symbol
 * outlines on a single page.
 *
 * Frames, title blocks and grids are recognised by position and repetition
 * (they are usually black). Wires are recognised by color and length. Rules run
 * in a fixed order and the first match wins.
 */
export class LineClassifier {
  private readonly geometry = new GeometryService();
  private readonly borderMargin: number;
  private readonly titleBlockY: number;
  private readonly gridTolerance: number;
  private readonly outlineTolerance: number;
  private readonly minOutlineNeighbours: number;

  constructor(
    private readonly pageWidth: number,
    private readonly pageHeight: number,
    options: LineClassifierOptions = {}
  ) {
    this.borderMargin = options.borderMargin ?? 20;
    this.titleBlockY = pageHeight * (options.titleBlockRatio ?? 0.85);
    this.gridTolerance = options.gridTolerance ?? 3;
    this.outlineTolerance = options.outlineTolerance ?? 8;
    this.minOutlineNeighbours = options.minOutlineNeighbours ?? 2;
  }

  classifyLine(line: LineSegment, allLines: readonly LineSegment[] = []): LineType {
    if (this.isBorder(line)) {
      return LineType.BORDER;
    }

    if (this.isTitleBlock(line)) {
      return LineType.TITLE_BLOCK;
    }

    if (allLines.length > 0 && this.isGridLine(line, allLines)) {
      return LineType.TABLE_GRID;
    }

    if (allLines.length > 0 && this.isComponentOutline(line, allLines)) {
      return LineType.COMPONENT_OUTLINE;
    }

    if (this.hasWireCharacteristics(line)) {
      return LineType.WIRE;
    }

    return LineType.UNKNOWN;
  }

  /**
   * Long line hugging a page edge
   */
  isBorder(line: LineSegment): boolean {
    const margin = this.borderMargin;
    const { start, end } = line;

    const nearLeft = start.x < margin || end.x < margin;
    const nearRight = start.x > this.pageWidth - margin || end.x > this.pageWidth - margin;
    const nearTop = start.y < margin || end.y < margin;
    const nearBottom = start.y > this.pageHeight - margin || end.y > this.pageHeight - margin;

    if (line.isHorizontal && (nearTop || nearBottom) && line.length >= this.pageWidth * 0.7) {
      return true;
    }

    if (line.isVertical && (nearLeft || nearRight) && line.length >= this.pageHeight * 0.7) {
      return true;
    }

    return false;
  }

  /**
   * Line inside the header band or the bottom title block, provided it is
   * either short or a horizontal rule across half the page.
   *
   * The size condition covers the header band too: long header rules that
   * fall short of half the page width go on to grid and wire checks, which
   * is what lets a table starting at the top of the page read as a grid.
   */
  isTitleBlock(line: LineSegment): boolean {
    const { start, end } = line;

    const inHeader = start.y < HEADER_BAND && end.y < HEADER_BAND;
    const inFooter = start.y > this.titleBlockY && end.y > this.titleBlockY;

    if (!inHeader && !inFooter) {
      return false;
    }

    if (line.length < this.pageWidth * 0.4) {
      return true;
    }

    return line.isHorizontal && line.length >= this.pageWidth * 0.5;
  }

  /**
   * One of at least three parallel, overlapping lines with a constant spacing
   */
  isGridLine(line: LineSegment, allLines: readonly LineSegment[]): boolean {
    if (!line.isHorizontal && !line.isVertical) {
      return false;
    }

    const horizontal = line.isHorizontal;
    const tolerance = this.gridTolerance;
    const [ownLow, ownHigh] = this.span(line, horizontal);
    const own = this.offset(line, horizontal);

    const offsets: number[] = [];
    for (const other of allLines) {
      if (other === line) continue;
      if (horizontal ? !other.isHorizontal : !other.isVertical) continue;

      const [low, high] = this.span(other, horizontal);
      if (high < ownLow - tolerance || low > ownHigh + tolerance) continue;

      const offset = this.offset(other, horizontal);
      // Collinear pieces of the same rule are not another row
      if (Math.abs(offset - own) <= tolerance) continue;

      offsets.push(offset);
    }

    if (offsets.length < 2) {
      return false;
    }

    const rows = this.mergeClose([own, ...offsets], tolerance);
    const index = rows.findIndex(value => Math.abs(value - own) <= tolerance);

    // Any run of three consecutive rows that includes this one
    for (let first = Math.max(0, index - 2); first <= index && first + 2 < rows.length; first++) {
      const gapA = rows[first + 1] - rows[first];
      const gapB = rows[first + 2] - rows[first + 1];
      if (Math.abs(gapA - gapB) < tolerance * 2) {
        return true;
      }
    }

    return false;
  }

  /**
   * Short uncolored edge with similar-sized neighbours at its endpoints,
   * i.e. one side of a small closed or nearly closed shape
   */
  isComponentOutline(line: LineSegment, allLines: readonly LineSegment[]): boolean {
    if (line.length > MAX_OUTLINE_LENGTH) {
      return false;
    }

    if (WIRE_INK.has(line.color)) {
      return false;
    }

    if (line.length >= STRICT_OUTLINE_LENGTH || line.length === 0) {
      return false;
    }

    const tolerance = this.outlineTolerance;
    let nearbyCount = 0;

    for (const other of allLines) {
      if (other === line || other.length > MAX_OUTLINE_LENGTH) continue;

      const touches =
        this.geometry.distance(line.start, other.start) < tolerance ||
        this.geometry.distance(line.start, other.end) < tolerance ||
        this.geometry.distance(line.end, other.start) < tolerance ||
        this.geometry.distance(line.end, other.end) < tolerance;

      if (!touches) continue;

      const ratio = other.length / line.length;
      if (ratio > 0.5 && ratio < 2.0) {
        nearbyCount++;
        if (nearbyCount >= this.minOutlineNeighbours) {
          return true;
        }
      }
    }

    return false;
  }

  hasWireCharacteristics(line: LineSegment): boolean {
    const length = line.length;
    const orthogonal = line.isHorizontal || line.isVertical;

    if (length > 50) {
      return true;
    }

    if (length > 30 && (!UNCOLORED.has(line.color) || orthogonal)) {
      return true;
    }

    if (length > 15) {
      if (WIRE_INK.has(line.color)) {
        return true;
      }
      if (line.color === WireColor.GRAY && orthogonal) {
        return true;
      }
    }

    // Short colored diagonal stubs connecting into symbols
    return length >= 8 && CONNECTOR_STUB_INK.has(line.color);
  }

  /** Extent along the line's own axis */
  private span(line: LineSegment, horizontal: boolean): [number, number] {
    const a = horizontal ? line.start.x : line.start.y;
    const b = horizontal ? line.end.x : line.end.y;
    return a <= b ? [a, b] : [b, a];
  }

  /** Position across the line's axis */
  private offset(line: LineSegment, horizontal: boolean): number {
    return horizontal ? (line.start.y + line.end.y) / 2 : (line.start.x + line.end.x) / 2;
  }

  private mergeClose(values: number[], tolerance: number): number[] {
    const sorted = [...values].sort((a, b) => a - b);
    const merged: number[] = [];
    for (const value of sorted) {
      if (merged.length > 0 && value - merged[merged.length - 1] <= tolerance) continue;
      merged.push(value);
    }
    return merged;
  }
}
