import { LineSegment } from '../models/line-segment.model';
import { ALL_LINE_TYPES, ALL_WIRE_COLORS, LineType, WireColor } from '../models/wire.types';

/**
 * Aggregate counts for one page or a whole document.
 * Color, voltage, length and orientation figures cover wires only.
 */
export interface WireStatistics {
  pageCount: number;
  totalSegments: number;
  lineTypeCounts: Record<LineType, number>;
  wireCount: number;
  colorDistribution: Record<WireColor, number>;
  voltageDistribution: Record<string, number>;
  totalWireLength: number;
  minWireLength: number | null;
  maxWireLength: number | null;
  averageWireLength: number;
  horizontalCount: number;
  verticalCount: number;
  pathCount: number;
  junctionCount: number;
}

function zeroLineTypeCounts(): Record<LineType, number> {
  return {
    [LineType.WIRE]: 0,
    [LineType.BORDER]: 0,
    [LineType.TITLE_BLOCK]: 0,
    [LineType.TABLE_GRID]: 0,
    [LineType.COMPONENT_OUTLINE]: 0,
    [LineType.UNKNOWN]: 0
  };
}

function zeroColorCounts(): Record<WireColor, number> {
  return {
    [WireColor.RED]: 0,
    [WireColor.BLUE]: 0,
    [WireColor.GREEN]: 0,
    [WireColor.YELLOW_GREEN]: 0,
    [WireColor.BLACK]: 0,
    [WireColor.BROWN]: 0,
    [WireColor.WHITE]: 0,
    [WireColor.ORANGE]: 0,
    [WireColor.GRAY]: 0,
    [WireColor.OTHER]: 0
  };
}

export function emptyStatistics(): WireStatistics {
  return {
    pageCount: 0,
    totalSegments: 0,
    lineTypeCounts: zeroLineTypeCounts(),
    wireCount: 0,
    colorDistribution: zeroColorCounts(),
    voltageDistribution: {},
    totalWireLength: 0,
    minWireLength: null,
    maxWireLength: null,
    averageWireLength: 0,
    horizontalCount: 0,
    verticalCount: 0,
    pathCount: 0,
    junctionCount: 0
  };
}

export function computePageStatistics(
  lines: Record<LineType, readonly LineSegment[]>,
  wires: readonly LineSegment[],
  pathCount: number,
  junctionCount: number
): WireStatistics {
  const stats = emptyStatistics();
  stats.pageCount = 1;
  stats.pathCount = pathCount;
  stats.junctionCount = junctionCount;

  for (const type of ALL_LINE_TYPES) {
    stats.lineTypeCounts[type] = lines[type].length;
    stats.totalSegments += lines[type].length;
  }

  for (const wire of wires) {
    const length = wire.length;

    stats.wireCount++;
    stats.colorDistribution[wire.color]++;
    stats.voltageDistribution[wire.voltageType] = (stats.voltageDistribution[wire.voltageType] ?? 0) + 1;
    stats.totalWireLength += length;
    stats.minWireLength = stats.minWireLength === null ? length : Math.min(stats.minWireLength, length);
    stats.maxWireLength = stats.maxWireLength === null ? length : Math.max(stats.maxWireLength, length);
    if (wire.isHorizontal) stats.horizontalCount++;
    if (wire.isVertical) stats.verticalCount++;
  }

  stats.averageWireLength = stats.wireCount > 0 ? stats.totalWireLength / stats.wireCount : 0;
  return stats;
}

function pickExtreme(a: number | null, b: number | null, pick: (x: number, y: number) => number): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return pick(a, b);
}

/**
 * Combine two summaries. Commutative and associative, with emptyStatistics()
 * as identity, so per-page results can be folded in any order.
 */
export function mergeStatistics(a: WireStatistics, b: WireStatistics): WireStatistics {
  const merged = emptyStatistics();

  merged.pageCount = a.pageCount + b.pageCount;
  merged.totalSegments = a.totalSegments + b.totalSegments;
  merged.wireCount = a.wireCount + b.wireCount;
  merged.totalWireLength = a.totalWireLength + b.totalWireLength;
  merged.minWireLength = pickExtreme(a.minWireLength, b.minWireLength, Math.min);
  merged.maxWireLength = pickExtreme(a.maxWireLength, b.maxWireLength, Math.max);
  merged.averageWireLength = merged.wireCount > 0 ? merged.totalWireLength / merged.wireCount : 0;
  merged.horizontalCount = a.horizontalCount + b.horizontalCount;
  merged.verticalCount = a.verticalCount + b.verticalCount;
  merged.pathCount = a.pathCount + b.pathCount;
  merged.junctionCount = a.junctionCount + b.junctionCount;

  for (const type of ALL_LINE_TYPES) {
    merged.lineTypeCounts[type] = a.lineTypeCounts[type] + b.lineTypeCounts[type];
  }

  for (const color of ALL_WIRE_COLORS) {
    merged.colorDistribution[color] = a.colorDistribution[color] + b.colorDistribution[color];
  }

  for (const source of [a.voltageDistribution, b.voltageDistribution]) {
    for (const [voltage, count] of Object.entries(source)) {
      merged.voltageDistribution[voltage] = (merged.voltageDistribution[voltage] ?? 0) + count;
    }
  }

  return merged;
}
