import { LineSegment, SegmentDto } from '../models/line-segment.model';
import { WirePath, WirePathDto } from '../models/wire-path.model';
import { ALL_LINE_TYPES, LineType, PageSize, Point, WireColor } from '../models/wire.types';
import { ColorClassifier } from './color-classifier.service';
import { DrawingSource, RawStroke, readLineStrokes } from './drawing-source';
import { GeometryService } from './geometry.service';
import { LineClassifier, LineClassifierOptions } from './line-classifier.service';
import { WirePathTracer } from './wire-path-tracer.service';
import { WireStatistics, computePageStatistics, emptyStatistics, mergeStatistics } from './wire-statistics';

export interface DetectionOptions extends LineClassifierOptions {
  /** Shorter strokes are dropped by the pre-filter */
  minWireLength?: number;
  /** Thicker strokes (usually fills) are dropped by the pre-filter */
  maxWireThickness?: number;
  prefilter?: boolean;
  /** When off, every extracted segment counts as a wire */
  enableClassification?: boolean;
  connectionTolerance?: number;
}

type PipelineOptions = Required<
  Pick<DetectionOptions, 'minWireLength' | 'maxWireThickness' | 'prefilter' | 'enableClassification' | 'connectionTolerance'>
>;

export const DEFAULT_DETECTION_OPTIONS: Readonly<PipelineOptions> = {
  minWireLength: 8.0,
  maxWireThickness: 5.0,
  prefilter: true,
  enableClassification: true,
  connectionTolerance: 5.0
};

export type LineBuckets = Record<LineType, LineSegment[]>;

export interface PageAnalysis {
  pageIndex: number;
  pageSize: PageSize;
  lines: LineBuckets;
  wires: LineSegment[];
  paths: WirePath[];
  junctions: Point[];
  statistics: WireStatistics;
}

export interface DocumentAnalysis {
  pages: PageAnalysis[];
  summary: WireStatistics;
}

export interface PageProgress {
  pageIndex: number;
  totalPages: number;
  wireCount: number;
  pathCount: number;
}

function emptyBuckets(): LineBuckets {
  return {
    [LineType.WIRE]: [],
    [LineType.BORDER]: [],
    [LineType.TITLE_BLOCK]: [],
    [LineType.TABLE_GRID]: [],
    [LineType.COMPONENT_OUTLINE]: [],
    [LineType.UNKNOWN]: []
  };
}

/**
 * Per-page pipeline: read strokes from the document, keep straight
 * wire-like segments, classify them against the rest of the page and trace
 * the wires into routes.
 *
 * Pages are independent; nothing carries over from one page to the next.
 */
export class WireDetectionService {
  private readonly colorClassifier = new ColorClassifier();
  private readonly geometry = new GeometryService();
  private readonly tracer: WirePathTracer;
  private readonly options: DetectionOptions & PipelineOptions;

  constructor(private readonly source: DrawingSource, options: DetectionOptions = {}) {
    this.options = {
      ...options,
      minWireLength: options.minWireLength ?? DEFAULT_DETECTION_OPTIONS.minWireLength,
      maxWireThickness: options.maxWireThickness ?? DEFAULT_DETECTION_OPTIONS.maxWireThickness,
      prefilter: options.prefilter ?? DEFAULT_DETECTION_OPTIONS.prefilter,
      enableClassification: options.enableClassification ?? DEFAULT_DETECTION_OPTIONS.enableClassification,
      connectionTolerance: options.connectionTolerance ?? DEFAULT_DETECTION_OPTIONS.connectionTolerance
    };
    this.tracer = new WirePathTracer(this.options.connectionTolerance);
  }

  get pageCount(): number {
    return this.source.pageCount;
  }

  /**
   * All usable segments of a page. Out-of-range pages yield nothing.
   */
  extractSegments(pageIndex: number): LineSegment[] {
    if (!this.hasPage(pageIndex)) {
      return [];
    }

    const segments: LineSegment[] = [];

    for (const drawing of this.source.getDrawings(pageIndex)) {
      for (const stroke of readLineStrokes(drawing)) {
        if (!this.acceptStroke(stroke)) continue;

        segments.push(new LineSegment({
          pageIndex,
          start: stroke.start,
          end: stroke.end,
          color: this.colorClassifier.classify(stroke.rgb),
          rgb: stroke.rgb,
          thickness: stroke.width
        }));
      }
    }

    return segments;
  }

  classifyAllLines(pageIndex: number): LineBuckets {
    return this.classifySegments(pageIndex, this.extractSegments(pageIndex));
  }

  detectWiresOnly(pageIndex: number): LineSegment[] {
    return this.classifyAllLines(pageIndex)[LineType.WIRE];
  }

  detectAndTracePaths(pageIndex: number): WirePath[] {
    return this.tracer.tracePaths(this.detectWiresOnly(pageIndex));
  }

  detectWiresByColor(pageIndex: number, color: WireColor): LineSegment[] {
    return this.detectWiresOnly(pageIndex).filter(wire => wire.color === color);
  }

  /**
   * Closest wire to a point, if one lies within `tolerance`
   */
  findNearestWire(x: number, y: number, pageIndex: number, tolerance: number = 10.0): LineSegment | null {
    let nearest: LineSegment | null = null;
    let minDistance = Infinity;

    for (const wire of this.detectWiresOnly(pageIndex)) {
      const distance = this.geometry.pointToSegmentDistance({ x, y }, wire.start, wire.end);
      if (distance < minDistance && distance <= tolerance) {
        minDistance = distance;
        nearest = wire;
      }
    }

    return nearest;
  }

  getWireStatistics(pageIndex: number): WireStatistics {
    return this.analyzePage(pageIndex).statistics;
  }

  analyzePage(pageIndex: number): PageAnalysis {
    const pageSize = this.hasPage(pageIndex) ? this.source.getPageSize(pageIndex) : { width: 0, height: 0 };
    const lines = this.classifySegments(pageIndex, this.extractSegments(pageIndex));
    const wires = lines[LineType.WIRE];
    const paths = this.tracer.tracePaths(wires);
    const junctions = this.tracer.findJunctions(wires);

    console.log(
      `[WireDetection] Page ${pageIndex}: ${wires.length} wires, ${paths.length} paths, ${junctions.length} junctions`
    );

    return {
      pageIndex,
      pageSize,
      lines,
      wires,
      paths,
      junctions,
      statistics: computePageStatistics(lines, wires, paths.length, junctions.length)
    };
  }

  analyzeDocument(onProgress?: (progress: PageProgress) => void): DocumentAnalysis {
    const pages: PageAnalysis[] = [];
    let summary = emptyStatistics();

    for (let pageIndex = 0; pageIndex < this.source.pageCount; pageIndex++) {
      const page = this.analyzePage(pageIndex);
      pages.push(page);
      summary = mergeStatistics(summary, page.statistics);

      onProgress?.({
        pageIndex,
        totalPages: this.source.pageCount,
        wireCount: page.wires.length,
        pathCount: page.paths.length
      });
    }

    return { pages, summary };
  }

  private hasPage(pageIndex: number): boolean {
    return Number.isInteger(pageIndex) && pageIndex >= 0 && pageIndex < this.source.pageCount;
  }

  private classifySegments(pageIndex: number, segments: LineSegment[]): LineBuckets {
    const buckets = emptyBuckets();
    if (segments.length === 0) {
      return buckets;
    }

    if (!this.options.enableClassification) {
      buckets[LineType.WIRE].push(...segments);
      return buckets;
    }

    const { width, height } = this.source.getPageSize(pageIndex);
    const classifier = new LineClassifier(width, height, this.options);

    for (const segment of segments) {
      buckets[classifier.classifyLine(segment, segments)].push(segment);
    }

    return buckets;
  }

  private acceptStroke(stroke: RawStroke): boolean {
    const dx = Math.abs(stroke.end.x - stroke.start.x);
    const dy = Math.abs(stroke.end.y - stroke.start.y);
    const length = Math.hypot(dx, dy);

    if (length === 0) {
      return false;
    }

    if (!this.options.prefilter) {
      return true;
    }

    if (stroke.width > this.options.maxWireThickness || length < this.options.minWireLength) {
      return false;
    }

    // Near-orthogonal strokes and longer diagonals
    if (dy < 2 || dx < 2 || length > 15) {
      return true;
    }

    // Short diagonals only at the usual drafting angles
    const angle = (Math.atan2(dy, dx) * 180) / Math.PI;
    return length > 8 && [30, 45, 60].some(target => Math.abs(angle - target) < 10);
  }
}

export interface PageAnalysisDto {
  pageIndex: number;
  pageSize: PageSize;
  lines: Record<LineType, SegmentDto[]>;
  paths: WirePathDto[];
  junctions: Point[];
  statistics: WireStatistics;
}

export interface DocumentAnalysisDto {
  pages: PageAnalysisDto[];
  summary: WireStatistics;
}

/**
 * Plain-data form of a page analysis, safe for JSON and worker messages
 */
export function toPageAnalysisDto(page: PageAnalysis): PageAnalysisDto {
  const lines: Record<LineType, SegmentDto[]> = {
    [LineType.WIRE]: [],
    [LineType.BORDER]: [],
    [LineType.TITLE_BLOCK]: [],
    [LineType.TABLE_GRID]: [],
    [LineType.COMPONENT_OUTLINE]: [],
    [LineType.UNKNOWN]: []
  };

  for (const type of ALL_LINE_TYPES) {
    lines[type] = page.lines[type].map(segment => segment.toJSON());
  }

  return {
    pageIndex: page.pageIndex,
    pageSize: page.pageSize,
    lines,
    paths: page.paths.map(path => path.toJSON()),
    junctions: page.junctions,
    statistics: page.statistics
  };
}

export function toDocumentAnalysisDto(analysis: DocumentAnalysis): DocumentAnalysisDto {
  return {
    pages: analysis.pages.map(toPageAnalysisDto),
    summary: analysis.summary
  };
}
