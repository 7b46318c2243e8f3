import { z } from 'zod';
import { PageSize, Point, Rgb } from '../models/wire.types';

/**
 * Provides the vector drawings of a document, page by page.
 * Implementations must allow independent reads of different pages.
 */
export interface DrawingSource {
  readonly pageCount: number;
  getPageSize(pageIndex: number): PageSize;
  /** Raw drawing primitives; anything malformed is skipped by the reader */
  getDrawings(pageIndex: number): readonly unknown[];
}

export interface DrawingPage extends PageSize {
  drawings: readonly unknown[];
}

export const drawingPageSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  drawings: z.array(z.unknown()).default([])
});

export const drawingDocumentSchema = z.object({
  pages: z.array(drawingPageSchema)
});

export type DrawingDocument = z.infer<typeof drawingDocumentSchema>;

/**
 * Drawing dump held in memory, e.g. parsed from an uploaded JSON file
 */
export class InMemoryDrawingSource implements DrawingSource {
  constructor(private readonly pages: readonly DrawingPage[]) {}

  static fromDocument(document: DrawingDocument): InMemoryDrawingSource {
    return new InMemoryDrawingSource(document.pages);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  getPageSize(pageIndex: number): PageSize {
    const page = this.pageAt(pageIndex);
    return { width: page.width, height: page.height };
  }

  getDrawings(pageIndex: number): readonly unknown[] {
    return this.pageAt(pageIndex).drawings;
  }

  private pageAt(pageIndex: number): DrawingPage {
    const page = this.pages[pageIndex];
    if (!page) {
      throw new RangeError(`Page ${pageIndex} out of range (document has ${this.pages.length} pages)`);
    }
    return page;
  }
}

// Raw primitive shapes, as emitted by PDF vector extractors

const channel = z.number().min(0).max(1);
const rgbSchema = z.tuple([channel, channel, channel]).rest(z.unknown());

const coordinate = z.number().finite();
const pointSchema = z.union([
  z.object({ x: coordinate, y: coordinate }),
  z.tuple([coordinate, coordinate]).rest(z.unknown())
]);

const lineItemSchema = z.tuple([z.literal('l'), pointSchema, pointSchema]).rest(z.unknown());

// A malformed color or width drops only that field, never the items beside it
const rawDrawingSchema = z.object({
  items: z.array(z.unknown()).optional(),
  stroke: rgbSchema.nullish().catch(undefined),
  color: rgbSchema.nullish().catch(undefined),
  fill: rgbSchema.nullish().catch(undefined),
  width: z.number().nonnegative().nullish().catch(undefined)
});

export interface RawStroke {
  start: Point;
  end: Point;
  rgb: Rgb;
  width: number;
}

function toPoint(point: z.infer<typeof pointSchema>): Point {
  return Array.isArray(point) ? { x: point[0], y: point[1] } : point;
}

/**
 * Straight two-point strokes of one drawing primitive.
 * Curves, rectangles, moves and malformed entries yield nothing.
 */
export function readLineStrokes(drawing: unknown): RawStroke[] {
  const parsed = rawDrawingSchema.safeParse(drawing);
  if (!parsed.success) {
    return [];
  }

  const { items, stroke, color, fill, width } = parsed.data;
  const sample = stroke ?? color ?? fill;
  if (!sample || !items || items.length === 0) {
    return [];
  }

  const rgb: Rgb = [sample[0], sample[1], sample[2]];
  const strokes: RawStroke[] = [];

  for (const item of items) {
    const line = lineItemSchema.safeParse(item);
    if (!line.success) continue;

    strokes.push({
      start: toPoint(line.data[1]),
      end: toPoint(line.data[2]),
      rgb,
      width: width ?? 1.0
    });
  }

  return strokes;
}
