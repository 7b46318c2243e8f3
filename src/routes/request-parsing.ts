import { Request } from 'express';
import { z } from 'zod';
import { DrawingDocument, drawingDocumentSchema } from '../services/drawing-source';
import { DetectionOptions } from '../services/wire-detection.service';

export const detectionOptionsSchema = z.object({
  minWireLength: z.number().nonnegative(),
  maxWireThickness: z.number().positive(),
  prefilter: z.boolean(),
  enableClassification: z.boolean(),
  connectionTolerance: z.number().nonnegative(),
  borderMargin: z.number().nonnegative(),
  titleBlockRatio: z.number().min(0).max(1),
  gridTolerance: z.number().nonnegative(),
  outlineTolerance: z.number().nonnegative(),
  minOutlineNeighbours: z.number().int().min(1)
}).partial();

const drawingRequestSchema = drawingDocumentSchema.extend({
  options: detectionOptionsSchema.optional()
});

export type DrawingRequest =
  | { success: true; document: DrawingDocument; options: DetectionOptions }
  | { success: false; error: string; details?: z.ZodIssue[] };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Drawing dump from a JSON body, or from an uploaded `document` file with
 * detection options in an `options` form field
 */
export function parseDrawingRequest(req: Request): DrawingRequest {
  let payload: unknown = req.body;

  if (req.file) {
    const document = parseJson(req.file.buffer.toString('utf8'));
    if (!document.ok) {
      return { success: false, error: 'Uploaded document is not valid JSON' };
    }

    let options: unknown;
    const rawOptions: unknown = req.body?.options;
    if (typeof rawOptions === 'string' && rawOptions.trim() !== '') {
      const parsedOptions = parseJson(rawOptions);
      if (!parsedOptions.ok) {
        return { success: false, error: 'options field is not valid JSON' };
      }
      options = parsedOptions.value;
    }

    payload = options !== undefined && typeof document.value === 'object' && document.value !== null
      ? { ...document.value, options }
      : document.value;
  }

  const parsed = drawingRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return { success: false, error: 'Invalid drawing document', details: parsed.error.issues };
  }

  const { options, ...document } = parsed.data;
  return { success: true, document, options: options ?? {} };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
