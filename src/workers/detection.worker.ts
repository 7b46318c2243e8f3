/**
 * Worker thread for document-wide wire detection.
 * Keeps long analyses of many-page documents off the main event loop.
 */
import { parentPort, workerData } from 'worker_threads';
import { DrawingDocument, InMemoryDrawingSource } from '../services/drawing-source';
import {
  DetectionOptions,
  DocumentAnalysisDto,
  WireDetectionService,
  toDocumentAnalysisDto
} from '../services/wire-detection.service';

export interface DetectionWorkerData {
  document: DrawingDocument;
  options: DetectionOptions;
}

export interface DetectionWorkerProgress {
  type: 'progress';
  message: string;
  pageIndex?: number;
  totalPages?: number;
  wireCount?: number;
  pathCount?: number;
  percentComplete?: number;
}

export interface DetectionWorkerResult {
  type: 'result';
  result: DocumentAnalysisDto;
}

export interface DetectionWorkerError {
  type: 'error';
  error: string;
}

export type DetectionWorkerMessage = DetectionWorkerProgress | DetectionWorkerResult | DetectionWorkerError;

function sendMessage(message: DetectionWorkerMessage) {
  if (parentPort) {
    parentPort.postMessage(message);
  }
}

export function runDetection(data: DetectionWorkerData): DocumentAnalysisDto {
  const source = InMemoryDrawingSource.fromDocument(data.document);
  const service = new WireDetectionService(source, data.options);

  sendMessage({
    type: 'progress',
    message: `Analyzing ${source.pageCount} pages...`,
    totalPages: source.pageCount,
    percentComplete: 0
  });

  const analysis = service.analyzeDocument(progress => {
    sendMessage({
      type: 'progress',
      message: `Page ${progress.pageIndex + 1}/${progress.totalPages}: ${progress.wireCount} wires, ${progress.pathCount} paths`,
      ...progress,
      percentComplete: Math.round(((progress.pageIndex + 1) / progress.totalPages) * 100)
    });
  });

  return toDocumentAnalysisDto(analysis);
}

// Main worker execution
if (parentPort) {
  const data: DetectionWorkerData = workerData;

  try {
    sendMessage({ type: 'result', result: runDetection(data) });
    // The parent terminates the worker after receiving the result
  } catch (error) {
    sendMessage({
      type: 'error',
      error: error instanceof Error ? error.message : 'Unknown error in detection worker'
    });
    process.exit(1);
  }
}
