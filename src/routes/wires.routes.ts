import { Router, Request, Response } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { upload } from '../config/multer';
import { settings } from '../config/settings';
import { Point } from '../models/wire.types';
import { InMemoryDrawingSource } from '../services/drawing-source';
import { WireDetectionService, toDocumentAnalysisDto } from '../services/wire-detection.service';
import { WirePathGenerator } from '../services/wire-path-generator.service';
import { WorkerManagerService } from '../services/worker-manager.service';
import { errorMessage, parseDrawingRequest } from './request-parsing';

const router = Router();
const generator = new WirePathGenerator();

const pointSchema = z.object({ x: z.number().finite(), y: z.number().finite() });
const styleSchema = z.enum(['manhattan', 'l_path', 'straight', 'smooth']);

const connectionRouteSchema = z.object({
  connections: z.array(z.object({
    sourceDevice: z.string().min(1),
    targetDevice: z.string().min(1),
    voltageLevel: z.string().optional(),
    wireColor: z.string().optional()
  })),
  positions: z.record(z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().nonnegative().optional(),
    height: z.number().nonnegative().optional()
  })),
  style: styleSchema.default('manhattan')
});

const pointRouteSchema = z.object({
  from: pointSchema,
  to: pointSchema,
  style: styleSchema.default('manhattan'),
  exitDirection: z.enum(['auto', 'horizontal', 'vertical']).default('auto'),
  horizontalFirst: z.boolean().default(true),
  segments: z.number().int().min(1).max(1000).default(10)
});

/**
 * Classify every line of every page and trace the wires
 */
router.post('/analyze', upload.single('document'), (req: Request, res: Response) => {
  try {
    const request = parseDrawingRequest(req);
    if (!request.success) {
      return res.status(400).json({ error: request.error, details: request.details });
    }

    const service = new WireDetectionService(
      InMemoryDrawingSource.fromDocument(request.document),
      { ...settings.detection, ...request.options }
    );

    console.log(`[Wires] Analyzing ${service.pageCount} pages`);
    const analysis = service.analyzeDocument();

    res.json(toDocumentAnalysisDto(analysis));
  } catch (error) {
    console.error('[Wires] Error analyzing document:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
});

/**
 * Synthesize routes, either for a connection table or between two points
 */
router.post('/route', (req: Request, res: Response) => {
  try {
    if (req.body && typeof req.body === 'object' && 'connections' in req.body) {
      const parsed = connectionRouteSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid connection routing request', details: parsed.error.issues });
      }

      const { connections, positions, style } = parsed.data;
      const wires = generator.routeConnections(connections, positions, style);
      console.log(`[Wires] Routed ${wires.length}/${connections.length} connections (${style})`);
      return res.json({ wires });
    }

    const parsed = pointRouteSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid routing request', details: parsed.error.issues });
    }

    const { from, to, style, exitDirection, horizontalFirst, segments } = parsed.data;
    let points: Point[];
    switch (style) {
      case 'manhattan':
        points = generator.generateManhattanPath(from.x, from.y, to.x, to.y, exitDirection);
        break;
      case 'l_path':
        points = generator.generateLPath(from.x, from.y, to.x, to.y, horizontalFirst);
        break;
      case 'smooth':
        points = generator.generateSmoothPath(from.x, from.y, to.x, to.y, segments);
        break;
      default:
        points = generator.generatePath(style, from, to);
    }

    res.json({ style, points });
  } catch (error) {
    console.error('[Wires] Error generating route:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
});

/**
 * Run detection in a worker thread; progress goes out over Socket.IO
 */
router.post('/jobs', upload.single('document'), (req: Request, res: Response) => {
  try {
    const request = parseDrawingRequest(req);
    if (!request.success) {
      return res.status(400).json({ error: request.error, details: request.details });
    }

    const workerManager: unknown = req.app.locals.workerManager;
    const io: unknown = req.app.locals.io;
    if (!(workerManager instanceof WorkerManagerService)) {
      return res.status(503).json({ error: 'Background detection is not available' });
    }

    const socketId = typeof req.body?.socketId === 'string' ? req.body.socketId : null;
    const notify = (event: string, payload: object) => {
      if (socketId && io instanceof SocketIOServer) {
        io.to(socketId).emit(event, payload);
      }
    };

    const jobId = uuidv4();
    console.log(`[Wires] Starting detection job ${jobId} (socket: ${socketId || 'none'})`);

    workerManager.executeDetectionJob(
      jobId,
      { document: request.document, options: { ...settings.detection, ...request.options } },
      {
        onProgress: (progress) => notify('detection:progress', { jobId, ...progress }),
        onComplete: (result) => notify('detection:complete', { jobId, result }),
        onError: (error) => notify('detection:error', { jobId, error })
      }
    ).catch(error => {
      console.error(`[Wires] Detection job ${jobId} failed:`, error);
    });

    res.status(202).json({
      jobId,
      pageCount: request.document.pages.length,
      message: 'Detection started. Listen for progress via Socket.IO.'
    });
  } catch (error) {
    console.error('[Wires] Error starting detection job:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
});

export const wiresRouter = router;
