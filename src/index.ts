import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { settings } from './config/settings';
import { reportRouter } from './routes/report.routes';
import { wiresRouter } from './routes/wires.routes';
import { errorMessage } from './routes/request-parsing';
import { WorkerManagerService } from './services/worker-manager.service';

const app: Express = express();
const httpServer = createServer(app);

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: settings.production ? false : settings.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

const workerManager = new WorkerManagerService();

// Routes read these through app.locals
app.locals.io = io;
app.locals.workerManager = workerManager;

// Middleware
app.use(cors());
app.use(express.json({ limit: settings.bodyLimit }));
app.use(express.urlencoded({ extended: true, limit: settings.bodyLimit }));

// Routes
app.use('/api/wires', wiresRouter);
app.use('/api/report', reportRouter);

// Health check
app.get('/api/health', (req: Request, res: Response) => {
  res.json({ status: 'ok', message: 'Wire detection API is running' });
});

// Error handling middleware
app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
  console.error('Error occurred:', err);

  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof multer.MulterError) {
    console.error(`- Upload error ${err.code} on field ${err.field ?? '(none)'} (${req.method} ${req.path})`);
    return res.status(400).json({
      error: 'File upload error',
      message: err.message,
      code: err.code,
      field: err.field
    });
  }

  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: 'Malformed JSON body', message: err.message });
  }

  res.status(500).json({
    error: 'Internal Server Error',
    message: errorMessage(err)
  });
});

// Socket.IO connection handling
io.on('connection', (socket) => {
  console.log(`🔌 Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`⚠️  Socket error for ${socket.id}:`, error);
  });
});

// Graceful shutdown: terminate all workers
function shutdown(signal: string) {
  console.log(`${signal} received, cleaning up workers...`);
  workerManager.terminateAll();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

httpServer.listen(settings.port, () => {
  console.log(`⚡️ Server is running on port ${settings.port}`);
  console.log(`🔎 Wire detection API ready at http://localhost:${settings.port}/api`);
  console.log(`🔌 Socket.IO ready for job progress`);
});

export default app;
