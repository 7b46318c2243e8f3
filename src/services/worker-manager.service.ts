/**
 * Worker Manager Service
 * Manages worker threads for document-wide detection jobs
 */
import { Worker } from 'worker_threads';
import path from 'path';
import {
  DetectionWorkerData,
  DetectionWorkerMessage,
  DetectionWorkerProgress
} from '../workers/detection.worker';
import { DocumentAnalysisDto } from './wire-detection.service';

export interface WorkerJobOptions {
  onProgress?: (progress: DetectionWorkerProgress) => void;
  onComplete?: (result: DocumentAnalysisDto) => void;
  onError?: (error: string) => void;
}

export class WorkerManagerService {
  private activeWorkers: Map<string, Worker> = new Map();

  /**
   * Execute a detection job in a worker thread
   * Resolves with the analysis once the worker reports it
   */
  executeDetectionJob(
    jobId: string,
    data: DetectionWorkerData,
    options: WorkerJobOptions = {}
  ): Promise<DocumentAnalysisDto> {
    return new Promise((resolve, reject) => {
      // Compiled JavaScript in production, TypeScript through ts-node otherwise
      const production = process.env.NODE_ENV === 'production';
      const workerPath = production
        ? path.join(__dirname, '../workers/detection.worker.js')
        : path.join(__dirname, '../workers/detection.worker.ts');

      console.log(`[WorkerManager] Starting worker for job ${jobId}`);
      console.log(`[WorkerManager] Worker path: ${workerPath}`);

      const worker = new Worker(workerPath, {
        workerData: data,
        execArgv: production ? [] : ['-r', 'ts-node/register']
      });

      this.activeWorkers.set(jobId, worker);
      let settled = false;

      worker.on('message', (message: DetectionWorkerMessage) => {
        if (message.type === 'progress') {
          console.log(`[WorkerManager] Progress (${jobId}): ${message.message}`);
          options.onProgress?.(message);
        } else if (message.type === 'result') {
          console.log(`[WorkerManager] Job ${jobId} completed successfully`);
          settled = true;
          options.onComplete?.(message.result);
          this.terminateWorker(jobId);
          resolve(message.result);
        } else {
          console.error(`[WorkerManager] Job ${jobId} error: ${message.error}`);
          settled = true;
          options.onError?.(message.error);
          this.terminateWorker(jobId);
          reject(new Error(message.error));
        }
      });

      worker.on('error', (error) => {
        console.error(`[WorkerManager] Worker error for job ${jobId}:`, error);
        if (settled) return;
        settled = true;
        options.onError?.(error.message);
        this.terminateWorker(jobId);
        reject(error);
      });

      worker.on('exit', (code) => {
        this.activeWorkers.delete(jobId);
        if (code !== 0 && !settled) {
          const error = `Worker stopped with exit code ${code}`;
          console.error(`[WorkerManager] ${error}`);
          settled = true;
          options.onError?.(error);
          reject(new Error(error));
        }
      });
    });
  }

  /**
   * Terminate a specific worker
   */
  terminateWorker(jobId: string): void {
    const worker = this.activeWorkers.get(jobId);
    if (worker) {
      this.activeWorkers.delete(jobId);
      worker.terminate().catch(error => {
        console.error(`[WorkerManager] Failed to terminate worker ${jobId}:`, error);
      });
      console.log(`[WorkerManager] Worker ${jobId} terminated`);
    }
  }

  /**
   * Terminate all active workers
   */
  terminateAll(): void {
    console.log(`[WorkerManager] Terminating ${this.activeWorkers.size} active workers`);
    for (const jobId of [...this.activeWorkers.keys()]) {
      this.terminateWorker(jobId);
    }
  }

  /**
   * Get count of active workers
   */
  getActiveWorkerCount(): number {
    return this.activeWorkers.size;
  }
}
