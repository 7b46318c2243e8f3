import { DetectionOptions } from '../services/wire-detection.service';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[Config] Ignoring non-numeric ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export interface ServerSettings {
  port: number;
  production: boolean;
  bodyLimit: string;
  corsOrigins: string[];
  /** Largest accepted drawing dump upload, in bytes */
  maxUploadBytes: number;
  detection: DetectionOptions;
}

export function loadSettings(): ServerSettings {
  const production = process.env.NODE_ENV === 'production';

  return {
    port: numberFromEnv('PORT', 3001),
    production,
    bodyLimit: process.env.BODY_LIMIT || '50mb',
    corsOrigins: process.env.CORS_ORIGINS
      ? process.env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
      : ['http://localhost:4200', 'http://localhost:8084'],
    maxUploadBytes: numberFromEnv('MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
    detection: {
      connectionTolerance: numberFromEnv('WIRE_CONNECTION_TOLERANCE', 5.0),
      minWireLength: numberFromEnv('WIRE_MIN_LENGTH', 8.0),
      maxWireThickness: numberFromEnv('WIRE_MAX_THICKNESS', 5.0)
    }
  };
}

export const settings = loadSettings();
