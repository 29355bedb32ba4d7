/**
 * Main Fastify Application
 *
 * This file registers the controllers and services for the API.
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { GeoIPService } from '../geo/geo.service.js';
import { AnalysisService, analysisController } from '../analysis/index.js';
import { DEFAULT_GEOIP_MAX_LOOKUPS, DEFAULT_MAX_UPLOAD_BYTES } from '../../config.js';

export interface AppOptions {
  port: number;
  host?: string;
  geoService: GeoIPService;
  geoipMaxLookups?: number;
  maxUploadBytes?: number;
  logger?: boolean;
  autoListen?: boolean;
}

export async function createApp(options: AppOptions) {
  const {
    port,
    host = '0.0.0.0',
    geoService,
    geoipMaxLookups = DEFAULT_GEOIP_MAX_LOOKUPS,
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
    logger = false,
    autoListen = true,
  } = options;

  // Create Fastify instance
  const app = Fastify({ logger });

  // Register CORS
  await app.register(cors, {
    origin: '*',
    methods: ['POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // Register multipart; oversized files fail with FST_REQ_FILE_TOO_LARGE
  await app.register(multipart, {
    limits: {
      fileSize: maxUploadBytes,
      files: 1,
    },
  });

  // Create services
  const analysisService = new AnalysisService(geoService, geoipMaxLookups);

  // Decorate Fastify instance with services
  app.decorate('analysisService', analysisService);

  // Register controllers
  await app.register(analysisController, { prefix: '/api' });

  if (autoListen) {
    await app.listen({ port, host });
    console.log(`[API] Server running at http://localhost:${port}`);
  }

  return app;
}

export class APIServer {
  private app: Awaited<ReturnType<typeof createApp>> | null = null;
  private options: AppOptions;

  constructor(options: AppOptions) {
    this.options = options;
  }

  async start() {
    this.app = await createApp({ ...this.options, autoListen: true });
    return this.app;
  }

  async stop() {
    if (this.app) {
      await this.app.close();
      this.app = null;
      console.log('[API] Server stopped');
    }
  }
}

export default createApp;
