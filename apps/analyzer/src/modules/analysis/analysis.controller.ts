/**
 * Analysis Controller - Fastify routes for /api
 */

import type { FastifyInstance, FastifyPluginAsync, FastifyRequest } from 'fastify';
import type { HealthResponse } from '@pcap-lens/shared';
import { FormatError, InvalidAddressError } from '../../shared/errors.js';
import type { AnalysisService } from './analysis.service.js';

// Extend Fastify instance to include analysisService
declare module 'fastify' {
  interface FastifyInstance {
    analysisService: AnalysisService;
  }
}

interface AnalyzeForm {
  ip: string;
  file: Buffer | null;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

async function readAnalyzeForm(request: FastifyRequest): Promise<AnalyzeForm> {
  const form: AnalyzeForm = { ip: '', file: null };
  for await (const part of request.parts()) {
    if (part.type === 'file') {
      // Unused file parts still have to be consumed for the stream to end.
      const content = await part.toBuffer();
      if (part.fieldname === 'file' && form.file === null) {
        form.file = content;
      }
    } else if (part.fieldname === 'ip' && typeof part.value === 'string') {
      form.ip = part.value.trim();
    }
  }
  return form;
}

const analysisController: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  const service = fastify.analysisService;

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return { status: 'ok', geoip: service.isGeoAvailable() };
  });

  // Analyze an uploaded capture relative to one IP address
  fastify.post('/analyze', async (request, reply) => {
    if (!request.isMultipart()) {
      return reply.status(400).send({ error: 'Unable to parse form' });
    }

    let form: AnalyzeForm;
    try {
      form = await readAnalyzeForm(request);
    } catch (error: unknown) {
      if (hasErrorCode(error, 'FST_REQ_FILE_TOO_LARGE')) {
        return reply.status(413).send({ error: 'File too large' });
      }
      console.warn('[API] Failed to parse multipart form:', error);
      return reply.status(400).send({ error: 'Unable to parse form' });
    }

    if (!form.ip) {
      return reply.status(400).send({ error: 'IP is required' });
    }
    if (!form.file) {
      return reply.status(400).send({ error: 'File is required' });
    }

    try {
      return await service.analyze(form.file, form.ip);
    } catch (error: unknown) {
      if (error instanceof InvalidAddressError) {
        return reply.status(400).send({ error: error.message });
      }
      if (error instanceof FormatError) {
        console.warn(`[Analyzer] Rejected capture: ${error.message}`);
        return reply.status(422).send({ error: `Analysis failed: ${error.message}` });
      }
      console.error('[Analyzer] Analysis failed:', error);
      return reply.status(500).send({ error: 'Analysis failed' });
    }
  });
};

export default analysisController;
export { analysisController };
