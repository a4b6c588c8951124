import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createAnalyzeRoutes } from './routes/analyze.js';
import { ResumeAnalysisPipeline } from './analysis/pipeline.js';
import { LLMResumeInference } from './analysis/inference.js';
import { ExtractionGateway } from './extraction/gateway.js';
import {
  isDocumentServiceConfigured,
  isLLMConfigured,
  loadConfig,
  type AppConfig,
} from './lib/config.js';
import logger from './lib/logger.js';

export interface AppDeps {
  config: AppConfig;
  pipeline: ResumeAnalysisPipeline;
}

export function createApp({ config, pipeline }: AppDeps) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      document_service_configured: isDocumentServiceConfigured(config.documentService),
      llm_configured: isLLMConfigured(config.llm),
    });
  });

  app.route('/api/analyze', createAnalyzeRoutes(pipeline, config.maxUploadBytes));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

export function buildPipeline(config: AppConfig): ResumeAnalysisPipeline {
  return new ResumeAnalysisPipeline({
    extractor: new ExtractionGateway(config.documentService),
    inference: new LLMResumeInference(config.llm),
  });
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(config: AppConfig = loadConfig()) {
  if (server) return server;

  if (!isDocumentServiceConfigured(config.documentService)) {
    logger.warn('DI_ENDPOINT / DI_KEY not set; analysis requests will fail until configured');
  }
  if (!isLLMConfigured(config.llm)) {
    logger.warn({ provider: config.llm.provider }, 'LLM credentials not set; analysis requests will fail until configured');
  }

  const app = createApp({ config, pipeline: buildPipeline(config) });
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
