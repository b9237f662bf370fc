/**
 * Intake API
 *
 * HTTP surface over the pipeline: submit documents, look up records and threads.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  validateRecord,
  createInputDocument,
  isPipelineError,
  type ErrorEnvelope,
  type Orchestrator,
  type ProcessingRecord,
  type RecordListResponse,
  type RecordStore,
  type SubmitDocumentRequest,
} from '@docintake/shared';

export interface AppDeps {
  orchestrator: Orchestrator;
  store: RecordStore;
  maxRequestBytes?: string;
}

function requestCorrelationId(res: Response): string {
  const correlationId: unknown = res.locals.correlationId;
  return typeof correlationId === 'string' ? correlationId : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: requestCorrelationId(res),
    },
  };
  res.status(status).json(error);
}

function parseSubmitRequest(body: unknown): SubmitDocumentRequest | string {
  if (typeof body !== 'object' || body === null) {
    return 'Request body must be a JSON object';
  }
  const content: unknown = 'content' in body ? body.content : undefined;
  const rawEncoding: unknown = 'encoding' in body ? body.encoding : undefined;
  const rawFilename: unknown = 'filename' in body ? body.filename : undefined;
  const rawThreadId: unknown = 'thread_id' in body ? body.thread_id : undefined;

  if (typeof content !== 'string') return 'content must be a string';

  const request: SubmitDocumentRequest = { content };

  if (rawEncoding === 'utf-8' || rawEncoding === 'base64') {
    request.encoding = rawEncoding;
  } else if (rawEncoding !== undefined) {
    return 'encoding must be utf-8 or base64';
  }

  if (typeof rawFilename === 'string') {
    request.filename = rawFilename;
  } else if (rawFilename !== undefined) {
    return 'filename must be a string';
  }

  if (typeof rawThreadId === 'string') {
    request.thread_id = rawThreadId;
  } else if (rawThreadId !== undefined) {
    return 'thread_id must be a string';
  }

  return request;
}

function parseLimit(value: unknown): number {
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return config.historyDefaultLimit;
  return Math.min(parsed, config.historyMaxLimit);
}

function checkRecord(record: ProcessingRecord): ProcessingRecord {
  const validation = validateRecord(record);
  if (!validation.valid) {
    logger.warn('ProcessingRecord validation failed', {
      record_id: record.record_id,
      errors: validation.errors,
    });
  }
  return record;
}

export function createApp(deps: AppDeps): express.Express {
  const { orchestrator, store } = deps;
  const app = express();

  // Correlation ID middleware, ahead of body parsing so its errors carry the id
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    next();
  });

  app.use(express.json({ limit: deps.maxRequestBytes ?? config.maxRequestBytes }));

  // Body parsing completes in a stream callback, so the context starts here
  app.use((req: Request, res: Response, next: NextFunction) => {
    runWithContext({ correlationId: requestCorrelationId(res) }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await store.ping();

      res.json({
        status: 'healthy',
        service: 'intake-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'intake-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /documents
   * Runs a document through the pipeline and returns the stored record
   */
  app.post('/documents', async (req: Request, res: Response) => {
    const request = parseSubmitRequest(req.body);
    if (typeof request === 'string') {
      sendError(res, 400, 'invalid_request', request);
      return;
    }

    try {
      const content =
        request.encoding === 'base64'
          ? Buffer.from(request.content, 'base64')
          : Buffer.from(request.content, 'utf-8');
      const input = createInputDocument(content, {
        filename: request.filename,
        threadId: request.thread_id,
      });

      const record = await orchestrator.process(input);
      res.status(201).json(checkRecord(record));
    } catch (error) {
      if (isPipelineError(error) && error.code === 'invalid_input') {
        sendError(res, 400, 'invalid_request', error.message);
        return;
      }
      if (isPipelineError(error) && error.code === 'store_unavailable') {
        sendError(res, 503, 'store_unavailable', error.message);
        return;
      }
      logger.error('Failed to process document', error);
      sendError(res, 500, 'internal_error', 'Failed to process document');
    }
  });

  /**
   * GET /records
   * Most recent records across all threads
   */
  app.get('/records', async (req: Request, res: Response) => {
    try {
      const records = await orchestrator.getHistory(parseLimit(req.query.limit));
      const response: RecordListResponse = { items: records };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list records', error);
      sendError(res, 500, 'internal_error', 'Failed to list records');
    }
  });

  /**
   * GET /records/:record_id
   */
  app.get('/records/:record_id', async (req: Request, res: Response) => {
    const { record_id } = req.params;

    try {
      const record = await orchestrator.getRecord(record_id);
      if (!record) {
        sendError(res, 404, 'not_found', `Record ${record_id} not found`);
        return;
      }
      res.json(checkRecord(record));
    } catch (error) {
      logger.error('Failed to get record', error, { record_id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve record');
    }
  });

  /**
   * GET /threads/:thread_id/records
   * Records of a thread in append order
   */
  app.get('/threads/:thread_id/records', async (req: Request, res: Response) => {
    const { thread_id } = req.params;

    try {
      const records = await orchestrator.listThread(thread_id);
      const response: RecordListResponse = { items: records };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list thread', error, { thread_id });
      sendError(res, 500, 'internal_error', 'Failed to list thread records');
    }
  });

  /**
   * GET /threads/:thread_id/context
   */
  app.get('/threads/:thread_id/context', async (req: Request, res: Response) => {
    const { thread_id } = req.params;

    try {
      const context = await orchestrator.getThreadContext(thread_id);
      if (!context) {
        sendError(res, 404, 'not_found', `Thread ${thread_id} not found`);
        return;
      }
      res.json(context);
    } catch (error) {
      logger.error('Failed to get thread context', error, { thread_id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve thread context');
    }
  });

  // Body parsing errors
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status =
      typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
        ? error.status
        : 500;

    if (status === 413) {
      sendError(res, 413, 'payload_too_large', 'Request body is too large');
    } else if (status === 400) {
      sendError(res, 400, 'invalid_request', 'Request body is not valid JSON');
    } else {
      logger.error('Unhandled request error', error);
      sendError(res, 500, 'internal_error', 'Unexpected error');
    }
  });

  return app;
}
