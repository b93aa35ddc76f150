import type { Server } from 'node:http';
import express from 'express';
import type { IntentClassifier } from './core/intent/IntentClassifier.js';
import type { StatusService } from './core/status/StatusService.js';
import { createApiRouter } from './routes/apiRouter.js';
import { createStatusRouter } from './routes/statusRouter.js';
import { ValidationError } from './utils/errors.js';
import { createLogger, generateCorrelationId } from './utils/logger.js';

const logger = createLogger({ component: 'server' });

export interface AppDependencies {
  classifier: IntentClassifier;
  statusService: StatusService;
}

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

// body-parser rejects bodies with http-errors carrying a 4xx status and a type such as 'entity.too.large'
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/** 'entity.too.large' -> 'ENTITY_TOO_LARGE' */
function bodyErrorCode(type: string): string {
  return type.replace(/[^a-z0-9]+/gi, '_').toUpperCase();
}

export function createApp({ classifier, statusService }: AppDependencies): express.Express {
  const app = express();

  // CORS: any origin, method and header
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Vary', 'Origin');
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }

    if (req.method === 'OPTIONS') {
      res.setHeader(
        'Access-Control-Allow-Methods',
        req.headers['access-control-request-method'] ?? 'GET, POST, PUT, PATCH, DELETE, OPTIONS'
      );
      res.setHeader('Access-Control-Allow-Headers', req.headers['access-control-request-headers'] ?? '*');
      res.setHeader('Access-Control-Max-Age', '600');
      res.status(204).end();
      return;
    }
    next();
  });

  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ requestId: generateCorrelationId(), method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/', (_req, res) => {
    res.status(200).json({ message: 'Law Firm Backend Running' });
  });

  app.use('/api', createApiRouter(classifier));
  app.use(createStatusRouter(statusService));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(422).json({ error: err.message, code: err.code, issues: err.issues });
      return;
    }
    if (isBodyParserError(err)) {
      if (err.type === 'entity.parse.failed') {
        res.status(400).json({ error: 'Malformed JSON body', code: 'BAD_REQUEST' });
        return;
      }
      logger.warn({ status: err.status, type: err.type }, 'Rejected request body');
      res.status(err.status).json({ error: err.message, code: bodyErrorCode(err.type) });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(app: express.Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
