import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { resolveRequestId } from '../middleware/request-id.middleware';

const serviceName = process.env.SERVICE_NAME || 'tei-rag';
const logDir = process.env.LOG_DIR || './logs';

mkdirSync(logDir, { recursive: true });

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'apiKey',
        '*.apiKey',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers:
          process.env.NODE_ENV === 'production' ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },

    // Written back so RequestIdMiddleware echoes the same id
    genReqId: (req: IncomingMessage) => {
      const requestId = resolveRequestId(req.headers['x-request-id']);
      req.headers['x-request-id'] = requestId;
      return requestId;
    },

    customProps: (req: IncomingMessage) => ({
      requestId: headerValue(req, 'x-request-id'),
      traceId: headerValue(req, 'x-trace-id'),
    }),

    // Pretty console outside production, JSON file always
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      {
        level: 'debug',
        stream: createWriteStream(join(logDir, `${serviceName}.log`), {
          flags: 'a',
        }),
      },
    ]),
  },
};
