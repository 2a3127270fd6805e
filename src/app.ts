import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { AuditLogger } from './audit-log.js';
import { createBasicAuthMiddleware, getClientIp, type CredentialGate } from './auth.js';
import { APP_VERSION } from './config.js';
import type { ListDirectoryOptions } from './listing.js';
import type { PathResolver } from './path-resolver.js';
import { registerFileRoutes } from './routes/files.js';
import { UploadWriter } from './upload-writer.js';

export interface AppDeps {
  resolver: PathResolver;
  gate: CredentialGate;
  writer?: UploadWriter;
  audit?: AuditLogger | null;
  logRequests?: boolean;
  listOptions?: ListDirectoryOptions;
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const ms = Date.now() - start;
    console.log(`[lanshare] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${ms}ms)`);
  });
  next();
}

export function createApp(deps: AppDeps): Application {
  const audit = deps.audit ?? null;
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 'loopback');
  if (deps.logRequests) {
    app.use(requestLogger);
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', version: APP_VERSION });
  });

  app.use(
    createBasicAuthMiddleware(deps.gate, {
      onFailure: (req, reason) => {
        void audit?.log({
          event: 'auth.failure',
          actor: `ip:${getClientIp(req)}`,
          resource: req.path,
          outcome: 'failure',
          metadata: { reason }
        });
      }
    })
  );

  registerFileRoutes(app, {
    resolver: deps.resolver,
    writer: deps.writer ?? new UploadWriter(),
    authEnabled: deps.gate.enabled(),
    audit,
    listOptions: deps.listOptions
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'route not found', code: 'not_found' });
  });

  return app;
}
