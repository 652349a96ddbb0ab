import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { fileURLToPath } from 'url';
import { createStreamRoutes, UrlSettings } from './routes/streamRoutes';
import type { StreamManager } from './streamManager';
import { formatError } from './utils/errors';
import { morganStream } from './utils/logger';

export const PUBLIC_DIR = fileURLToPath(new URL('../public', import.meta.url));

export interface AppOptions {
  urls: UrlSettings;
  publicDir?: string;
  /** morgan request logging, off in tests */
  requestLogging?: boolean;
}

export const createApp = (manager: StreamManager, options: AppOptions): Express => {
  const app = express();

  // Allow all origins
  app.use(cors({ origin: '*' }));
  // Form-encoded bodies
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json({ limit: '1mb' }));
  if (options.requestLogging ?? true) {
    app.use(morgan('dev', { stream: morganStream }));
  }

  // Control page
  app.use(express.static(options.publicDir ?? PUBLIC_DIR));

  app.get('/api/health', (req: Request, res: Response) => {
    const streams = manager.list();
    res.json({
      success: true,
      data: {
        status: 'ok',
        streams: streams.length,
        running: streams.filter(stream => stream.status === 'running').length
      }
    });
  });

  app.use('/api/streams', createStreamRoutes(manager, options.urls));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, message: 'Not found' });
  });

  // Malformed bodies rejected by the parsers
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    res.status(400).json({ success: false, message: formatError(error), error: { kind: 'InvalidRequest' } });
  });

  return app;
};
