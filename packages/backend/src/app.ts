import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ProcessingMode } from '@pagelaunch/shared';
import { auditLog } from './middleware/audit';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createSubmitRouter, Deployer } from './routes/submit';

export interface AppOptions {
  deployer: Deployer;
  apiSecret: string;
  processingMode: ProcessingMode;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(auditLog);

  app.get('/', (req, res) => {
    res.json({ message: 'Page deployment API is running.' });
  });

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use(
    '/api',
    createSubmitRouter(options.deployer, {
      apiSecret: options.apiSecret,
      processingMode: options.processingMode,
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
