import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import morgan from 'morgan';
import helmet from 'helmet';
import type { AppConfig } from './config.js';
import { createContext, type ContextOverrides } from './context.js';
import { createSocketPublisher, initializeSocket } from './socket.js';
import { createApiRouter } from './routes/index.js';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';

/**
 * Express app with Socket.IO attached to the same HTTP server
 */
export function createApp(config: AppConfig, overrides: Omit<ContextOverrides, 'publisher'> = {}) {
  const app = express();
  const httpServer = createServer(app);

  const io = initializeSocket(httpServer, config.clientUrl);
  const context = createContext(config, { ...overrides, publisher: createSocketPublisher(io) });

  // Security headers
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      contentSecurityPolicy: false,
    })
  );

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(
    cors({
      origin: config.clientUrl,
      credentials: true,
    })
  );
  if (config.nodeEnv !== 'test') app.use(morgan('dev'));

  // Exercise videos
  app.use('/uploads', express.static(config.uploadsDir));

  app.use('/api', createApiRouter(context));

  app.use(notFoundHandler);
  app.use(createErrorHandler(config.nodeEnv));

  return httpServer;
}
