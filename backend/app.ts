import express, { Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import ActivityStore from './services/ActivityStore';
import { createActivityRouter } from './routes/activities';
import { ServerConfig } from './config/server';
import EnrollmentErrorHandler from './utils/EnrollmentErrorHandler';
import RosterMonitor from './utils/RosterMonitor';

export interface AppOptions {
  store: ActivityStore;
  config: ServerConfig;
}

/**
 * Build the Express application around an already seeded store
 */
export const createApp = ({ store, config }: AppOptions): express.Application => {
  const app = express();
  const errorHandler = EnrollmentErrorHandler.getInstance();

  errorHandler.setLogLevel(config.logLevel);
  RosterMonitor.getInstance().setLogLevel(config.logLevel);

  // Security middleware
  app.use(helmet());

  // Rate limiting
  app.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: 'Too many requests from this IP, please try again later.'
  }));

  app.use(cors({ origin: config.corsOrigin }));

  app.get('/', (req: Request, res: Response): void => {
    res.redirect(307, '/static/index.html');
  });

  app.use('/static', express.static(config.staticDir));

  app.use('/activities', createActivityRouter(store));

  // 404 handler
  app.use(errorHandler.notFoundMiddleware);

  // Global error handler
  app.use(errorHandler.errorMiddleware);

  return app;
};

export default createApp;
