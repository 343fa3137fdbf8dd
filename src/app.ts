import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config';
import { errorHandler } from './middleware/errorHandler';
import { HttpError } from './utils/httpError';
import formatRoutes, { USAGE_REPORT_HEADER } from './routes/format';
import styleRoutes from './routes/styles';

export function createApp(allowedOrigins: string[] = config.corsOrigins) {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new HttpError(403, `Origin ${origin} not allowed by CORS`));
    },
    exposedHeaders: [USAGE_REPORT_HEADER, 'X-Request-Id', 'Content-Disposition']
  }));
  app.use(morgan('dev'));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use('/api/format', formatRoutes);
  app.use('/api/styles', styleRoutes);

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.use(errorHandler);

  return app;
}
