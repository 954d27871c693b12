import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config';
import { createAssessmentController } from './controllers/assessmentController';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createAssessmentRouter } from './routes/assessment';
import { KnowledgeBase } from './services/knowledgeBase';
import { SessionStore } from './services/sessionStore';
import { ImageStorage } from './services/storageService';
import { getLatencyStats } from './utils/logger';

export interface AppDeps {
  config: AppConfig;
  kb: KnowledgeBase;
  sessions: SessionStore;
  images: ImageStorage;
}

export function createApp({ config, kb, sessions, images }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
  }));
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      latency: getLatencyStats('assessment'),
    });
  });

  const controller = createAssessmentController({ kb, sessions, images, engine: config.engine });

  // API Routes
  app.get('/api/symptoms', controller.listSymptoms);
  app.use('/api/assessments', createAssessmentRouter(controller, config.maxUploadBytes));

  // Error handling middleware (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
