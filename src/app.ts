import express from 'express';
import type { Application } from 'express';
import cors from 'cors';
import { InterviewController } from './controllers/interviewController';
import { QuizController } from './controllers/quizController';
import { createInterviewRoutes } from './routes/interviewRoutes';
import { createQuizRoutes } from './routes/quizRoutes';
import type { InterviewOrchestrator } from './services/interview-orchestrator/interviewOrchestrator';
import type { QuizOrchestrator } from './services/quiz-orchestrator/quizOrchestrator';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';

export interface AppServices {
  interviewOrchestrator: InterviewOrchestrator;
  quizOrchestrator: QuizOrchestrator;
  frontendUrl?: string;
}

export const createApp = (services: AppServices): Application => {
  const app = express();

  // Middleware
  app.use(cors({
    origin: services.frontendUrl || 'http://localhost:3000',
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/interviews', createInterviewRoutes(new InterviewController(services.interviewOrchestrator)));
  app.use('/api/quizzes', createQuizRoutes(new QuizController(services.quizOrchestrator)));

  // Error handling middleware (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
