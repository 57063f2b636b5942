import dotenv from 'dotenv';
import { createApp } from './app';
import { ConfigError, loadConfig } from './config/services';
import type { AppConfig } from './config/services';
import { connectRedis, disconnectRedis } from './config/redis';
import type { InterviewSession, QuizSession } from './models/types';
import { MemorySessionStore, RedisSessionStore, isInterviewSession, isQuizSession } from './repositories/sessionRepository';
import type { SessionStore } from './repositories/sessionRepository';
import { GroqTextModel } from './services/ai/textModel';
import { InterviewOrchestrator } from './services/interview-orchestrator/interviewOrchestrator';
import { QuizOrchestrator } from './services/quiz-orchestrator/quizOrchestrator';

// Load environment variables
dotenv.config();

const readConfig = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
};

const startServer = async () => {
  const config = readConfig();

  try {
    let interviewStore: SessionStore<InterviewSession>;
    let quizStore: SessionStore<QuizSession>;

    if (config.session.store === 'redis') {
      await connectRedis(config.redis);
      interviewStore = new RedisSessionStore('interview', config.session.ttlSeconds, isInterviewSession);
      quizStore = new RedisSessionStore('quiz', config.session.ttlSeconds, isQuizSession);
    } else {
      interviewStore = new MemorySessionStore<InterviewSession>(config.session.ttlSeconds);
      quizStore = new MemorySessionStore<QuizSession>(config.session.ttlSeconds);
    }
    console.log(`✓ Session store: ${config.session.store} (TTL ${config.session.ttlSeconds}s)`);

    const model = new GroqTextModel(config.groq);
    const app = createApp({
      interviewOrchestrator: new InterviewOrchestrator(interviewStore, model),
      quizOrchestrator: new QuizOrchestrator(quizStore, model),
      frontendUrl: config.server.frontendUrl,
    });

    app.listen(config.server.port, () => {
      console.log(`✓ Server running on port ${config.server.port}`);
      console.log(`✓ Environment: ${config.server.environment}`);
      console.log(`✓ Model: ${config.groq.model}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

const shutdown = (signal: string) => {
  console.log(`${signal} signal received: closing server gracefully`);
  disconnectRedis()
    .catch((error) => console.error('Failed to close Redis connection:', error))
    .finally(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

void startServer();
