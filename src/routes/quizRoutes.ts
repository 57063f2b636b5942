import { Router } from 'express';
import type { QuizController } from '../controllers/quizController';

export const createQuizRoutes = (controller: QuizController): Router => {
  const router = Router();

  router.post('/start', controller.startQuiz);
  router.get('/:sessionId', controller.getQuiz);
  router.put('/:sessionId/answers/:questionIndex', controller.selectOption);
  router.post('/:sessionId/submit', controller.submitQuiz);

  // Explanations for missed questions are only generated on request
  router.post('/:sessionId/explanations', controller.explainMistakes);

  router.delete('/:sessionId', controller.clearQuiz);

  return router;
};
