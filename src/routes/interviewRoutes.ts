import { Router } from 'express';
import type { InterviewController } from '../controllers/interviewController';
import { uploadResume } from '../middlewares/upload';

export const createInterviewRoutes = (controller: InterviewController): Router => {
  const router = Router();

  // Start a new interview (JSON, or multipart with a `resume` PDF)
  router.post('/start', uploadResume.single('resume'), controller.startInterview);

  router.get('/:sessionId', controller.getInterview);

  // Answer the current question ("quit" or "exit" ends the interview)
  router.post('/:sessionId/answers', controller.submitAnswer);

  router.post('/:sessionId/end', controller.endInterview);

  // Plain-text transcript, available once the interview has ended
  router.get('/:sessionId/report', controller.downloadReport);

  router.delete('/:sessionId', controller.clearInterview);

  return router;
};
