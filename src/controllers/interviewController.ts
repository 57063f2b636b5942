import type { Request, Response, NextFunction } from 'express';
import type { InterviewOrchestrator } from '../services/interview-orchestrator/interviewOrchestrator';
import { toInterviewView } from '../services/interview/interviewView';
import { extractTextFromPdf } from '../services/document/resumeParser';
import { REPORT_FILE_NAME } from '../services/report/transcriptReport';
import { ApiError } from '../middlewares/errorHandler';
import { readString } from '../utils/requestFields';

type SessionParams = { sessionId: string };

export class InterviewController {
  constructor(private readonly orchestrator: InterviewOrchestrator) {}

  startInterview = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const warnings: string[] = [];
      let resumeText = readString(req.body, 'resumeText');

      if (req.file) {
        const document = await extractTextFromPdf(req.file.buffer);
        resumeText = document.text;
        if (document.warning) warnings.push(document.warning);
      }

      const jobTitle = readString(req.body, 'jobTitle');
      if (!jobTitle.trim() || !resumeText.trim()) {
        throw new ApiError(
          400,
          'Please provide both the job title and your resume.',
          warnings.length > 0 ? { warnings } : undefined
        );
      }

      const { session, notices } = await this.orchestrator.initializeInterview({
        jobTitle,
        resumeText,
        jobDescription: readString(req.body, 'jobDescription') || null,
      });

      res.status(201).json({
        success: true,
        data: { ...toInterviewView(session), notices: [...warnings, ...notices] },
      });
    } catch (error) {
      next(error);
    }
  };

  getInterview = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const session = await this.orchestrator.getInterviewState(req.params.sessionId);
      res.json({ success: true, data: toInterviewView(session) });
    } catch (error) {
      next(error);
    }
  };

  submitAnswer = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const { session, notices } = await this.orchestrator.submitAnswer(
        req.params.sessionId,
        readString(req.body, 'answer')
      );
      res.json({ success: true, data: { ...toInterviewView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  endInterview = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const { session, notices } = await this.orchestrator.completeInterview(req.params.sessionId);
      res.json({ success: true, data: { ...toInterviewView(session), notices } });
    } catch (error) {
      next(error);
    }
  };

  downloadReport = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      const report = await this.orchestrator.getReport(req.params.sessionId);
      res.attachment(REPORT_FILE_NAME);
      res.type('text/plain').send(report);
    } catch (error) {
      next(error);
    }
  };

  clearInterview = async (req: Request<SessionParams>, res: Response, next: NextFunction) => {
    try {
      await this.orchestrator.clearInterview(req.params.sessionId);
      res.json({ success: true, message: 'Interview session cleared' });
    } catch (error) {
      next(error);
    }
  };
}
