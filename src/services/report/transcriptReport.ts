import type { InterviewTurn } from '../../models/types';

export const REPORT_FILE_NAME = 'interview_behavioral_log.txt';

export const buildTranscriptReport = (turns: InterviewTurn[]): string =>
  turns
    .map((turn) => `Q${turn.number}: ${turn.question}\nA${turn.number}: ${turn.answer}\nFeedback: ${turn.feedback}`)
    .join('\n\n');
