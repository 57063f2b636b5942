import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import type { InterviewSession, QuizSession } from '../models/types';
import { MemorySessionStore } from '../repositories/sessionRepository';
import { InterviewOrchestrator } from '../services/interview-orchestrator/interviewOrchestrator';
import { QuizOrchestrator } from '../services/quiz-orchestrator/quizOrchestrator';
import { FakeTextModel } from '../testing/fakeTextModel';

const extractTextFromPdf = vi.hoisted(() => vi.fn());

vi.mock('../services/document/resumeParser', () => ({ extractTextFromPdf }));

const buildApp = (model: FakeTextModel) =>
  createApp({
    interviewOrchestrator: new InterviewOrchestrator(new MemorySessionStore<InterviewSession>(3600), model, () => 'session-1'),
    quizOrchestrator: new QuizOrchestrator(new MemorySessionStore<QuizSession>(3600), model, () => 'quiz-1'),
  });

const candidate = { jobTitle: 'Backend Engineer', resumeText: '5 years Go and distributed systems' };

describe('interview routes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    extractTextFromPdf.mockReset();
  });

  it('runs an interview from first question to downloaded report', async () => {
    const model = new FakeTextModel([
      'Tell me about yourself.',
      'Clear and concise.',
      'Describe a conflict you resolved.',
    ]);
    const app = buildApp(model);

    const started = await request(app).post('/api/interviews/start').send(candidate);
    expect(started.status).toBe(201);
    expect(started.body.data).toMatchObject({
      sessionId: 'session-1',
      status: 'in-progress',
      jobTitle: 'Backend Engineer',
      currentQuestion: { number: 1, text: 'Tell me about yourself.' },
      turns: [],
      notices: [],
    });
    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).toContain("**Candidate's Previous Answers:**\n\n\nAsk the next");

    const answered = await request(app)
      .post('/api/interviews/session-1/answers')
      .send({ answer: 'I build backend services.' });
    expect(answered.status).toBe(200);
    expect(answered.body.data.currentQuestion).toEqual({ number: 2, text: 'Describe a conflict you resolved.' });
    expect(answered.body.data.turns).toEqual([
      { number: 1, question: 'Tell me about yourself.', answer: 'I build backend services.', feedback: 'Clear and concise.' },
    ]);
    expect(model.prompts).toHaveLength(3);

    const quit = await request(app).post('/api/interviews/session-1/answers').send({ answer: ' Quit ' });
    expect(quit.status).toBe(200);
    expect(quit.body.data).toMatchObject({
      status: 'completed',
      endReason: 'sentinel',
      currentQuestion: null,
      message: 'Mock interview completed!',
    });
    expect(model.prompts).toHaveLength(3);

    const report = await request(app).get('/api/interviews/session-1/report');
    expect(report.status).toBe(200);
    expect(report.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(report.headers['content-disposition']).toBe('attachment; filename="interview_behavioral_log.txt"');
    expect(report.text).toBe('Q1: Tell me about yourself.\nA1: I build backend services.\nFeedback: Clear and concise.');

    const late = await request(app).post('/api/interviews/session-1/answers').send({ answer: 'One more thing' });
    expect(late.status).toBe(409);
    expect(late.body).toEqual({ success: false, error: 'Interview has already ended' });
  });

  it('requires both a job title and a resume', async () => {
    const model = new FakeTextModel();
    const res = await request(buildApp(model)).post('/api/interviews/start').send({ jobTitle: 'Backend Engineer' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Please provide both the job title and your resume.' });
    expect(model.prompts).toEqual([]);
  });

  it('discards the session when the first question cannot be generated', async () => {
    const app = buildApp(new FakeTextModel([new Error('Model unavailable')]));

    const res = await request(app).post('/api/interviews/start').send(candidate);
    expect(res.status).toBe(502);
    expect(res.body).toEqual({ success: false, error: 'Error generating question: Model unavailable' });

    const lookup = await request(app).get('/api/interviews/session-1');
    expect(lookup.status).toBe(404);
    expect(lookup.body.error).toBe('Interview session not found');
  });

  it('keeps going past a feedback failure but ends on a next-question failure', async () => {
    const app = buildApp(
      new FakeTextModel(['Tell me about yourself.', new Error('feedback down'), new Error('question down')])
    );
    await request(app).post('/api/interviews/start').send(candidate);

    const res = await request(app).post('/api/interviews/session-1/answers').send({ answer: 'I build APIs.' });

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ status: 'completed', endReason: 'question-failed' });
    expect(res.body.data.notices).toEqual([
      'Error generating feedback: feedback down',
      'Error generating next question: question down',
    ]);
    expect(res.body.data.turns).toEqual([
      { number: 1, question: 'Tell me about yourself.', answer: 'I build APIs.', feedback: 'Feedback generation failed.' },
    ]);
  });

  it('rejects a blank answer', async () => {
    const app = buildApp(new FakeTextModel(['Tell me about yourself.']));
    await request(app).post('/api/interviews/start').send(candidate);

    const res = await request(app).post('/api/interviews/session-1/answers').send({ answer: '  ' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Answer is required');
  });

  it('ends early, then serves the report and clears the session', async () => {
    const app = buildApp(new FakeTextModel(['Tell me about yourself.']));
    await request(app).post('/api/interviews/start').send(candidate);

    const early = await request(app).get('/api/interviews/session-1/report');
    expect(early.status).toBe(409);

    const ended = await request(app).post('/api/interviews/session-1/end');
    expect(ended.body.data).toMatchObject({ status: 'completed', endReason: 'ended-early', turns: [] });

    const report = await request(app).get('/api/interviews/session-1/report');
    expect(report.status).toBe(200);
    expect(report.text).toBe('');

    const cleared = await request(app).delete('/api/interviews/session-1');
    expect(cleared.body).toEqual({ success: true, message: 'Interview session cleared' });
    expect((await request(app).get('/api/interviews/session-1')).status).toBe(404);
    expect((await request(app).delete('/api/interviews/session-1')).status).toBe(404);
  });

  it('reads the resume from an uploaded PDF', async () => {
    extractTextFromPdf.mockResolvedValueOnce({ text: 'Go developer at a payments company', warning: null });
    const model = new FakeTextModel(['Tell me about yourself.']);

    const res = await request(buildApp(model))
      .post('/api/interviews/start')
      .field('jobTitle', 'Backend Engineer')
      .field('jobDescription', 'Own the ledger service')
      .attach('resume', Buffer.from('%PDF-1.7 test'), { filename: 'resume.pdf', contentType: 'application/pdf' });

    expect(res.status).toBe(201);
    expect(extractTextFromPdf).toHaveBeenCalledTimes(1);
    expect(model.prompts[0]).toContain('**Candidate Resume:**\nGo developer at a payments company');
    expect(model.prompts[0]).toContain('**Job Description:**\nOwn the ledger service');
  });

  it('surfaces the PDF warning when the resume cannot be read', async () => {
    extractTextFromPdf.mockResolvedValueOnce({ text: '', warning: 'Error reading PDF: bad xref table' });

    const res = await request(buildApp(new FakeTextModel()))
      .post('/api/interviews/start')
      .field('jobTitle', 'Backend Engineer')
      .attach('resume', Buffer.from('garbage'), { filename: 'resume.pdf', contentType: 'application/pdf' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      error: 'Please provide both the job title and your resume.',
      details: { warnings: ['Error reading PDF: bad xref table'] },
    });
  });

  it('only accepts PDF uploads', async () => {
    const res = await request(buildApp(new FakeTextModel()))
      .post('/api/interviews/start')
      .field('jobTitle', 'Backend Engineer')
      .attach('resume', Buffer.from('plain text resume'), { filename: 'resume.txt', contentType: 'text/plain' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Only PDF resumes are supported');
    expect(extractTextFromPdf).not.toHaveBeenCalled();
  });

  it('answers health checks and unknown routes', async () => {
    const app = buildApp(new FakeTextModel());

    const health = await request(app).get('/health');
    expect(health.body.status).toBe('ok');

    const missing = await request(app).get('/api/unknown');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ success: false, error: 'Route not found' });
  });

  it('rejects malformed JSON bodies', async () => {
    const res = await request(buildApp(new FakeTextModel()))
      .post('/api/interviews/start')
      .set('Content-Type', 'application/json')
      .send('{"jobTitle": ');

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
  });
});
