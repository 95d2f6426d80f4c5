import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { ErrorCode } from '@gmat-tutor/shared';

import anthropic from '../../config/anthropic.js';
import { createApp } from '../../app.js';

const app = createApp();

const mockStream = (text: string) =>
  ({
    finalText: vi.fn().mockResolvedValue(text),
  }) as unknown as ReturnType<typeof anthropic.messages.stream>;

const QUESTION_DATA = {
  question: 'A train travels 150 miles in 2.5 hours. What is its average speed in miles per hour?',
  options: ['A) 50', 'B) 55', 'C) 58', 'D) 60', 'E) 65'],
  explanation: 'Speed is distance over time: 150 / 2.5 = 60 miles per hour. The answer is D.',
  answer: 'E',
};

const FEEDBACK = {
  feedback: 'Your answer is incorrect. The correct answer is E.',
  remediation_topic: 'Word Problems: Rate and Distance',
};

const FEEDBACK_RESPONSE = `<reasoning>Rate problem.</reasoning>\n<evaluation>${JSON.stringify(FEEDBACK)}</evaluation>`;

beforeEach(() => {
  vi.resetAllMocks();
});

describe('POST /evaluate_answer', () => {
  it('returns is_correct false when the student picks C and the answer is E', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(FEEDBACK_RESPONSE));

    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: QUESTION_DATA, student_answer: 'C' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      is_correct: false,
      feedback: FEEDBACK.feedback,
      remediation_topic: FEEDBACK.remediation_topic,
    });
  });

  it('returns is_correct true for a case-insensitive match', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(FEEDBACK_RESPONSE));

    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: QUESTION_DATA, student_answer: 'e' });

    expect(res.status).toBe(200);
    expect(res.body.is_correct).toBe(true);
  });

  it('accepts a lower-case stored answer label', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(FEEDBACK_RESPONSE));

    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: { ...QUESTION_DATA, answer: 'e' }, student_answer: 'E' });

    expect(res.status).toBe(200);
    expect(res.body.is_correct).toBe(true);
  });

  it('treats an over-long student answer as a wrong answer, not a request error', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(FEEDBACK_RESPONSE));

    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: QUESTION_DATA, student_answer: 'x'.repeat(501) });

    expect(res.status).toBe(200);
    expect(res.body.is_correct).toBe(false);
    expect(res.body.feedback).toBe(FEEDBACK.feedback);
  });

  it('returns 400 when question_data has four options, without calling the generative service', async () => {
    const res = await request(app)
      .post('/evaluate_answer')
      .send({
        question_data: { ...QUESTION_DATA, options: QUESTION_DATA.options.slice(0, 4) },
        student_answer: 'C',
      });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe(ErrorCode.BAD_REQUEST);
    expect(res.body.error.details).toEqual([
      { field: 'question_data.options', message: 'question_data.options must contain exactly 5 entries' },
    ]);
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 400 when the stored answer is not a label', async () => {
    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: { ...QUESTION_DATA, answer: 'F' }, student_answer: 'C' });

    expect(res.status).toBe(400);
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 400 when student_answer is missing', async () => {
    const res = await request(app)
      .post('/evaluate_answer')
      .send({ question_data: QUESTION_DATA });

    expect(res.status).toBe(400);
    expect(res.body.error.details[0].field).toBe('student_answer');
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 400 when question_data is missing', async () => {
    const res = await request(app).post('/evaluate_answer').send({ student_answer: 'C' });

    expect(res.status).toBe(400);
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });
});
