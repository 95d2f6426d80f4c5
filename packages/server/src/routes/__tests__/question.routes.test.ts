import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { APIConnectionError, APIConnectionTimeoutError } from '@anthropic-ai/sdk';
import { ErrorCode } from '@gmat-tutor/shared';

import anthropic from '../../config/anthropic.js';
import { createApp } from '../../app.js';

const app = createApp();

// ---------------------------------------------------------------------------
// Shared fixtures
// ---------------------------------------------------------------------------

const mockStream = (text: string) =>
  ({
    finalText: vi.fn().mockResolvedValue(text),
  }) as unknown as ReturnType<typeof anthropic.messages.stream>;

const failingStream = (error: Error) =>
  ({
    finalText: vi.fn().mockRejectedValue(error),
  }) as unknown as ReturnType<typeof anthropic.messages.stream>;

const VALID_QUESTION = {
  question: 'What is the least common multiple of 6 and 8?',
  options: ['A) 12', 'B) 16', 'C) 24', 'D) 36', 'E) 48'],
  explanation: '6 = 2 x 3 and 8 = 2^3, so the LCM is 2^3 x 3 = 24. The answer is C.',
  answer: 'C',
};

const VALID_RESPONSE = `<analysis>LCM via prime factors.</analysis>\n<question>${JSON.stringify(VALID_QUESTION)}</question>`;

beforeEach(() => {
  vi.resetAllMocks();
});

// ---------------------------------------------------------------------------
// POST /generate_question
// ---------------------------------------------------------------------------

describe('POST /generate_question', () => {
  it('returns 200 with a question for a valid topic and difficulty', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(VALID_RESPONSE));

    const res = await request(app)
      .post('/generate_question')
      .send({ topic: 'Number Properties', difficulty: 'Easy' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual(VALID_QUESTION);
  });

  it('returns 200 for an empty body using the configured defaults', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream(VALID_RESPONSE));

    const res = await request(app).post('/generate_question').send({});

    expect(res.status).toBe(200);
    const userMessage = vi.mocked(anthropic.messages.stream).mock.calls[0][0].messages[0].content;
    expect(userMessage).toContain('<topic>Algebra</topic>');
    expect(userMessage).toContain('<difficulty>Medium</difficulty>');
  });

  it('returns 400 for an unknown difficulty without calling the generative service', async () => {
    const res = await request(app)
      .post('/generate_question')
      .send({ topic: 'Algebra', difficulty: 'Impossible' });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe(ErrorCode.BAD_REQUEST);
    expect(res.body.error.details).toEqual([
      { field: 'difficulty', message: 'Difficulty must be one of: Easy, Medium, Hard' },
    ]);
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 400 for lower-case difficulty', async () => {
    const res = await request(app)
      .post('/generate_question')
      .send({ difficulty: 'hard' });

    expect(res.status).toBe(400);
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 400 for a malformed JSON body', async () => {
    const res = await request(app)
      .post('/generate_question')
      .set('Content-Type', 'application/json')
      .send('{"topic": ');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe(ErrorCode.BAD_REQUEST);
    expect(res.body.error.message).toBe('Request body could not be parsed');
    expect(anthropic.messages.stream).not.toHaveBeenCalled();
  });

  it('returns 500 when every attempt produces invalid output', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream('<question>not json</question>'));

    const res = await request(app).post('/generate_question').send({ topic: 'Algebra' });

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe(ErrorCode.GENERATION_VALIDATION_FAILED);
    expect(res.body.error.details.attempts).toBe(3);
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(3);
  });

  it('returns 502 when the generative service is unreachable', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(
      failingStream(new APIConnectionError({ message: 'connection refused' })),
    );

    const res = await request(app).post('/generate_question').send({ topic: 'Algebra' });

    expect(res.status).toBe(502);
    expect(res.body.error.code).toBe(ErrorCode.UPSTREAM_ERROR);
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(1);
  });

  it('returns 504 when the generative service times out', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(failingStream(new APIConnectionTimeoutError()));

    const res = await request(app).post('/generate_question').send({ topic: 'Algebra' });

    expect(res.status).toBe(504);
    expect(res.body.error).toEqual({
      code: ErrorCode.UPSTREAM_TIMEOUT,
      message: 'The generation service did not respond in time',
      details: { timeoutMs: 300 },
    });
  });

  it('returns 500 INTERNAL_ERROR for an unexpected failure', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(failingStream(new TypeError('boom')));

    const res = await request(app).post('/generate_question').send({ topic: 'Algebra' });

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    });
  });
});
