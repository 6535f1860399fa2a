import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NextRequest } from 'next/server';
import { closeDb, getDb } from '@/lib/db';
import { findQuestion, seedSample, type SampleCategories } from '@/test/helpers';
import { GET as listAttempts, POST as startAttempt } from './route';
import { GET as getOverview } from './[id]/route';
import { GET as getAnswer, PUT as putSelection } from './[id]/answers/[answerId]/route';
import { GET as getReview } from './[id]/review/route';
import { POST as submit } from './[id]/submit/route';
import { GET as getResults } from './[id]/results/route';
import { POST as toggleFlag } from '../answers/[answerId]/flag/route';
import { GET as listCategories } from '../categories/route';

interface RequestOptions {
  body?: unknown;
  rawBody?: string;
  user?: string | null;
}

function makeRequest(method: string, url: string, options: RequestOptions = {}): NextRequest {
  const headers = new Headers({ 'content-type': 'application/json' });
  const user = options.user === undefined ? 'alice' : options.user;
  if (user) {
    headers.set('x-user-id', user);
  }

  const body =
    options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
  return new NextRequest(`http://localhost${url}`, { method, headers, body });
}

function attemptParams(id: number) {
  return { params: Promise.resolve({ id: String(id) }) };
}

describe('attempt routes', () => {
  let sample: SampleCategories;

  beforeEach(() => {
    sample = seedSample(getDb());
  });

  afterEach(() => {
    closeDb();
  });

  async function start(categoryId: number, user = 'alice'): Promise<number> {
    const response = await startAttempt(
      makeRequest('POST', '/api/attempts', { body: { categoryId }, user })
    );
    expect(response.status).toBe(201);
    const { attempt } = await response.json();
    return attempt.id;
  }

  describe('POST /api/attempts', () => {
    it('requires a user', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { body: { categoryId: sample.basics.id }, user: null })
      );

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({
        error: 'Authentication required',
        code: 'UNAUTHORIZED',
      });
    });

    it('starts an attempt', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { body: { categoryId: sample.basics.id } })
      );

      expect(response.status).toBe(201);
      const { attempt } = await response.json();
      expect(attempt).toMatchObject({
        userId: 'alice',
        categoryId: sample.basics.id,
        totalQuestions: 4,
        score: null,
        completedAt: null,
      });
    });

    it('rejects a malformed body', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { body: { categoryId: 'abc' } })
      );

      expect(response.status).toBe(400);
      expect((await response.json()).code).toBe('INVALID_REQUEST');
    });

    it('rejects a body that is not JSON', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { rawBody: '{categoryId' })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Request body must be valid JSON',
        code: 'INVALID_REQUEST',
      });
    });

    it('reports an empty category', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { body: { categoryId: sample.empty.id } })
      );

      expect(response.status).toBe(422);
      expect(await response.json()).toEqual({
        error: 'No questions available for Empty Category',
        code: 'NO_QUESTIONS_AVAILABLE',
      });
    });

    it('reports an unknown category', async () => {
      const response = await startAttempt(
        makeRequest('POST', '/api/attempts', { body: { categoryId: 999 } })
      );

      expect(response.status).toBe(404);
      expect((await response.json()).code).toBe('NOT_FOUND');
    });
  });

  describe('GET /api/attempts/[id]', () => {
    it('hides attempts of other users', async () => {
      const attemptId = await start(sample.basics.id);

      const own = await getOverview(
        makeRequest('GET', `/api/attempts/${attemptId}`),
        attemptParams(attemptId)
      );
      expect(own.status).toBe(200);
      expect((await own.json()).answerIds).toHaveLength(4);

      const foreign = await getOverview(
        makeRequest('GET', `/api/attempts/${attemptId}`, { user: 'bob' }),
        attemptParams(attemptId)
      );
      expect(foreign.status).toBe(404);
    });

    it('rejects a non-numeric id', async () => {
      const response = await getOverview(
        makeRequest('GET', '/api/attempts/abc'),
        { params: Promise.resolve({ id: 'abc' }) }
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'id must be a positive integer',
        code: 'INVALID_REQUEST',
      });
    });
  });

  it('runs a quiz from start to results', async () => {
    const categories = await listCategories(makeRequest('GET', '/api/categories'));
    expect((await categories.json()).categories).toHaveLength(3);

    const attemptId = await start(sample.basics.id);
    const overview = await (
      await getOverview(makeRequest('GET', `/api/attempts/${attemptId}`), attemptParams(attemptId))
    ).json();
    const answerId: number = overview.currentAnswerId;
    const answerParams = {
      params: Promise.resolve({ id: String(attemptId), answerId: String(answerId) }),
    };

    const shown = await getAnswer(
      makeRequest('GET', `/api/attempts/${attemptId}/answers/${answerId}`),
      answerParams
    );
    const { answer } = await shown.json();
    expect(answer.navigation).toMatchObject({ isFirst: true, previousId: null, position: 1 });
    expect(answer.navigation.nextId).toBe(overview.answerIds[1]);

    const question = findQuestion(getDb(), sample.basics.id, answer.question.text);
    const correctIds = question.options.filter((o) => o.isCorrect).map((o) => o.id);
    const other = findQuestion(
      getDb(),
      sample.basics.id,
      question.type === 'multiple'
        ? 'Which keyword declares a constant?'
        : 'Which of the following are mutable data types?'
    );

    const invalid = await putSelection(
      makeRequest('PUT', `/api/attempts/${attemptId}/answers/${answerId}`, {
        body: { optionIds: [other.options[0].id] },
      }),
      answerParams
    );
    expect(invalid.status).toBe(422);
    expect((await invalid.json()).code).toBe('INVALID_OPTION');

    const saved = await putSelection(
      makeRequest('PUT', `/api/attempts/${attemptId}/answers/${answerId}`, {
        body: { optionIds: correctIds },
      }),
      answerParams
    );
    expect(saved.status).toBe(200);
    expect((await saved.json()).answer.selectedOptionIds).toEqual(correctIds);

    const flagged = await toggleFlag(
      makeRequest('POST', `/api/answers/${answerId}/flag`),
      { params: Promise.resolve({ answerId: String(answerId) }) }
    );
    expect(await flagged.json()).toEqual({ flagged: true });

    const review = await getReview(
      makeRequest('GET', `/api/attempts/${attemptId}/review`),
      attemptParams(attemptId)
    );
    expect((await review.json()).counts).toEqual({
      total: 4,
      answered: 1,
      unanswered: 3,
      flagged: 1,
    });

    const early = await getResults(
      makeRequest('GET', `/api/attempts/${attemptId}/results`),
      attemptParams(attemptId)
    );
    expect(early.status).toBe(409);
    expect((await early.json()).code).toBe('ATTEMPT_IN_PROGRESS');

    const submitted = await submit(
      makeRequest('POST', `/api/attempts/${attemptId}/submit`),
      attemptParams(attemptId)
    );
    expect((await submitted.json()).attempt).toMatchObject({ score: 25, passed: false });

    const results = await getResults(
      makeRequest('GET', `/api/attempts/${attemptId}/results`),
      attemptParams(attemptId)
    );
    const body = await results.json();
    expect(body.correctCount).toBe(1);
    expect(body.results[0]).toMatchObject({ answerId, isCorrect: true });

    const late = await putSelection(
      makeRequest('PUT', `/api/attempts/${attemptId}/answers/${answerId}`, {
        body: { optionIds: [] },
      }),
      answerParams
    );
    expect(late.status).toBe(409);
    expect((await late.json()).code).toBe('ATTEMPT_COMPLETED');

    const recent = await listAttempts(makeRequest('GET', '/api/attempts'));
    const { attempts } = await recent.json();
    expect(attempts).toHaveLength(1);
    expect(attempts[0]).toMatchObject({
      id: attemptId,
      categoryName: 'Programming Basics',
      score: 25,
    });
  });
});
