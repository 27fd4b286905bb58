import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { PlanningUnavailableError } from '../errors';
import { buildQaPrompt, formatPreferences, OpenAIPlanner, parseReply } from '../planning/openaiPlanner';
import { filterByLicense, gatherResearch } from '../planning/research';
import type { SearchResult } from '../planning/research';
import { backoffDelay, withPlanningRetry } from '../planning/retry';
import type { PlanningContext, TranscriptEntry } from '../planning/types';

function entry(role: TranscriptEntry['role'], text: string): TranscriptEntry {
  return { role, text, at: 0 };
}

const context: PlanningContext = {
  sessionId: 's-1',
  projectId: 'todo-app',
  phase: 'intake',
  transcript: [entry('user', 'Build a todo app')],
  preferences: [],
};

describe('withPlanningRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce('plan');
    const sleep = vi.fn(async () => undefined);

    await expect(withPlanningRetry('plan', fn, { maxAttempts: 3, initialDelayMs: 0, sleep })).resolves.toBe('plan');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('model down'));
    const sleep = vi.fn(async () => undefined);

    const attempt = withPlanningRetry('plan', fn, { maxAttempts: 3, initialDelayMs: 0, sleep });

    await expect(attempt).rejects.toBeInstanceOf(PlanningUnavailableError);
    await expect(attempt).rejects.toThrow('Planner unavailable after 3 attempts: model down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('backs off exponentially within the jitter band', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(backoffDelay(0, 500)).toBe(500);
    expect(backoffDelay(3, 500)).toBe(4000);
    expect(backoffDelay(10, 500)).toBe(30000);
    vi.restoreAllMocks();
  });
});

describe('OpenAIPlanner helpers', () => {
  it('builds the question and answer prompt', () => {
    const transcript = [
      entry('user', 'Build a todo app'),
      entry('assistant', 'Which language?'),
      entry('user', 'Rust'),
    ];

    expect(buildQaPrompt(transcript)).toBe('Instruction: Build a todo app\n\nQ: Which language?\nA: Rust\n\nQ: ');
    expect(buildQaPrompt([])).toBe('Instruction: \n\nQ: ');
  });

  it('formats preferences', () => {
    expect(formatPreferences([])).toBe('User preferences: none recorded');
    expect(
      formatPreferences([{ key: 'language', value: 'rust', confidence: 1, sourceSessionId: 's-0', updatedAt: 1 }])
    ).toBe('User preferences:\n- language: rust');
  });

  it('parses fenced and bare JSON replies', () => {
    const schema = z.object({ ready: z.boolean() });

    expect(parseReply('```json\n{"ready": true}\n```', schema)).toEqual({ ready: true });
    expect(parseReply('Sure: {"ready": false}', schema)).toEqual({ ready: false });
    expect(() => parseReply('no json here', schema)).toThrow('Planner reply contains no JSON object');
  });
});

describe('OpenAIPlanner', () => {
  it('turns an intake reply into a question', async () => {
    const complete = vi.fn(async () => '{"ready": false, "question": "Which language?"}');
    const planner = new OpenAIPlanner({ model: 'test-model', complete });

    expect(await planner.intake(context)).toEqual({ kind: 'question', text: 'Which language?' });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('rejects a reply that is neither ready nor a question', async () => {
    const planner = new OpenAIPlanner({ model: 'test-model', complete: async () => '{"ready": false}' });

    await expect(planner.intake(context)).rejects.toThrow('Planner reply is not ready but asks no question');
  });

  it('validates plans', async () => {
    const planner = new OpenAIPlanner({
      model: 'test-model',
      complete: async () => '{"summary": "Todo app", "steps": [{"description": "init", "argv": ["cargo", "init"]}]}',
    });

    expect(await planner.plan(context)).toEqual({
      summary: 'Todo app',
      steps: [{ description: 'init', argv: ['cargo', 'init'] }],
    });
  });

  it('mentions the replan reason and research notes in the plan prompt', async () => {
    let prompt = '';
    const planner = new OpenAIPlanner({
      model: 'test-model',
      complete: async (messages) => {
        const last = messages[messages.length - 1];
        prompt = typeof last?.content === 'string' ? last.content : '';
        return '{"summary": "Retry", "steps": [{"description": "build", "argv": ["cargo", "build"]}]}';
      },
      research: async () => [{ title: 'Cargo book', url: 'https://docs.test/cargo', scope: 'documentation', text: 'Use cargo.' }],
    });

    await planner.plan(context, 'Build timed out');

    expect(prompt).toContain('## Cargo book (https://docs.test/cargo)\nUse cargo.');
    expect(prompt).toContain('The previous plan failed: Build timed out');
  });

  it('maps decide replies to step decisions', async () => {
    const planner = new OpenAIPlanner({ model: 'test-model', complete: async () => '{"decision": "replan"}' });
    const report = {
      stepIndex: 0,
      argv: ['cargo', 'build'],
      outcome: { commandId: 'c', correlationId: 'r', status: 'timed_out' as const, exitCode: null, signal: null, durationMs: 5 },
      output: '',
    };

    expect(await planner.decide(context, { summary: 'Todo', steps: [{ description: 'build', argv: ['cargo', 'build'] }] }, report)).toEqual({
      kind: 'replan',
      reason: 'Planner requested a new plan',
      preferences: undefined,
    });
  });
});

describe('research', () => {
  const results: SearchResult[] = [
    { title: 'B', url: 'https://b.test', summary: 'second', rank: 2, license: 'MIT' },
    { title: 'A', url: 'https://a.test', summary: 'first', rank: 1, license: 'GPL-3.0' },
    { title: 'C', url: 'https://c.test', summary: 'third', rank: 3 },
  ];

  it('filters by license', () => {
    expect(filterByLicense(results, ['mit']).map((result) => result.title)).toEqual(['B']);
    expect(filterByLicense(results, ['MIT'], true).map((result) => result.title)).toEqual(['B', 'C']);
  });

  it('ranks results across scopes and converts markup', async () => {
    const notes = await gatherResearch('todo app', {
      scopes: ['documentation'],
      search: { search: async () => [...results, { title: 'D', url: 'https://d.test', summary: '', rank: 0, html: '<p>Docs</p>' }] },
      htmlToText: { convert: (html) => html.replace(/<[^>]+>/g, '') },
      maxResults: 2,
    });

    expect(notes).toEqual([
      { title: 'D', url: 'https://d.test', scope: 'documentation', text: 'Docs' },
      { title: 'A', url: 'https://a.test', scope: 'documentation', text: 'first' },
    ]);
  });

  it('skips a failing scope', async () => {
    const notes = await gatherResearch('todo app', {
      scopes: ['code_host', 'documentation'],
      search: {
        search: async (_query, scope) => {
          if (scope === 'code_host') throw new Error('rate limited');
          return results.slice(0, 1);
        },
      },
      htmlToText: { convert: (html) => html },
    });

    expect(notes.map((note) => note.title)).toEqual(['B']);
  });
});
