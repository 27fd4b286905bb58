/**
 * Planner backed by an OpenAI-compatible chat completions endpoint
 *
 * Every call asks for a JSON object and validates it with zod; anything that
 * does not parse is thrown so the retry wrapper can try again.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import type { Config } from '../config';
import { loggers } from '../utils/logger';
import type { ResearchNote } from './research';
import { PlanSchema, StagedPreferenceSchema } from './types';
import type {
  ExecutionReport,
  IntakeDecision,
  Plan,
  Planner,
  PlanningContext,
  StepDecision,
  TranscriptEntry,
} from './types';
import type { PreferenceFact } from '../preferences/types';

const log = loggers.planner;

export type CompletionFn = (messages: ChatCompletionMessageParam[]) => Promise<string>;

export interface OpenAIPlannerOptions {
  model: string;
  client?: OpenAI;
  /** Overrides the client; used to plug in other backends */
  complete?: CompletionFn;
  /** Reference material for planning, e.g. gatherResearch bound to a search provider */
  research?: (query: string) => Promise<ResearchNote[]>;
  temperature?: number;
}

const IntakeReplySchema = z.object({
  ready: z.boolean(),
  question: z.string().optional(),
  summary: z.string().optional(),
  preferences: z.array(StagedPreferenceSchema).optional(),
});

const DecideReplySchema = z.object({
  decision: z.enum(['continue', 'replan', 'review']),
  reason: z.string().optional(),
  summary: z.string().optional(),
  preferences: z.array(StagedPreferenceSchema).optional(),
});

const INTAKE_SYSTEM = [
  'You are a software developer gathering requirements for a new project.',
  'Ask one short clarifying question at a time. When you know enough to plan, stop asking.',
  'Also report stylistic or technical preferences the user revealed (language, formatting, tooling).',
  'Reply with JSON: {"ready": boolean, "question"?: string, "summary"?: string,',
  '"preferences"?: [{"key": string, "value": string, "confidence": number between 0 and 1}]}',
].join('\n');

const PLAN_SYSTEM = [
  'You are a software developer planning shell commands that build the requested project.',
  'Commands run with bash in an empty project directory without root privileges.',
  'Honor the user preferences listed. Keep each step a single command.',
  'Reply with JSON: {"summary": string, "steps": [{"description": string, "argv": string[],',
  '"cwd"?: string, "timeoutMs"?: number}]}',
].join('\n');

const DECIDE_SYSTEM = [
  'You are a software developer reviewing the result of one step of a plan.',
  'Decide whether to continue with the next step, replan because the approach must change,',
  'or move to review because the project is done.',
  'Reply with JSON: {"decision": "continue" | "replan" | "review", "reason"?: string, "summary"?: string,',
  '"preferences"?: [{"key": string, "value": string, "confidence": number}]}',
].join('\n');

/**
 * Intake prompt: the instruction followed by every answered question, ending
 * with an open "Q: " for the next question
 */
export function buildQaPrompt(transcript: readonly TranscriptEntry[]): string {
  const first = transcript.findIndex((entry) => entry.role === 'user');
  if (first < 0) return 'Instruction: \n\nQ: ';

  let prompt = `Instruction: ${transcript[first]?.text ?? ''}\n\n`;
  for (let i = first + 1; i < transcript.length - 1; i++) {
    const question = transcript[i];
    const answer = transcript[i + 1];
    if (question?.role === 'assistant' && answer?.role === 'user') {
      prompt += `Q: ${question.text}\nA: ${answer.text}\n\n`;
      i++;
    }
  }
  return `${prompt}Q: `;
}

export function formatPreferences(preferences: readonly PreferenceFact[]): string {
  if (preferences.length === 0) return 'User preferences: none recorded';
  return ['User preferences:', ...preferences.map((fact) => `- ${fact.key}: ${fact.value}`)].join('\n');
}

/**
 * Pull the JSON object out of a model reply and validate it
 */
export function parseReply<T>(text: string, schema: z.ZodType<T>): T {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  const body = (fenced?.[1] ?? text).trim();
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start < 0 || end < start) {
    throw new Error('Planner reply contains no JSON object');
  }
  return schema.parse(JSON.parse(body.slice(start, end + 1)));
}

export class OpenAIPlanner implements Planner {
  private readonly complete: CompletionFn;

  constructor(private readonly options: OpenAIPlannerOptions) {
    if (options.complete) {
      this.complete = options.complete;
    } else if (options.client) {
      const client = options.client;
      this.complete = async (messages) => {
        const response = await client.chat.completions.create({
          model: options.model,
          messages,
          temperature: options.temperature ?? 0.2,
          response_format: { type: 'json_object' },
        });
        return response.choices[0]?.message?.content ?? '';
      };
    } else {
      throw new Error('OpenAIPlanner needs a client or a completion function');
    }
  }

  static fromConfig(config: Config): OpenAIPlanner {
    // Self-hosted compatible endpoints may not need a key
    const client = new OpenAI({ apiKey: config.openaiApiKey ?? 'not-required', baseURL: config.openaiBaseUrl });
    log.info({ model: config.plannerModel, baseUrl: config.openaiBaseUrl }, 'OpenAI planner configured');
    return new OpenAIPlanner({ model: config.plannerModel, client });
  }

  async intake(context: PlanningContext): Promise<IntakeDecision> {
    const reply = await this.ask('intake', [
      { role: 'system', content: INTAKE_SYSTEM },
      { role: 'user', content: `${formatPreferences(context.preferences)}\n\n${buildQaPrompt(context.transcript)}` },
    ], IntakeReplySchema);

    if (reply.ready) {
      return { kind: 'ready', summary: reply.summary, preferences: reply.preferences };
    }
    if (!reply.question) {
      throw new Error('Planner reply is not ready but asks no question');
    }
    return { kind: 'question', text: reply.question };
  }

  async plan(context: PlanningContext, reason?: string): Promise<Plan> {
    const sections = [formatPreferences(context.preferences), buildQaPrompt(context.transcript).replace(/Q: $/, '')];

    if (this.options.research) {
      const instruction = context.transcript.find((entry) => entry.role === 'user')?.text ?? '';
      const notes = await this.options.research(instruction);
      if (notes.length > 0) {
        sections.push(['Reference material:', ...notes.map((note) => `## ${note.title} (${note.url})\n${note.text}`)].join('\n'));
      }
    }
    if (reason) {
      sections.push(`The previous plan failed: ${reason}\nPlan the remaining work again.`);
    }

    return this.ask('plan', [
      { role: 'system', content: PLAN_SYSTEM },
      { role: 'user', content: sections.join('\n\n') },
    ], PlanSchema);
  }

  async decide(context: PlanningContext, plan: Plan, report: ExecutionReport): Promise<StepDecision> {
    const stepText = report.stepIndex === null
      ? 'A command requested by the user'
      : `Step ${report.stepIndex + 1} of ${plan.steps.length}: ${plan.steps[report.stepIndex]?.description ?? ''}`;
    const content = [
      formatPreferences(context.preferences),
      `Plan: ${plan.summary}`,
      stepText,
      `Command: ${report.argv.join(' ')}`,
      `Status: ${report.outcome.status} (exit code ${report.outcome.exitCode ?? 'none'})`,
      `Output:\n${report.output}`,
    ].join('\n\n');

    const reply = await this.ask('decide', [
      { role: 'system', content: DECIDE_SYSTEM },
      { role: 'user', content },
    ], DecideReplySchema);

    switch (reply.decision) {
      case 'continue':
        return { kind: 'continue', preferences: reply.preferences };
      case 'replan':
        return { kind: 'replan', reason: reply.reason ?? 'Planner requested a new plan', preferences: reply.preferences };
      case 'review':
        return { kind: 'review', summary: reply.summary, preferences: reply.preferences };
    }
  }

  private async ask<T>(operation: string, messages: ChatCompletionMessageParam[], schema: z.ZodType<T>): Promise<T> {
    const startedAt = Date.now();
    const text = await this.complete(messages);
    log.debug({ operation, model: this.options.model, durationMs: Date.now() - startedAt, chars: text.length }, 'Planner reply received');
    return parseReply(text, schema);
  }
}
