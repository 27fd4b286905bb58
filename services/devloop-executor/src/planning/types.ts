/**
 * Planning collaborator contract
 *
 * The session state machine only talks to the language model through this
 * interface. Every method may throw; callers wrap them in withPlanningRetry.
 */

import { z } from 'zod';
import type { SessionPhase } from '@devloop/sdk';
import type { PreferenceFact } from '../preferences/types';
import type { CommandOutcome } from '../sandbox/types';

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  text: string;
  at: number;
}

export interface PlanningContext {
  sessionId: string;
  projectId: string;
  phase: SessionPhase;
  transcript: readonly TranscriptEntry[];
  /** Preferences in force for this project (auto-applied plus confirmed) */
  preferences: readonly PreferenceFact[];
}

export const StagedPreferenceSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
  confidence: z.number().min(0).max(1),
});

export type StagedPreference = z.infer<typeof StagedPreferenceSchema>;

export const PlanStepSchema = z.object({
  description: z.string(),
  argv: z.array(z.string()).min(1),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type PlanStep = z.infer<typeof PlanStepSchema>;

export const PlanSchema = z.object({
  summary: z.string(),
  steps: z.array(PlanStepSchema).min(1),
});

export type Plan = z.infer<typeof PlanSchema>;

export type IntakeDecision =
  | { kind: 'question'; text: string }
  | { kind: 'ready'; summary?: string; preferences?: StagedPreference[] };

export interface ExecutionReport {
  stepIndex: number | null;       // null for commands the front-end asked for
  argv: string[];
  outcome: CommandOutcome;
  /** Tail of the combined output */
  output: string;
}

export type StepDecision =
  | { kind: 'continue'; preferences?: StagedPreference[] }
  | { kind: 'replan'; reason: string; preferences?: StagedPreference[] }
  | { kind: 'review'; summary?: string; preferences?: StagedPreference[] };

export interface Planner {
  /** Ask a clarifying question, or report that planning can start */
  intake(context: PlanningContext): Promise<IntakeDecision>;
  /** Produce a plan; `reason` explains why a previous plan is being replaced */
  plan(context: PlanningContext, reason?: string): Promise<Plan>;
  /** Judge a finished command */
  decide(context: PlanningContext, plan: Plan, report: ExecutionReport): Promise<StepDecision>;
}
