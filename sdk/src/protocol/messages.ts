/**
 * devloop protocol messages
 *
 * Every packet exchanged between a front-end and the executor is one of the
 * variants below. All variants share the envelope fields:
 * - id:        packet id (UUID), unique per message
 * - timestamp: epoch milliseconds at creation
 * - sessionId: executor session the packet belongs to (absent before `start`)
 *
 * Direction:
 *   front-end -> executor: user_input, command_request, session_control
 *   executor -> front-end: assistant_output, command_request (announcements),
 *                          command_output_chunk, command_result, session_event, error
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

export const PROTOCOL_VERSION = 1;

// ============================================
// Shared enums
// ============================================

export const SESSION_PHASES = [
  'intake',
  'planning',
  'executing',
  'reviewing',
  'completed',
  'failed',
  'cancelled',
] as const;

export type SessionPhase = (typeof SESSION_PHASES)[number];

export const TERMINAL_PHASES: ReadonlySet<SessionPhase> = new Set<SessionPhase>([
  'completed',
  'failed',
  'cancelled',
]);

export const COMMAND_STATUSES = ['success', 'failure', 'cancelled', 'timed_out'] as const;
export type CommandStatus = (typeof COMMAND_STATUSES)[number];

export const WIRE_ERROR_CODES = [
  'protocol_error',
  'frame_corrupt',
  'invalid_payload',
  'truncated_frame',
  'stream_broken',
  'frame_too_large',
  'provision_failed',
  'planning_unavailable',
  'preference_store_unavailable',
  'invalid_state',
  'unknown_session',
  'unauthorized',
  'internal_error',
] as const;

export type WireErrorCode = (typeof WIRE_ERROR_CODES)[number];

// ============================================
// Schemas
// ============================================

const envelope = {
  id: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  sessionId: z.string().min(1).optional(),
};

const phaseSchema = z.enum(SESSION_PHASES);

export const PlanStepViewSchema = z.object({
  index: z.number().int().nonnegative(),
  description: z.string(),
  argv: z.array(z.string()).min(1),
});

export type PlanStepView = z.infer<typeof PlanStepViewSchema>;

export const UserInputSchema = z.object({
  ...envelope,
  type: z.literal('user_input'),
  text: z.string(),
});

export const AssistantOutputSchema = z.object({
  ...envelope,
  type: z.literal('assistant_output'),
  kind: z.enum(['question', 'confirmation', 'plan', 'summary', 'note']),
  text: z.string(),
  plan: z.array(PlanStepViewSchema).optional(),
});

export const CommandRequestSchema = z.object({
  ...envelope,
  type: z.literal('command_request'),
  correlationId: z.string().min(1),
  commandId: z.string().min(1).optional(),
  argv: z.array(z.string()).min(1),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  stepIndex: z.number().int().nonnegative().optional(),
});

export const CommandOutputChunkSchema = z.object({
  ...envelope,
  type: z.literal('command_output_chunk'),
  correlationId: z.string().min(1),
  commandId: z.string().min(1),
  stream: z.enum(['stdout', 'stderr']),
  seq: z.number().int().nonnegative(),
  data: z.string(),
});

export const CommandResultSchema = z.object({
  ...envelope,
  type: z.literal('command_result'),
  correlationId: z.string().min(1),
  commandId: z.string().min(1),
  status: z.enum(COMMAND_STATUSES),
  exitCode: z.number().int().nullable(),
  signal: z.string().nullable(),
  durationMs: z.number().nonnegative(),
  reason: z.string().optional(),
});

export const SessionEventPayloadSchema = z.discriminatedUnion('name', [
  z.object({
    name: z.literal('session_started'),
    projectId: z.string(),
    userId: z.string(),
    sandboxId: z.string().nullable(),
    phase: phaseSchema,
  }),
  z.object({
    name: z.literal('phase_changed'),
    seq: z.number().int().nonnegative(),
    from: phaseSchema,
    to: phaseSchema,
    trigger: z.string(),
    reason: z.string().optional(),
  }),
  z.object({
    name: z.literal('command_started'),
    commandId: z.string(),
    correlationId: z.string(),
    argv: z.array(z.string()),
  }),
  z.object({
    name: z.literal('cancel_acknowledged'),
    scope: z.enum(['command', 'session']),
    commandId: z.string().optional(),
    noop: z.boolean(),
  }),
  z.object({
    name: z.literal('session_resumed'),
    phase: phaseSchema,
    replayed: z.number().int().nonnegative(),
  }),
  z.object({
    name: z.literal('session_ended'),
    status: z.enum(['completed', 'failed', 'cancelled']),
    reason: z.string().optional(),
  }),
]);

export type SessionEventPayload = z.infer<typeof SessionEventPayloadSchema>;

export const SessionEventSchema = z.object({
  ...envelope,
  type: z.literal('session_event'),
  event: SessionEventPayloadSchema,
});

export const ErrorMessageSchema = z.object({
  ...envelope,
  type: z.literal('error'),
  code: z.enum(WIRE_ERROR_CODES),
  message: z.string(),
  fatal: z.boolean(),
  correlationId: z.string().optional(),
});

export const SessionControlSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('start'), userId: z.string().min(1), projectId: z.string().min(1) }),
  z.object({ action: z.literal('resume'), sessionId: z.string().min(1) }),
  // Stop asking questions and plan from what intake has gathered
  z.object({ action: z.literal('proceed') }),
  z.object({ action: z.literal('acknowledge_plan') }),
  z.object({ action: z.literal('cancel_command'), commandId: z.string().min(1) }),
  z.object({ action: z.literal('cancel_session') }),
]);

export type SessionControl = z.infer<typeof SessionControlSchema>;

export const SessionControlMessageSchema = z.object({
  ...envelope,
  type: z.literal('session_control'),
  control: SessionControlSchema,
});

export const ProtocolMessageSchema = z.discriminatedUnion('type', [
  UserInputSchema,
  AssistantOutputSchema,
  CommandRequestSchema,
  CommandOutputChunkSchema,
  CommandResultSchema,
  SessionEventSchema,
  ErrorMessageSchema,
  SessionControlMessageSchema,
]);

// ============================================
// Types
// ============================================

export type UserInputMessage = z.infer<typeof UserInputSchema>;
export type AssistantOutputMessage = z.infer<typeof AssistantOutputSchema>;
export type CommandRequestMessage = z.infer<typeof CommandRequestSchema>;
export type CommandOutputChunkMessage = z.infer<typeof CommandOutputChunkSchema>;
export type CommandResultMessage = z.infer<typeof CommandResultSchema>;
export type SessionEventMessage = z.infer<typeof SessionEventSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type SessionControlMessage = z.infer<typeof SessionControlMessageSchema>;
export type ProtocolMessage = z.infer<typeof ProtocolMessageSchema>;
export type MessageType = ProtocolMessage['type'];

type Body<T extends { type: string }> = Omit<T, 'type' | 'id' | 'timestamp'>;

// ============================================
// Builders
// ============================================

function stamp(): { id: string; timestamp: number } {
  return { id: randomUUID(), timestamp: Date.now() };
}

export function userInput(body: Body<UserInputMessage>): UserInputMessage {
  return { type: 'user_input', ...stamp(), ...body };
}

export function assistantOutput(body: Body<AssistantOutputMessage>): AssistantOutputMessage {
  return { type: 'assistant_output', ...stamp(), ...body };
}

export function commandRequest(body: Body<CommandRequestMessage>): CommandRequestMessage {
  return { type: 'command_request', ...stamp(), ...body };
}

export function commandOutputChunk(body: Body<CommandOutputChunkMessage>): CommandOutputChunkMessage {
  return { type: 'command_output_chunk', ...stamp(), ...body };
}

export function commandResult(body: Body<CommandResultMessage>): CommandResultMessage {
  return { type: 'command_result', ...stamp(), ...body };
}

export function sessionEvent(event: SessionEventPayload, sessionId?: string): SessionEventMessage {
  return { type: 'session_event', ...stamp(), sessionId, event };
}

export function errorMessage(body: Body<ErrorMessage>): ErrorMessage {
  return { type: 'error', ...stamp(), ...body };
}

export function sessionControl(control: SessionControl, sessionId?: string): SessionControlMessage {
  return { type: 'session_control', ...stamp(), sessionId, control };
}

export function isTerminalPhase(phase: SessionPhase): boolean {
  return TERMINAL_PHASES.has(phase);
}
