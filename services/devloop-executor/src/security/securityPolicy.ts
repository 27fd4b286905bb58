/**
 * Security Policy for sandboxed commands
 *
 * This module defines and enforces restrictions on commands that the
 * planner (and the front-end) ask the executor to run.
 *
 * THREAT MODEL:
 * - Plans are produced by a language model and can contain anything
 * - Front-ends can send raw command requests
 * - Assume the model can be jailbroken
 *
 * DEFENSE LAYERS:
 * 1. Per-project root directory with a restricted environment
 * 2. Resource limits (ulimits) and a wall-clock timeout
 * 3. Working directories and file transfer confined to the root
 * 4. Command blocklist and dangerous patterns (last resort, easily bypassed)
 */

import { basename, isAbsolute, relative, resolve, sep } from 'path';
import blockedCommands from './blockedCommands.json';

export interface LimitSettings {
  cpuSeconds: number;
  memoryMb: number;
  maxProcesses: number;
  maxFileSizeMb: number;
}

/**
 * Executables that are never run inside a sandbox
 */
export const BLOCKED_COMMANDS: ReadonlySet<string> = new Set<string>(blockedCommands);

/**
 * Patterns that indicate potentially malicious commands
 * These are regex patterns checked against the full command line
 */
export const DANGEROUS_PATTERNS: readonly RegExp[] = [
  // Destructive file operations on system paths
  /\brm\s+(-[rf]+\s+)*\/(\s|$|\*|bin|boot|dev|etc|home|lib|opt|proc|root|sbin|sys|usr|var)/,
  /\bfind\s+\/\s+.*-delete/,
  /\bshred\s+/,

  // Reverse shells
  /\bbash\s+-i\s+>&?\s*\/dev\/tcp/,
  /\/dev\/(tcp|udp)\//,
  /\bpython.*socket.*connect/,
  /\bperl.*socket.*exec/,

  // Download and execute
  /\b(wget|curl|fetch)\b.*\|\s*(ba|z)?sh\b/,
  /\b(wget|curl|fetch)\b.*>\s*\S+\s*;\s*(ba)?sh/,
  /\bpython.*urllib.*exec/,

  // Fork bombs and resource exhaustion
  /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}/,
  /\byes\s*\|/,

  // Writing to system paths
  />\s*\/(etc|bin|usr|var|dev\/(?!null))/,

  // Modifying permissions dangerously
  /\bchmod\s+[0-7]*[4-7][0-7]{3}\s+\//,
  /\bchmod\s+[ugoa]*\+s\b/,
  /\bchown\s+root/,

  // Process manipulation
  /\bkill\s+-9\s+-1\b/,
  /\bkillall\b/,
  /\bpkill\b/,

  // Environment/credential theft
  /\bcat\s+.*\.env\b.*\|\s*(curl|wget|nc)\b/,
  /\benv\b.*\|\s*(curl|wget|nc)\b/,
  /\/proc\/\d+\/environ/,

  // Mining
  /\bxmrig\b/,
  /\bminerd\b/,
  /\bcpuminer\b/,
  /stratum\+tcp/,
];

const SHELLS = new Set(['sh', 'bash', 'zsh', 'dash']);
// Commands that run their first operand as another command
const WRAPPERS = new Set(['env', 'nohup', 'nice', 'timeout', 'xargs', 'time', 'command', 'exec']);

export interface PolicyDecision {
  allowed: boolean;
  reason?: string;
}

/**
 * Executable names in command position, including those inside `sh -c` scripts
 */
export function commandWords(argv: readonly string[]): string[] {
  const words: string[] = [];
  collectWords(argv, words);
  return words;
}

function collectWords(tokens: readonly string[], out: string[]): void {
  let index = 0;
  // Leading VAR=value assignments
  while (index < tokens.length && /^[A-Za-z_][A-Za-z0-9_]*=/.test(tokens[index] ?? '')) index++;

  const head = tokens[index];
  if (head === undefined) return;
  const name = basename(head);
  out.push(name);

  const rest = tokens.slice(index + 1);
  if (SHELLS.has(name)) {
    const flag = rest.indexOf('-c');
    const script = flag >= 0 ? rest[flag + 1] : undefined;
    if (script !== undefined) {
      for (const segment of script.split(/&&|\|\||[;|&\n()`]|\$\(/)) {
        collectWords(segment.trim().split(/\s+/).filter(Boolean), out);
      }
    }
    return;
  }

  if (WRAPPERS.has(name)) {
    // Skip options and numeric operands (timeout 10 cmd, nice -n 5 cmd)
    let next = 0;
    while (next < rest.length && /^(-|\d)/.test(rest[next] ?? '')) next++;
    collectWords(rest.slice(next), out);
  }
}

/**
 * Check if a command is allowed to run
 */
export function checkCommand(argv: readonly string[]): PolicyDecision {
  if (argv.length === 0) {
    return { allowed: false, reason: 'Empty command' };
  }

  for (const word of commandWords(argv)) {
    if (BLOCKED_COMMANDS.has(word.toLowerCase())) {
      return {
        allowed: false,
        reason: `Command '${word}' is blocked for security reasons`,
      };
    }
  }

  const commandLine = argv.join(' ');
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(commandLine)) {
      return {
        allowed: false,
        reason: `Command matches dangerous pattern: ${pattern.source.slice(0, 50)}`,
      };
    }
  }

  return { allowed: true };
}

/**
 * ulimit prefix for a sandboxed shell; a limit of 0 leaves that resource unlimited
 */
export function buildLimitPrefix(limits: LimitSettings): string {
  const parts: string[] = [];
  if (limits.maxProcesses > 0) parts.push(`ulimit -u ${limits.maxProcesses}`);
  if (limits.maxFileSizeMb > 0) parts.push(`ulimit -f ${limits.maxFileSizeMb * 2048}`); // 512-byte blocks
  if (limits.memoryMb > 0) parts.push(`ulimit -v ${limits.memoryMb * 1024}`);          // KB
  if (limits.cpuSeconds > 0) parts.push(`ulimit -t ${limits.cpuSeconds}`);
  parts.push('ulimit -c 0');                                                          // no core dumps
  return parts.join(' && ') + ' && ';
}

/**
 * Quote one argument for bash
 */
export function shellQuote(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_\/.,:=@%+-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Resolve a path against the sandbox root; null when it escapes the root
 */
export function confinePath(root: string, path: string): string | null {
  const resolved = resolve(root, path);
  const rel = relative(root, resolved);
  if (rel === '') return resolved;
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return resolved;
}
