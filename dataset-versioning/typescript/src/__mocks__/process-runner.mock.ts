import { CommandFailedError } from '../errors/index.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../process/runner.js';

export interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  redact?: readonly string[];
}

export type CommandMatcher = string | RegExp;

export type CommandResponse =
  | Partial<ProcessResult>
  | Error
  | ((call: RecordedCall) => Partial<ProcessResult> | Error | Promise<Partial<ProcessResult> | Error>);

interface Rule {
  matcher: CommandMatcher;
  response: CommandResponse;
}

function matches(matcher: CommandMatcher, call: RecordedCall): boolean {
  const line = call.args.join(' ');
  return typeof matcher === 'string' ? line.includes(matcher) : matcher.test(line);
}

/**
 * Records every command and answers from rules matched against the joined
 * arguments. The most recently added matching rule wins; unmatched commands
 * succeed with empty output. A non-zero `exitCode` fails the way the spawn
 * runner does.
 */
export class MockProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: Rule[] = [];

  on(matcher: CommandMatcher, response: CommandResponse): this {
    this.rules.push({ matcher, response });
    return this;
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const call: RecordedCall = {
      command,
      args: [...args],
      cwd: options.cwd,
      env: options.env,
      redact: options.redact,
    };
    this.calls.push(call);

    const rule = [...this.rules].reverse().find((candidate) => matches(candidate.matcher, call));
    const response = rule === undefined ? {} : typeof rule.response === 'function' ? await rule.response(call) : rule.response;
    if (response instanceof Error) throw response;

    const result: ProcessResult = { exitCode: 0, stdout: '', stderr: '', durationMs: 0, ...response };
    if (result.exitCode !== 0) {
      throw new CommandFailedError([command, ...args].join(' '), result.exitCode, result.stderr);
    }
    return result;
  }

  find(matcher: CommandMatcher): RecordedCall | undefined {
    return this.calls.find((call) => matches(matcher, call));
  }

  filter(matcher: CommandMatcher): RecordedCall[] {
    return this.calls.filter((call) => matches(matcher, call));
  }

  /** Arguments of every call with the git identity prefix removed. */
  commandLines(): string[] {
    return this.calls.map((call) => stripIdentity(call.args).join(' '));
  }
}

export function stripIdentity(args: readonly string[]): string[] {
  const result = [...args];
  while (result[0] === '-c') {
    result.splice(0, 2);
  }
  return result;
}
