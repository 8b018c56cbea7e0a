/**
 * Runs external commands as child processes with a fixed argument
 * vector. No shell is involved, so nothing in the arguments is ever
 * interpreted.
 */

import { spawn } from 'child_process';
import { maskSecretsInMessage } from '../domain/errors';
import { Logger, createLogger } from '../logger';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Written to stdin, which is then closed. */
  input?: string;
  /** Values masked in captured output and logs. */
  secrets?: string[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** True when the command was killed because its signal fired. */
  aborted: boolean;
}

export interface CommandRunner {
  run(spec: CommandSpec, signal: AbortSignal): Promise<CommandResult>;
}

export interface SpawnCommandRunnerOptions {
  /** Complete environment for the child; the parent's is not inherited. */
  env: Record<string, string>;
  logger?: Logger;
}

export class SpawnCommandRunner implements CommandRunner {
  private log: Logger;

  constructor(private options: SpawnCommandRunnerOptions) {
    this.log = options.logger ?? createLogger({ component: 'command-runner' });
  }

  run(spec: CommandSpec, signal: AbortSignal): Promise<CommandResult> {
    const secrets = spec.secrets ?? [];
    const mask = (text: string) => maskSecretsInMessage(text, secrets);
    const startTime = Date.now();

    this.log.info('running command', { command: mask([spec.command, ...spec.args].join(' ')), cwd: spec.cwd });

    if (signal.aborted) {
      return Promise.resolve({ exitCode: -1, stdout: '', stderr: 'aborted before start', durationMs: 0, aborted: true });
    }

    return new Promise<CommandResult>((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: this.options.env,
        stdio: [spec.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let aborted = false;
      const stdoutLines = this.lineLogger(spec.command, 'stdout', mask);
      const stderrLines = this.lineLogger(spec.command, 'stderr', mask);

      child.stdout?.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stdout += text;
        stdoutLines.push(text);
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString();
        stderr += text;
        stderrLines.push(text);
      });

      const onAbort = () => {
        aborted = true;
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      if (spec.input !== undefined && child.stdin) {
        child.stdin.on('error', (err: Error) => {
          stderr += `stdin: ${err.message}\n`;
        });
        child.stdin.end(spec.input);
      }

      child.on('close', (code: number | null) => {
        signal.removeEventListener('abort', onAbort);
        stdoutLines.flush();
        stderrLines.flush();
        const result: CommandResult = {
          exitCode: code ?? -1,
          stdout: mask(stdout),
          stderr: mask(stderr),
          durationMs: Date.now() - startTime,
          aborted,
        };
        if (result.exitCode !== 0) {
          this.log.warn('command exited non-zero', { command: spec.command, exitCode: result.exitCode, aborted });
        }
        resolve(result);
      });

      child.on('error', (err: Error) => {
        signal.removeEventListener('abort', onAbort);
        resolve({
          exitCode: -1,
          stdout: mask(stdout),
          stderr: mask(stderr + err.message),
          durationMs: Date.now() - startTime,
          aborted,
        });
      });
    });
  }

  /** Logs each complete, masked output line as it arrives. */
  private lineLogger(command: string, stream: 'stdout' | 'stderr', mask: (text: string) => string) {
    let partial = '';
    const emit = (line: string) => {
      const text = line.endsWith('\r') ? line.slice(0, -1) : line;
      if (text.length > 0) this.log.info('command output', { command, stream, line: mask(text) });
    };
    return {
      push: (chunk: string) => {
        const lines = (partial + chunk).split('\n');
        partial = lines.pop() ?? '';
        lines.forEach(emit);
      },
      flush: () => {
        emit(partial);
        partial = '';
      },
    };
  }
}
