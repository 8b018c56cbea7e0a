import { LogEntry, setLogHandler } from '../../src/logger';
import { SpawnCommandRunner } from '../../src/steps/command-runner';
import { silenceLogs } from '../helpers/fakes';

silenceLogs();

describe('SpawnCommandRunner', () => {
  const runner = new SpawnCommandRunner({ env: { PATH: process.env.PATH ?? '/usr/bin:/bin' } });
  const node = process.execPath;

  it('captures output and the exit code', async () => {
    const result = await runner.run(
      { command: node, args: ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'] },
      new AbortController().signal,
    );

    expect(result).toMatchObject({ exitCode: 3, stdout: 'out', stderr: 'err', aborted: false });
  });

  it('feeds input on stdin and masks secrets in the output', async () => {
    const result = await runner.run(
      {
        command: node,
        args: ['-e', 'process.stdin.pipe(process.stdout)'],
        input: 'token test-secret-value',
        secrets: ['test-secret-value'],
      },
      new AbortController().signal,
    );

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('token *************alue');
  });

  it('logs every output line, masked, as it arrives', async () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));
    try {
      await runner.run(
        {
          command: node,
          args: ['-e', 'process.stdout.write("step 1/2\\nstep 2/2"); process.stderr.write("login test-secret-value\\n")'],
          secrets: ['test-secret-value'],
        },
        new AbortController().signal,
      );
    } finally {
      silenceLogs();
    }

    const lines = (stream: string) =>
      entries.filter((e) => e.message === 'command output' && e.context?.stream === stream).map((e) => e.context?.line);
    expect(lines('stdout')).toEqual(['step 1/2', 'step 2/2']);
    expect(lines('stderr')).toEqual(['login *************alue']);
    expect(entries.find((e) => e.message === 'command output')?.context).toMatchObject({ component: 'command-runner', command: node });
  });

  it('passes only the configured environment', async () => {
    const scoped = new SpawnCommandRunner({ env: { ONLY_THIS: 'yes' } });
    const result = await scoped.run(
      { command: node, args: ['-e', 'process.stdout.write(Object.keys(process.env).filter((k) => k === "ONLY_THIS" || k === "HOME").join(","))'] },
      new AbortController().signal,
    );

    expect(result.stdout).toBe('ONLY_THIS');
  });

  it('kills the command when its signal fires', async () => {
    const controller = new AbortController();
    const pending = runner.run({ command: node, args: ['-e', 'setTimeout(() => {}, 30000)'] }, controller.signal);
    setTimeout(() => controller.abort(), 50);

    const result = await pending;
    expect(result.aborted).toBe(true);
    expect(result.exitCode).not.toBe(0);
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runner.run({ command: node, args: ['-e', ''] }, controller.signal);
    expect(result).toEqual({ exitCode: -1, stdout: '', stderr: 'aborted before start', durationMs: 0, aborted: true });
  });

  it('a missing binary resolves with exit code -1', async () => {
    const result = await runner.run({ command: '/nonexistent/deploy-pilot-missing', args: [] }, new AbortController().signal);
    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toContain('ENOENT');
  });
});
