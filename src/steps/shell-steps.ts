/**
 * Pipeline steps backed by git, docker, aws, kubectl and ssh.
 *
 * Each step is a short sequence of commands run through a CommandRunner.
 * A non-zero exit fails the step with the command's last stderr line.
 */

import { Environment, ImageReference } from '../domain/environment';
import { Logger, createLogger } from '../logger';
import { BuildInput, CheckoutInput, DeployTargetInput, PipelineStepError, PipelineSteps, PushInput } from '../engine/pipeline';
import { RegistryConfig, TargetConfig } from '../config';
import { CommandResult, CommandRunner, CommandSpec } from './command-runner';

/** Characters an image reference may contain before it is placed in a remote command. */
const SAFE_IMAGE_PATTERN = /^[A-Za-z0-9._/:@-]+$/;

export interface ShellPipelineOptions {
  repoDir: string;
  branches: Record<Environment, string>;
  registry: RegistryConfig;
  targets: TargetConfig;
  /** Passed to `kubectl rollout status --timeout`. */
  rolloutTimeout?: string;
  logger?: Logger;
}

export class ShellPipelineSteps implements PipelineSteps {
  private log: Logger;

  constructor(
    private runner: CommandRunner,
    private options: ShellPipelineOptions,
  ) {
    this.log = options.logger ?? createLogger({ component: 'shell-steps' });
  }

  /** Full image reference for a commit, e.g. `registry/app:staging-abc1234`. */
  imageFor(environment: Environment, commit: string): ImageReference {
    return `${this.options.registry.url}/${this.options.registry.image}:${environment}-${commit}`;
  }

  latestTagFor(environment: Environment): ImageReference {
    return `${this.options.registry.url}/${this.options.registry.image}:${environment}-latest`;
  }

  async checkout(input: CheckoutInput, signal: AbortSignal): Promise<{ commit: string }> {
    const branch = this.options.branches[input.environment];
    const cwd = this.options.repoDir;

    await this.exec({ command: 'git', args: ['fetch', 'origin'], cwd }, signal);
    await this.exec({ command: 'git', args: ['checkout', branch], cwd }, signal);
    await this.exec({ command: 'git', args: ['pull', 'origin', branch], cwd }, signal);
    if (input.commit !== undefined) {
      await this.exec({ command: 'git', args: ['checkout', '--detach', input.commit], cwd }, signal);
    }

    const head = await this.exec({ command: 'git', args: ['rev-parse', '--short', 'HEAD'], cwd }, signal);
    const commit = head.stdout.trim();
    this.log.info('checked out', { environment: input.environment, branch, commit });
    return { commit };
  }

  async build(input: BuildInput, signal: AbortSignal): Promise<{ artifactTag: string }> {
    const tag = this.imageFor(input.environment, input.commit);
    await this.exec(
      {
        command: 'docker',
        args: [
          'build',
          '--file', 'Dockerfile',
          '--tag', tag,
          '--build-arg', `BUILD_ENV=${input.environment}`,
          '--build-arg', `GIT_COMMIT=${input.commit}`,
          '--build-arg', `BUILD_DATE=${input.timestamp}`,
          '--label', `git.commit=${input.commit}`,
          '--label', `deploy.environment=${input.environment}`,
          '--label', `deploy.timestamp=${input.timestamp}`,
          '--no-cache',
          '.',
        ],
        cwd: this.options.repoDir,
      },
      signal,
    );
    return { artifactTag: tag };
  }

  async push(input: PushInput, signal: AbortSignal): Promise<{ imageReference: ImageReference }> {
    const { registry } = this.options;

    const login = await this.exec(
      { command: 'aws', args: ['ecr', 'get-login-password', '--region', registry.awsRegion] },
      signal,
    );
    const password = login.stdout.trim();
    await this.exec(
      {
        command: 'docker',
        args: ['login', '--username', 'AWS', '--password-stdin', registry.url],
        input: password,
        secrets: [password],
      },
      signal,
    );

    await this.exec({ command: 'docker', args: ['push', input.artifactTag] }, signal);

    const latest = this.latestTagFor(input.environment);
    await this.exec({ command: 'docker', args: ['tag', input.artifactTag, latest] }, signal);
    await this.exec({ command: 'docker', args: ['push', latest] }, signal);

    return { imageReference: input.artifactTag };
  }

  async deployTarget(input: DeployTargetInput, signal: AbortSignal): Promise<void> {
    if (!SAFE_IMAGE_PATTERN.test(input.imageReference)) {
      throw new PipelineStepError(`Refusing to deploy image reference with unexpected characters: ${JSON.stringify(input.imageReference)}`, {
        imageReference: input.imageReference,
      });
    }
    if (this.options.targets.useKubernetes) {
      await this.deployKubernetes(input, signal);
    } else {
      await this.deployHost(input, signal);
    }
  }

  private async deployKubernetes(input: DeployTargetInput, signal: AbortSignal): Promise<void> {
    const { targets } = this.options;
    const deployment = `deployment/${targets.kubeDeployments[input.environment]}`;

    await this.exec(
      {
        command: 'kubectl',
        args: ['set', 'image', deployment, `app=${input.imageReference}`, '--namespace', targets.kubeNamespace],
      },
      signal,
    );
    await this.exec(
      {
        command: 'kubectl',
        args: ['rollout', 'status', deployment, '--namespace', targets.kubeNamespace, `--timeout=${this.options.rolloutTimeout ?? '300s'}`],
      },
      signal,
    );
  }

  private async deployHost(input: DeployTargetInput, signal: AbortSignal): Promise<void> {
    const { targets } = this.options;
    const host = targets.hosts[input.environment];
    if (!host) {
      throw new PipelineStepError(`No target host configured for ${input.environment}`, { environment: input.environment });
    }

    await this.exec(
      {
        command: 'ssh',
        args: [
          '-i', targets.sshKeyPath,
          '-o', 'StrictHostKeyChecking=no',
          '-o', 'ConnectTimeout=15',
          `${targets.deployUser}@${host}`,
          remoteUpdateScript(input.imageReference, targets.remoteAppDir),
        ],
      },
      signal,
    );
  }

  private async exec(spec: CommandSpec, signal: AbortSignal): Promise<CommandResult> {
    const result = await this.runner.run(spec, signal);
    if (result.exitCode !== 0) {
      const lastLine = result.stderr.trim().split('\n').pop() ?? '';
      const action = `${spec.command} ${spec.args[0] ?? ''}`.trim();
      throw new PipelineStepError(
        lastLine ? `${action} exited with code ${result.exitCode}: ${lastLine}` : `${action} exited with code ${result.exitCode}`,
        { command: spec.command, exitCode: result.exitCode, aborted: result.aborted },
      );
    }
    return result;
  }
}

/** Script run on the target host: pull the new image and restart the compose stack. */
export function remoteUpdateScript(image: ImageReference, appDir: string): string {
  return [
    `export IMAGE_TAG='${image}'`,
    `cd '${appDir.replace(/'/g, `'\\''`)}'`,
    'docker compose -f docker-compose.yml pull',
    'docker compose -f docker-compose.yml up -d --remove-orphans',
    "docker system prune -f --filter 'until=24h'",
  ].join('\n');
}
