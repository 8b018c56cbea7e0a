#!/usr/bin/env node
/**
 * deploy-pilot command line.
 *
 *   deploy <environment> [commit]   Deploy (production needs --yes)
 *   rollback <environment>          Roll back to the previous image (needs --yes)
 *   status <environment>            Image state, last deploy, one health probe
 *   history                         Recent audit entries
 *   audit verify                    Check the audit hash chain
 *   serve                           Run the HTTP API
 *
 * Exit codes: 0 on success, 1 when the action failed or was refused.
 */

import { Command, CommanderError } from 'commander';
import express from 'express';
import { createAppContextFromConfig, createApp, AppContext, VERSION } from './server';
import { DeployPilotConfig, loadConfig } from './config';
import { Environment, parseEnvironment } from './domain/environment';
import { DeploymentOutcome, DeploymentStatus } from './domain/deployment';
import { DeploymentError, TypedError } from './domain/errors';
import { Action } from './domain/rbac';
import { RollbackOutcome } from './engine/orchestrator';
import { RequestResult } from './service/deployment-service';
import { logger, setLogLevel } from './logger';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io: CliIO;
  loadConfig: () => DeployPilotConfig;
  buildContext?: (config: DeployPilotConfig) => AppContext;
  /** Identity used when --as is not given. */
  defaultIdentity?: string;
  listen?: (app: express.Application, port: number) => Promise<void>;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function defaultListen(app: express.Application, port: number): Promise<void> {
  return new Promise((resolve) => {
    app.listen(port, () => {
      logger.info('deploy-pilot API listening', { port });
      resolve();
    });
  });
}

/** Parse argv (without the node and script entries) and run one command. Resolves to the exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const { io } = deps;
  let exitCode = 0;
  let config: DeployPilotConfig | undefined;
  let ctx: AppContext | undefined;

  const getConfig = (): DeployPilotConfig => {
    config ??= deps.loadConfig();
    return config;
  };
  const getContext = (): AppContext => {
    ctx ??= (deps.buildContext ?? createAppContextFromConfig)(getConfig());
    return ctx;
  };
  const identityOf = (options: { as?: string }): string => {
    const identity = options.as ?? deps.defaultIdentity;
    if (!identity) {
      throw new DeploymentError({
        code: 'AUTH.UNAUTHENTICATED',
        message: 'No identity given: pass --as <identity> or set DEPLOY_PILOT_IDENTITY',
        retryable: false,
        suggestedFixes: [],
      });
    }
    return identity;
  };

  const program = new Command()
    .name('deploy-pilot')
    .description('Promote container images through staging and production')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command('deploy')
    .description('Build, push and deploy a commit')
    .argument('<environment>', 'staging or production')
    .argument('[commit]', 'commit to deploy (default: branch head)')
    .option('--as <identity>', 'requesting identity')
    .option('-y, --yes', 'confirm a production deploy')
    .action(async (env: string, commit: string | undefined, options: { as?: string; yes?: boolean }) => {
      const identity = identityOf(options);
      const environment = parseEnvironment(env);
      const result = await getContext().service.request({ identity, action: Action.Deploy, environment, commit });
      exitCode = await settle(result, identity, options.yes === true);
    });

  program
    .command('rollback')
    .description('Restore the previous image')
    .argument('<environment>', 'staging or production')
    .option('--as <identity>', 'requesting identity')
    .option('-y, --yes', 'confirm the rollback')
    .action(async (env: string, options: { as?: string; yes?: boolean }) => {
      const identity = identityOf(options);
      const environment = parseEnvironment(env);
      const result = await getContext().service.request({ identity, action: Action.Rollback, environment });
      exitCode = await settle(result, identity, options.yes === true);
    });

  program
    .command('status')
    .description('Show image state and health of an environment')
    .argument('<environment>', 'staging or production')
    .option('--as <identity>', 'requesting identity')
    .action(async (env: string, options: { as?: string }) => {
      const identity = identityOf(options);
      const status = await getContext().service.status(identity, parseEnvironment(env));
      io.out(`${status.environment}: ${status.health.healthy ? 'healthy' : 'unhealthy'}`);
      io.out(`  current:  ${status.current ?? '(none)'}`);
      io.out(`  previous: ${status.previous ?? '(none)'}`);
      io.out(`  commit:   ${status.lastDeploy?.commit ?? 'unknown'}`);
      io.out(`  deployed: ${status.lastDeploy?.deployedAt ?? 'never'}`);
      if (status.activeAttempt) io.out(`  running:  ${status.activeAttempt.id} (${status.activeAttempt.status})`);
      if (status.stateError) io.out(`  state error: ${status.stateError.message}`);
    });

  program
    .command('history')
    .description('Show recent audit entries')
    .option('--as <identity>', 'requesting identity')
    .option('-n, --limit <count>', 'number of entries', '20')
    .option('-e, --environment <environment>', 'only this environment')
    .action(async (options: { as?: string; limit: string; environment?: string }) => {
      const identity = identityOf(options);
      const limit = Number.parseInt(options.limit, 10);
      const environment: Environment | undefined = options.environment ? parseEnvironment(options.environment) : undefined;
      const entries = await getContext().service.history(identity, Number.isFinite(limit) && limit > 0 ? limit : 20, environment);
      if (entries.length === 0) io.out('No audit entries.');
      for (const entry of entries) {
        io.out(`${entry.timestamp} ${entry.actorId} ${entry.action} ${entry.environment ?? '-'} ${entry.outcome}`);
      }
    });

  program
    .command('audit')
    .description('Audit log maintenance')
    .command('verify')
    .description('Walk the audit hash chain')
    .action(async () => {
      const result = await getContext().auditService.verify();
      if (result.valid) {
        io.out(`Audit chain intact (${result.entries} entries).`);
      } else {
        io.err(`Audit chain broken at entry ${result.brokenAt}: ${result.reason}`);
        exitCode = 1;
      }
    });

  program
    .command('serve')
    .description('Run the HTTP API')
    .option('-p, --port <port>', 'port to listen on')
    .action(async (options: { port?: string }) => {
      const port = options.port !== undefined ? Number.parseInt(options.port, 10) : getConfig().port;
      await (deps.listen ?? defaultListen)(createApp(getContext()), port);
    });

  async function settle(result: RequestResult, identity: string, confirmed: boolean): Promise<number> {
    switch (result.kind) {
      case 'status':
        return 0;
      case 'deployed':
        return reportDeploy(result.outcome);
      case 'proposed': {
        io.out(result.message);
        if (!confirmed) {
          io.err(`Confirmation required: re-run with --yes (token ${result.token.id} is only valid in this process).`);
          return 1;
        }
        const confirmedResult = await getContext().service.confirm(result.token.id, identity);
        return confirmedResult.kind === 'rolled-back'
          ? reportRollback(confirmedResult.outcome)
          : reportDeploy(confirmedResult.outcome);
      }
    }
  }

  function reportDeploy(outcome: DeploymentOutcome): number {
    const ok = outcome.status === DeploymentStatus.Success;
    if (ok) io.out(outcome.message);
    else io.err(outcome.message);
    outcome.warnings.forEach((warning) => io.err(`warning: ${warning}`));
    return ok ? 0 : 1;
  }

  function reportRollback(outcome: RollbackOutcome): number {
    if (outcome.success) io.out(outcome.message);
    else io.err(outcome.message);
    outcome.warnings.forEach((warning) => io.err(`warning: ${warning}`));
    return outcome.success ? 0 : 1;
  }

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const typed: TypedError | undefined = err instanceof DeploymentError ? err.typedError : undefined;
    io.err(typed ? `Error [${typed.code}]: ${typed.message}` : `Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return exitCode;
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    io: consoleIO,
    loadConfig: () => {
      const loaded = loadConfig();
      setLogLevel(loaded.logLevel);
      return loaded;
    },
    defaultIdentity: process.env.DEPLOY_PILOT_IDENTITY,
  }).then((code) => {
    process.exitCode = code;
  }, (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
