/**
 * Express server configuration.
 *
 * Assembles the core services and the API surface. createAppContext()
 * takes its collaborators explicitly (tests pass in-memory stores and
 * fakes); createAppContextFromConfig() builds the production wiring from
 * loaded configuration.
 */

import express from 'express';
import { AuditService } from './audit/audit-service';
import { AuthorizationGate } from './auth/authorization-gate';
import { ConfirmationFlow } from './auth/confirmation-flow';
import { DeployPilotConfig, subprocessEnv } from './config';
import { Environment } from './domain/environment';
import { RoleAssignments, RoleDirectory, StaticRoleDirectory } from './domain/rbac';
import { DEFAULT_HEALTH_CHECK_POLICY, HealthCheckPolicy, HealthChecker, HealthProbe } from './engine/health-checker';
import { DeploymentOrchestrator } from './engine/orchestrator';
import { DEFAULT_STEP_TIMEOUTS, PipelineSteps, StepTimeouts } from './engine/pipeline';
import { RollbackController } from './engine/rollback-controller';
import { DeploymentService } from './service/deployment-service';
import { SpawnCommandRunner } from './steps/command-runner';
import { ShellPipelineSteps } from './steps/shell-steps';
import { FileAuditStore } from './storage/file-audit-store';
import { FileImageStateStore } from './storage/file-image-state-store';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { errorHandler, identityMiddleware } from './api/middleware';
import { createDeploymentRoutes } from './api/deployments';
import { createConfirmationRoutes } from './api/confirmations';
import { createAuditRoutes } from './api/audit';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  auditService: AuditService;
  gate: AuthorizationGate;
  confirmations: ConfirmationFlow;
  healthChecker: HealthChecker;
  orchestrator: DeploymentOrchestrator;
  service: DeploymentService;
  storage: 'memory' | 'file';
}

export interface AppContextOptions {
  steps: PipelineSteps;
  roles: RoleAssignments | RoleDirectory;
  healthUrls: Record<Environment, string>;
  store?: Store;
  probe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
  healthPolicy?: HealthCheckPolicy;
  timeouts?: StepTimeouts;
  confirmationTtlMs?: number;
  /** Clock for confirmation expiry, in epoch milliseconds. */
  now?: () => number;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const store = options.store ?? createMemoryStore();
  const directory = 'roleOf' in options.roles ? options.roles : new StaticRoleDirectory(options.roles);
  const healthPolicy = options.healthPolicy ?? DEFAULT_HEALTH_CHECK_POLICY;
  const timeouts = options.timeouts ?? DEFAULT_STEP_TIMEOUTS;

  const auditService = new AuditService(store.audit);
  const gate = new AuthorizationGate(directory);
  const confirmations = new ConfirmationFlow(gate, {
    ttlMs: options.confirmationTtlMs ?? 300_000,
    now: options.now,
  });
  const healthChecker = new HealthChecker(options.healthUrls, { probe: options.probe, sleep: options.sleep });
  const rollback = new RollbackController({
    store: store.imageState,
    steps: options.steps,
    healthChecker,
    healthPolicy,
    timeouts,
  });
  const orchestrator = new DeploymentOrchestrator({
    store: store.imageState,
    audit: auditService,
    gate,
    steps: options.steps,
    healthChecker,
    healthPolicy,
    timeouts,
    rollback,
  });
  const service = new DeploymentService({
    gate,
    confirmations,
    orchestrator,
    store: store.imageState,
    audit: auditService,
    healthChecker,
    statusProbeTimeoutMs: healthPolicy.timeoutMs,
  });

  return {
    store,
    auditService,
    gate,
    confirmations,
    healthChecker,
    orchestrator,
    service,
    storage: options.store ? 'file' : 'memory',
  };
}

/** Production wiring: file-backed state and audit log, shell pipeline steps. */
export function createAppContextFromConfig(config: DeployPilotConfig): AppContext {
  const runner = new SpawnCommandRunner({ env: subprocessEnv(config) });
  const steps = new ShellPipelineSteps(runner, {
    repoDir: config.repoDir,
    branches: config.branches,
    registry: config.registry,
    targets: config.targets,
  });
  return createAppContext({
    steps,
    roles: config.roles,
    healthUrls: config.healthUrls,
    store: {
      imageState: new FileImageStateStore(config.stateDir),
      audit: new FileAuditStore(config.auditLogPath),
    },
    healthPolicy: config.healthPolicy,
    timeouts: config.timeouts,
    confirmationTtlMs: config.confirmationTtlMs,
  });
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: ctx.storage,
    });
  });

  app.use(identityMiddleware());
  app.use(createDeploymentRoutes(ctx.service));
  app.use(createConfirmationRoutes(ctx.service));
  app.use(createAuditRoutes(ctx.service));

  app.use(errorHandler);

  return app;
}
