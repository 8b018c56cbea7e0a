/**
 * Configuration.
 *
 * Everything comes from environment variables, validated once at startup
 * with a zod schema. Missing required values fail fast with a
 * VALIDATION.SCHEMA error naming every offending variable.
 */

import { z } from 'zod';
import { Environment } from './domain/environment';
import { DeploymentError, validationError } from './domain/errors';
import { RoleAssignments } from './domain/rbac';
import { HealthCheckPolicy } from './engine/health-checker';
import { StepTimeouts } from './engine/pipeline';
import { LogLevel, parseLogLevel } from './logger';

const DEFAULT_PATH = '/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin';

/** Comma-separated identity list; blanks dropped. */
const identityList = z
  .string()
  .optional()
  .transform((value) => (value ?? '').split(',').map((id) => id.trim()).filter((id) => id.length > 0));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === 'true');

const EnvSchema = z.object({
  ADMIN_IDENTITIES: z
    .string({ required_error: 'required' })
    .transform((value) => value.split(',').map((id) => id.trim()).filter((id) => id.length > 0))
    .pipe(z.array(z.string()).min(1, 'must name at least one identity')),
  STAGING_IDENTITIES: identityList,

  REGISTRY_URL: z.string({ required_error: 'required' }).trim().min(1, 'required'),
  REGISTRY_IMAGE: z.string().trim().min(1).default('myapp'),
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),

  REPO_DIR: z.string().default('/app/repo'),
  STAGING_BRANCH: z.string().min(1).default('develop'),
  PRODUCTION_BRANCH: z.string().min(1).default('main'),

  STAGING_HOST: z.string().default(''),
  PRODUCTION_HOST: z.string().default(''),
  DEPLOY_USER: z.string().min(1).default('deploy'),
  SSH_KEY_PATH: z.string().min(1).default('/app/secrets/deploy_key'),
  REMOTE_APP_DIR: z.string().min(1).default('/opt/myapp'),

  USE_KUBERNETES: flag,
  KUBE_NAMESPACE: z.string().min(1).default('default'),
  KUBE_DEPLOYMENT_STAGING: z.string().min(1).default('myapp-staging'),
  KUBE_DEPLOYMENT_PRODUCTION: z.string().min(1).default('myapp-production'),

  STAGING_HEALTH_URL: z.string().url().default('http://staging.example.com/health'),
  PRODUCTION_HEALTH_URL: z.string().url().default('http://production.example.com/health'),
  HEALTH_CHECK_RETRIES: positiveInt(10),
  HEALTH_CHECK_INTERVAL_MS: positiveInt(10_000),
  HEALTH_CHECK_TIMEOUT_MS: positiveInt(5_000),

  CONFIRMATION_TTL_MS: positiveInt(300_000),
  CHECKOUT_TIMEOUT_MS: positiveInt(120_000),
  BUILD_TIMEOUT_MS: positiveInt(1_800_000),
  PUSH_TIMEOUT_MS: positiveInt(600_000),
  DEPLOY_TIMEOUT_MS: positiveInt(600_000),

  STATE_DIR: z.string().min(1).default('/var/lib/deploy-pilot'),
  AUDIT_LOG_PATH: z.string().min(1).default('/var/log/deploy-pilot/audit.log'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.string().optional(),
});

export interface RegistryConfig {
  url: string;
  image: string;
  awsRegion: string;
}

export interface TargetConfig {
  useKubernetes: boolean;
  hosts: Record<Environment, string>;
  deployUser: string;
  sshKeyPath: string;
  remoteAppDir: string;
  kubeNamespace: string;
  kubeDeployments: Record<Environment, string>;
}

export interface DeployPilotConfig {
  roles: RoleAssignments;
  registry: RegistryConfig;
  repoDir: string;
  branches: Record<Environment, string>;
  targets: TargetConfig;
  healthUrls: Record<Environment, string>;
  healthPolicy: HealthCheckPolicy;
  timeouts: StepTimeouts;
  confirmationTtlMs: number;
  stateDir: string;
  auditLogPath: string;
  port: number;
  logLevel: LogLevel;
}

/** Read and validate configuration. Throws DeploymentError(VALIDATION.SCHEMA). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeployPilotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      problem: issue.message,
    }));
    const names = [...new Set(problems.map((p) => p.variable))];
    throw new DeploymentError(
      validationError(`Missing or invalid configuration: ${names.join(', ')}`, { problems }),
    );
  }
  const e = parsed.data;

  return {
    roles: { admins: e.ADMIN_IDENTITIES, stagingOperators: e.STAGING_IDENTITIES },
    registry: { url: e.REGISTRY_URL, image: e.REGISTRY_IMAGE, awsRegion: e.AWS_REGION },
    repoDir: e.REPO_DIR,
    branches: {
      [Environment.Staging]: e.STAGING_BRANCH,
      [Environment.Production]: e.PRODUCTION_BRANCH,
    },
    targets: {
      useKubernetes: e.USE_KUBERNETES,
      hosts: {
        [Environment.Staging]: e.STAGING_HOST,
        [Environment.Production]: e.PRODUCTION_HOST,
      },
      deployUser: e.DEPLOY_USER,
      sshKeyPath: e.SSH_KEY_PATH,
      remoteAppDir: e.REMOTE_APP_DIR,
      kubeNamespace: e.KUBE_NAMESPACE,
      kubeDeployments: {
        [Environment.Staging]: e.KUBE_DEPLOYMENT_STAGING,
        [Environment.Production]: e.KUBE_DEPLOYMENT_PRODUCTION,
      },
    },
    healthUrls: {
      [Environment.Staging]: e.STAGING_HEALTH_URL,
      [Environment.Production]: e.PRODUCTION_HEALTH_URL,
    },
    healthPolicy: {
      maxAttempts: e.HEALTH_CHECK_RETRIES,
      intervalMs: e.HEALTH_CHECK_INTERVAL_MS,
      timeoutMs: e.HEALTH_CHECK_TIMEOUT_MS,
    },
    timeouts: {
      checkoutMs: e.CHECKOUT_TIMEOUT_MS,
      buildMs: e.BUILD_TIMEOUT_MS,
      pushMs: e.PUSH_TIMEOUT_MS,
      deployTargetMs: e.DEPLOY_TIMEOUT_MS,
    },
    confirmationTtlMs: e.CONFIRMATION_TTL_MS,
    stateDir: e.STATE_DIR,
    auditLogPath: e.AUDIT_LOG_PATH,
    port: e.PORT,
    logLevel: parseLogLevel(e.LOG_LEVEL),
  };
}

/**
 * The environment handed to external commands. Only what the commands
 * need; the parent's environment is never passed through.
 */
export function subprocessEnv(config: DeployPilotConfig, parent: NodeJS.ProcessEnv = process.env): Record<string, string> {
  return {
    HOME: parent.HOME ?? '/root',
    PATH: parent.PATH ?? DEFAULT_PATH,
    REGISTRY_URL: config.registry.url,
    REGISTRY_IMAGE: config.registry.image,
    AWS_REGION: config.registry.awsRegion,
    STAGING_HOST: config.targets.hosts[Environment.Staging],
    PRODUCTION_HOST: config.targets.hosts[Environment.Production],
    DEPLOY_USER: config.targets.deployUser,
    SSH_KEY_PATH: config.targets.sshKeyPath,
    KUBE_NAMESPACE: config.targets.kubeNamespace,
    USE_KUBERNETES: String(config.targets.useKubernetes),
  };
}
