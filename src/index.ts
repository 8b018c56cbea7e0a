/**
 * deploy-pilot: container image promotion through staging and production.
 *
 * Public exports for programmatic use. The command line lives in cli.ts.
 */

export { createApp, createAppContext, createAppContextFromConfig, AppContext, AppContextOptions, VERSION } from './server';
export { loadConfig, subprocessEnv, DeployPilotConfig } from './config';
export * from './domain';
export * from './engine/health-checker';
export * from './engine/orchestrator';
export * from './engine/pipeline';
export * from './engine/rollback-controller';
export * from './engine/state-machine';
export { runStep, StepRunResult, TimeoutError } from './engine/step-runner';
export * from './audit/audit-service';
export * from './auth/authorization-gate';
export * from './auth/confirmation-flow';
export * from './service/deployment-service';
export * from './steps/command-runner';
export * from './steps/shell-steps';
export * from './storage/store';
export * from './storage/memory-store';
export * from './storage/file-image-state-store';
export * from './storage/file-audit-store';
export { createLogger, setLogHandler, setLogLevel, LogLevel, Logger } from './logger';
