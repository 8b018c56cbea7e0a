/**
 * Role-Based Access Control (RBAC) domain model.
 *
 * Two roles. Admin can do everything; a staging operator can deploy to
 * and inspect staging. The role table is static configuration, read
 * through a RoleDirectory on every check.
 */

import { Environment } from './environment';

/** Built-in roles. Admin is a superset of StagingOperator. */
export enum Role {
  /** Full access: production deploys, rollbacks, staging. */
  Admin = 'admin',
  /** Deploy and status on staging only. */
  StagingOperator = 'staging-operator',
}

/** Actions a requester can ask for. */
export enum Action {
  Deploy = 'deploy',
  Rollback = 'rollback',
  Status = 'status',
}

/** What each role may do, per environment. */
export const ROLE_GRANTS: Record<Role, Record<Environment, readonly Action[]>> = {
  [Role.Admin]: {
    [Environment.Staging]: [Action.Deploy, Action.Rollback, Action.Status],
    [Environment.Production]: [Action.Deploy, Action.Rollback, Action.Status],
  },
  [Role.StagingOperator]: {
    [Environment.Staging]: [Action.Deploy, Action.Status],
    [Environment.Production]: [],
  },
};

/** Static role assignment table, keyed by identity. */
export interface RoleAssignments {
  admins: readonly string[];
  stagingOperators: readonly string[];
}

/** Source of the current role for an identity. */
export interface RoleDirectory {
  roleOf(identity: string): Role | undefined;
}

/** RoleDirectory over a fixed assignment table. Admin wins when an identity is in both lists. */
export class StaticRoleDirectory implements RoleDirectory {
  constructor(private assignments: RoleAssignments) {}

  roleOf(identity: string): Role | undefined {
    if (this.assignments.admins.includes(identity)) return Role.Admin;
    if (this.assignments.stagingOperators.includes(identity)) return Role.StagingOperator;
    return undefined;
  }

  /** Swap the table, e.g. after a configuration reload. */
  replace(assignments: RoleAssignments): void {
    this.assignments = assignments;
  }
}

/** Check whether a role grants an action on an environment. */
export function roleAllows(role: Role, action: Action, environment: Environment): boolean {
  return ROLE_GRANTS[role]?.[environment]?.includes(action) ?? false;
}

/** A single incoming trigger, as seen by the gate. */
export interface ActionRequest {
  readonly requester: string;
  /** Role at the time of the check. */
  readonly role: Role;
  readonly environment: Environment;
  readonly action: Action;
  /** Commit or image identifier, when the action takes one. */
  readonly commit?: string;
}

/** Actions that need an explicit second confirmation before they run. */
export function requiresConfirmation(action: Action, environment: Environment): boolean {
  if (action === Action.Rollback) return true;
  return action === Action.Deploy && environment === Environment.Production;
}
