/**
 * Authorization gate.
 *
 * A single check over the current role table. Callers invoke it
 * explicitly at every transition that can be triggered on its own
 * (initial request, confirmation, start of the pipeline); a token or an
 * earlier decision is never taken as proof of current authorization.
 */

import { Environment } from '../domain/environment';
import { Action, Role, RoleDirectory, roleAllows } from '../domain/rbac';

export type AuthorizationDecision =
  | { permitted: true; role: Role }
  | { permitted: false; reason: string; role?: Role };

export class AuthorizationGate {
  constructor(private directory: RoleDirectory) {}

  check(identity: string, action: Action, environment: Environment): AuthorizationDecision {
    const role = this.directory.roleOf(identity);
    if (!role) {
      return { permitted: false, reason: `Identity "${identity}" has no assigned role` };
    }
    if (!roleAllows(role, action, environment)) {
      return {
        permitted: false,
        role,
        reason: `Role "${role}" may not ${action} ${environment}`,
      };
    }
    return { permitted: true, role };
  }
}
