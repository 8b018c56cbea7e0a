import { ENVIRONMENTS, Environment } from '../../src/domain/environment';
import { Action, Role, StaticRoleDirectory, requiresConfirmation, roleAllows } from '../../src/domain/rbac';

describe('RBAC', () => {
  it('admin may do everything everywhere', () => {
    for (const environment of ENVIRONMENTS) {
      for (const action of [Action.Deploy, Action.Rollback, Action.Status]) {
        expect(roleAllows(Role.Admin, action, environment)).toBe(true);
      }
    }
  });

  it('staging operator may deploy and inspect staging only', () => {
    expect(roleAllows(Role.StagingOperator, Action.Deploy, Environment.Staging)).toBe(true);
    expect(roleAllows(Role.StagingOperator, Action.Status, Environment.Staging)).toBe(true);
    expect(roleAllows(Role.StagingOperator, Action.Rollback, Environment.Staging)).toBe(false);
    expect(roleAllows(Role.StagingOperator, Action.Deploy, Environment.Production)).toBe(false);
    expect(roleAllows(Role.StagingOperator, Action.Status, Environment.Production)).toBe(false);
  });

  it('directory resolves roles, admin taking precedence', () => {
    const directory = new StaticRoleDirectory({ admins: ['alice'], stagingOperators: ['sam', 'alice'] });
    expect(directory.roleOf('alice')).toBe(Role.Admin);
    expect(directory.roleOf('sam')).toBe(Role.StagingOperator);
    expect(directory.roleOf('mallory')).toBeUndefined();
  });

  it('directory can be replaced at run time', () => {
    const directory = new StaticRoleDirectory({ admins: ['alice'], stagingOperators: [] });
    directory.replace({ admins: [], stagingOperators: ['alice'] });
    expect(directory.roleOf('alice')).toBe(Role.StagingOperator);
  });

  it('production deploys and every rollback need confirmation', () => {
    expect(requiresConfirmation(Action.Deploy, Environment.Production)).toBe(true);
    expect(requiresConfirmation(Action.Rollback, Environment.Production)).toBe(true);
    expect(requiresConfirmation(Action.Rollback, Environment.Staging)).toBe(true);
    expect(requiresConfirmation(Action.Deploy, Environment.Staging)).toBe(false);
    expect(requiresConfirmation(Action.Status, Environment.Production)).toBe(false);
  });
});
