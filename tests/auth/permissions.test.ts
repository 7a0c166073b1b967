import { isSuperadmin, resolvePermissions } from '../../src/auth/permissions';
import { Role } from '../../src/domain/rbac';
import { isProjectAdmin } from '../../src/domain/user';
import { createMemoryStore } from '../../src/storage/memory-store';
import { claimsFor, grantRole, seedTenant } from '../helpers/fixtures';

describe('resolvePermissions', () => {
  it('returns empty permissions for an unknown subject', async () => {
    const store = createMemoryStore();
    expect(await resolvePermissions(store, claimsFor('nobody'))).toEqual({
      projectIds: [],
      roles: [],
      isSuperadmin: false,
    });
  });

  it('keeps the superadmin flag for callers without a user row', async () => {
    const store = createMemoryStore();
    const permissions = await resolvePermissions(store, claimsFor('root', { realmRoles: ['superadmin'] }));
    expect(permissions.isSuperadmin).toBe(true);
    expect(permissions.userId).toBeUndefined();
  });

  it('lists every project the user is bound to', async () => {
    const store = createMemoryStore();
    const first = await seedTenant(store, { subject: 'alice' });
    const second = await seedTenant(store, { subject: 'alice', role: Role.Viewer });

    const permissions = await resolvePermissions(store, claimsFor('alice'));
    expect(permissions.userId).toBe(first.user.id);
    expect(permissions.projectIds.sort()).toEqual([first.project.id, second.project.id].sort());
    expect(permissions.roles).toHaveLength(2);
    expect(isProjectAdmin(permissions, first.project.id)).toBe(true);
    expect(isProjectAdmin(permissions, second.project.id)).toBe(false);
  });

  it('lists a project once when the user holds several roles on it', async () => {
    const store = createMemoryStore();
    const tenant = await seedTenant(store, { subject: 'alice', role: Role.Viewer });
    await grantRole(store, tenant.user, tenant.project, Role.Editor);

    const permissions = await resolvePermissions(store, claimsFor('alice'));
    expect(permissions.projectIds).toEqual([tenant.project.id]);
    expect(permissions.roles.map((r) => r.roleId).sort()).toEqual(['editor', 'viewer']);
    expect(permissions.organizationId).toBe(tenant.project.id);
  });
});

describe('isSuperadmin', () => {
  it('reads the realm roles', () => {
    expect(isSuperadmin(claimsFor('a', { realmRoles: ['offline_access', 'superadmin'] }))).toBe(true);
    expect(isSuperadmin(claimsFor('a', { realmRoles: ['offline_access'] }))).toBe(false);
  });
});
