/**
 * Materialises what a caller may touch from their claims and the store.
 */

import { SUPERADMIN_ROLE } from '../domain/rbac';
import { UserPermissions, emptyPermissions } from '../domain/user';
import { Querier } from '../storage/store';
import { Claims } from './token-validator';

export function isSuperadmin(claims: Claims): boolean {
  return claims.realmRoles.includes(SUPERADMIN_ROLE);
}

/**
 * A caller without a user row gets empty permissions rather than an
 * error; the policy checks downstream reject them where that matters.
 */
export async function resolvePermissions(store: Querier, claims: Claims): Promise<UserPermissions> {
  const superadmin = isSuperadmin(claims);
  const user = await store.users.getBySubject(claims.subject);
  if (!user) return emptyPermissions(superadmin);

  const [projects, bindings] = await Promise.all([store.users.getProjects(user.id), store.users.getRoles(user.id)]);

  return {
    userId: user.id,
    projectIds: projects.map((p) => p.id),
    roles: bindings.map((binding) => ({
      roleId: binding.role,
      isAdmin: binding.isAdmin,
      organizationId: binding.organizationId,
      projectId: binding.projectId,
    })),
    organizationId: bindings[0]?.organizationId,
    isSuperadmin: superadmin,
  };
}
