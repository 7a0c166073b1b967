/**
 * User and permission domain model.
 */

export interface User {
  id: string;
  /** Identity-provider subject; unique. */
  subject: string;
  displayName?: string;
  createdAt: string;
}

/** One role binding as seen by the authorization checks. */
export interface RoleInfo {
  roleId: string;
  isAdmin: boolean;
  organizationId: string;
  /** Absent for organisation-wide bindings. */
  projectId?: string;
}

/** What the caller may touch, materialised once per call. */
export interface UserPermissions {
  userId?: string;
  projectIds: string[];
  roles: RoleInfo[];
  organizationId?: string;
  isSuperadmin: boolean;
}

export function emptyPermissions(isSuperadmin = false): UserPermissions {
  return { projectIds: [], roles: [], isSuperadmin };
}

/** True if one of the roles is an admin binding on the project. */
export function isProjectAdmin(permissions: UserPermissions, projectId: string): boolean {
  return permissions.roles.some((role) => role.projectId === projectId && role.isAdmin);
}
