/**
 * Role-Based Access Control (RBAC) domain model.
 *
 * Roles are bound to a user on a project. Authorization in this service
 * only distinguishes membership from administration; the finer roles are
 * carried for listing and for invitations.
 */

/** Built-in roles. */
export enum Role {
  Admin = 'admin',
  Editor = 'editor',
  Viewer = 'viewer',
  PolicyWriter = 'policy_writer',
  PermissionsManager = 'permissions_manager',
}

export const ROLE_DESCRIPTIONS: Record<Role, string> = {
  [Role.Admin]: 'The admin role allows the user to perform all actions on the project, including project administration.',
  [Role.Editor]: 'The editor role allows for write and read actions on the project except for project administration.',
  [Role.Viewer]: 'The viewer role allows for read actions on the project.',
  [Role.PolicyWriter]: 'The policy_writer role allows for writing policies (rule types and profiles) on the project.',
  [Role.PermissionsManager]: 'The permissions_manager role allows for managing permissions on the project.',
};

/** A role binding as stored. */
export interface RoleBinding {
  id: string;
  userId: string;
  role: Role;
  /** Derived from the role at write time. */
  isAdmin: boolean;
  /** Root project of the tree the binding lives in. */
  organizationId: string;
  /** Absent for organisation-wide bindings. */
  projectId?: string;
  createdAt: string;
}

/** Realm role that bypasses project and owner checks. */
export const SUPERADMIN_ROLE = 'superadmin';
