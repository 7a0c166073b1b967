/**
 * Invitations and pending forge installations.
 */

import { Role } from './rbac';

/** An offer of a role on a project, addressed by an opaque code. */
export interface Invitation {
  code: string;
  email: string;
  projectId: string;
  role: Role;
  /** User id of the inviter. */
  sponsor: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * A forge app installation made before its owner had an account. The
 * user whose forge id matches claims it on their first call.
 */
export interface PendingInstallation {
  id: string;
  /** Forge-side installation id. */
  appInstallationId: string;
  /** Forge-side id of the user who installed the app. */
  enrollingForgeId: string;
  /** Suggested project name, usually the forge organisation. */
  organizationName: string;
  /** Set once claimed. */
  projectId?: string;
  createdAt: string;
}
