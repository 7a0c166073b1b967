/**
 * Project invitations.
 */

import { randomBytes } from 'crypto';
import { v4 as uuid } from 'uuid';
import { Claims } from '../auth/token-validator';
import { notFound, userVisibleError } from '../domain/errors';
import { Invitation } from '../domain/invitation';
import { Role } from '../domain/rbac';
import { User } from '../domain/user';
import { Logger, logger as rootLogger } from '../logger';
import { Querier, Store, withTransaction } from '../storage/store';
import { rootProjectId } from './projects';

export interface InvitationResolution {
  projectId: string;
  role: Role;
  accepted: boolean;
}

export function newInvitationCode(): string {
  return randomBytes(16).toString('hex');
}

export class InvitationService {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'invitations' });
  }

  async createInvitation(
    signal: AbortSignal | undefined,
    projectId: string,
    sponsorUserId: string,
    email: string,
    role: Role,
  ): Promise<Invitation> {
    return withTransaction(this.store, signal, async (qtx) => {
      const pending = await qtx.invitations.listByProject(projectId);
      if (pending.some((inv) => inv.email.toLowerCase() === email.toLowerCase())) {
        throw userVisibleError('AlreadyExists', `an invitation for ${email} on this project already exists`);
      }
      const now = new Date().toISOString();
      return qtx.invitations.create({
        code: newInvitationCode(),
        email,
        projectId,
        role,
        sponsor: sponsorUserId,
        createdAt: now,
        updatedAt: now,
      });
    });
  }

  async listInvitations(projectId: string): Promise<Invitation[]> {
    return this.store.invitations.listByProject(projectId);
  }

  /**
   * Accepting replaces whatever role the caller held on the project. The
   * invitation is consumed either way; accepting a role the caller already
   * holds consumes it and then reports AlreadyExists.
   */
  async resolveInvitation(
    signal: AbortSignal | undefined,
    claims: Claims,
    code: string,
    accept: boolean,
  ): Promise<InvitationResolution> {
    const outcome = await withTransaction(this.store, signal, async (qtx) => {
      const invitation = await qtx.invitations.getByCode(code);
      if (!invitation) throw notFound('invitation not found');

      let alreadyHeld = false;
      if (accept) {
        const user = await ensureUser(qtx, claims);
        const current = (await qtx.roleBindings.listByProject(invitation.projectId)).filter(
          (b) => b.userId === user.id,
        );
        alreadyHeld = current.some((b) => b.role === invitation.role);
        if (!alreadyHeld) {
          await qtx.roleBindings.deleteForUserOnProject(user.id, invitation.projectId);
          await qtx.roleBindings.create({
            id: uuid(),
            userId: user.id,
            role: invitation.role,
            isAdmin: invitation.role === Role.Admin,
            organizationId: await rootProjectId(qtx, invitation.projectId),
            projectId: invitation.projectId,
            createdAt: new Date().toISOString(),
          });
        }
      }
      await qtx.invitations.delete(code);
      return { invitation, alreadyHeld };
    });

    const { invitation, alreadyHeld } = outcome;
    if (alreadyHeld) {
      throw userVisibleError('AlreadyExists', `user already has the ${invitation.role} role on this project`);
    }
    this.log.info('Invitation resolved', { projectId: invitation.projectId, accepted: accept });
    return { projectId: invitation.projectId, role: invitation.role, accepted: accept };
  }
}

async function ensureUser(qtx: Querier, claims: Claims): Promise<User> {
  const existing = await qtx.users.getBySubject(claims.subject);
  if (existing) return existing;
  return qtx.users.create({
    id: uuid(),
    subject: claims.subject,
    displayName: claims.preferredUsername,
    createdAt: new Date().toISOString(),
  });
}
