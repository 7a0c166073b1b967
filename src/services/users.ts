/**
 * User self-enrolment and removal.
 *
 * A user's first CreateUser call either claims the forge app
 * installations they made before signing up, one project each, or
 * provisions a personal project with a default forge provider.
 */

import { randomBytes } from 'crypto';
import { v4 as uuid } from 'uuid';
import { Claims } from '../auth/token-validator';
import { notFound, userVisibleError } from '../domain/errors';
import { Project } from '../domain/project';
import { ProviderClass } from '../domain/provider';
import { User } from '../domain/user';
import { Logger, logger as rootLogger } from '../logger';
import { Querier, Store, errIsUniqueViolation, withTransaction } from '../storage/store';
import { provisionProject } from './projects';

export const MAX_PROJECT_NAME_ATTEMPTS = 10;

export interface CreatedUser {
  user: User;
  projectId: string;
  projectName: string;
}

export interface UserWithProjects {
  user: User;
  projects: Project[];
}

/** Turns a username into something the project name pattern accepts. */
export function baseProjectName(claims: Claims): string {
  const source = claims.preferredUsername || claims.subject;
  const cleaned = source
    .replace(/[^-_.a-zA-Z0-9]/g, '-')
    .slice(0, 56)
    .replace(/^[^a-zA-Z0-9]+|[^a-zA-Z0-9]+$/g, '');
  return cleaned.length > 0 ? cleaned : 'project';
}

export class UserService {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly defaultProviderName: string,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'users' });
  }

  async createUser(signal: AbortSignal | undefined, claims: Claims): Promise<CreatedUser> {
    const result = await withTransaction(this.store, signal, async (qtx) => {
      let user: User;
      try {
        user = await qtx.users.create({
          id: uuid(),
          subject: claims.subject,
          displayName: claims.preferredUsername,
          createdAt: new Date().toISOString(),
        });
      } catch (err) {
        if (errIsUniqueViolation(err)) throw userVisibleError('AlreadyExists', 'user already exists');
        throw err;
      }

      const claimed = claims.forgeId ? await this.claimInstallations(qtx, user, claims.forgeId) : [];
      const project =
        claimed[0] ??
        (await provisionProject(qtx, {
          name: await uniqueRootName(qtx, baseProjectName(claims)),
          selfEnrolled: true,
          adminUserId: user.id,
          provider: { name: this.defaultProviderName, class: ProviderClass.Forge },
        }));

      return { user, projectId: project.id, projectName: project.name };
    });

    this.log.info('User enrolled', { userId: result.user.id, projectId: result.projectId });
    return result;
  }

  async getUser(subject: string): Promise<UserWithProjects> {
    const user = await this.store.users.getBySubject(subject);
    if (!user) throw notFound('user not found');
    return { user, projects: await this.store.users.getProjects(user.id) };
  }

  /**
   * Removes the caller. Projects where they were the only administrator
   * go with them.
   */
  async deleteUser(signal: AbortSignal | undefined, subject: string): Promise<void> {
    await withTransaction(this.store, signal, async (qtx) => {
      const user = await qtx.users.getBySubject(subject);
      if (!user) throw notFound('user not found');

      for (const binding of await qtx.roleBindings.listByUser(user.id)) {
        if (!binding.isAdmin || !binding.projectId) continue;
        const admins = (await qtx.roleBindings.listByProject(binding.projectId)).filter((b) => b.isAdmin);
        if (admins.every((b) => b.userId === user.id)) {
          await qtx.projects.delete(binding.projectId);
        }
      }
      await qtx.roleBindings.deleteByUser(user.id);
      await qtx.users.delete(user.id);
    });
    this.log.info('User deleted', { subject });
  }

  private async claimInstallations(qtx: Querier, user: User, forgeId: string): Promise<Project[]> {
    const projects: Project[] = [];
    for (const installation of await qtx.installations.listPendingByForgeId(forgeId)) {
      const project = await provisionProject(qtx, {
        name: await uniqueRootName(qtx, installation.organizationName),
        selfEnrolled: true,
        adminUserId: user.id,
        provider: {
          name: `${this.defaultProviderName}-app`,
          class: ProviderClass.ForgeApp,
          config: { installationId: installation.appInstallationId },
        },
      });
      await qtx.installations.claim(installation.id, project.id);
      projects.push(project);
    }
    return projects;
  }
}

/** The base name, or the base with a random 4-hex suffix when it is taken. */
async function uniqueRootName(qtx: Querier, base: string): Promise<string> {
  if (!(await qtx.projects.getByName(base))) return base;
  for (let attempt = 0; attempt < MAX_PROJECT_NAME_ATTEMPTS; attempt++) {
    const candidate = `${base}-${randomBytes(2).toString('hex')}`;
    if (!(await qtx.projects.getByName(candidate))) return candidate;
  }
  throw userVisibleError('ResourceExhausted', `could not find a free project name for ${base}`);
}
