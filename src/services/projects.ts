/**
 * Projects, their providers and the role catalogue.
 */

import { v4 as uuid } from 'uuid';
import { invalidArgument, notFound, userVisibleError } from '../domain/errors';
import { Project, validateProjectName } from '../domain/project';
import { FORGE_OAUTH_IMPLEMENTS, Provider, ProviderCapability, ProviderClass } from '../domain/provider';
import { ROLE_DESCRIPTIONS, Role } from '../domain/rbac';
import { Querier, Store, errIsUniqueViolation, withTransaction } from '../storage/store';

/** Root of the tree a project belongs to. */
export async function rootProjectId(q: Querier, projectId: string): Promise<string> {
  const seen = new Set<string>();
  let current = await q.projects.getById(projectId);
  if (!current) throw notFound('project not found');
  while (current.parentId && !seen.has(current.id)) {
    seen.add(current.id);
    const parent: Project | null = await q.projects.getById(current.parentId);
    if (!parent) break;
    current = parent;
  }
  return current.id;
}

export interface ProviderSeed {
  name: string;
  class: ProviderClass;
  implements?: ProviderCapability[];
  config?: Record<string, unknown>;
}

export interface ProvisionRequest {
  name: string;
  parentId?: string;
  selfEnrolled?: boolean;
  /** Receives an admin binding on the new project. */
  adminUserId?: string;
  provider?: ProviderSeed;
}

/**
 * Creates a project with its first provider and admin binding. Throws
 * UniqueViolationError when a sibling already has the name.
 */
export async function provisionProject(qtx: Querier, request: ProvisionRequest): Promise<Project> {
  const now = new Date().toISOString();
  const project = await qtx.projects.create({
    id: uuid(),
    parentId: request.parentId,
    name: request.name,
    metadata: request.selfEnrolled ? { selfEnrolled: true } : {},
    createdAt: now,
    updatedAt: now,
  });

  if (request.provider) {
    await qtx.providers.create({
      id: uuid(),
      projectId: project.id,
      name: request.provider.name,
      class: request.provider.class,
      implements: request.provider.implements ?? FORGE_OAUTH_IMPLEMENTS,
      version: 'v1',
      config: request.provider.config ?? {},
      createdAt: now,
      updatedAt: now,
    });
  }

  if (request.adminUserId) {
    await qtx.roleBindings.create({
      id: uuid(),
      userId: request.adminUserId,
      role: Role.Admin,
      isAdmin: true,
      organizationId: request.parentId ? await rootProjectId(qtx, request.parentId) : project.id,
      projectId: project.id,
      createdAt: now,
    });
  }
  return project;
}

export interface RoleDescription {
  name: Role;
  description: string;
}

export interface RoleAssignment {
  role: Role;
  subject: string;
  projectId: string;
}

/** Refuses a change that would leave the project without an administrator. */
async function keepAnAdmin(qtx: Querier, projectId: string, userId: string): Promise<void> {
  const admins = (await qtx.roleBindings.listByProject(projectId)).filter((b) => b.isAdmin);
  if (admins.length > 0 && admins.every((b) => b.userId === userId)) {
    throw userVisibleError('FailedPrecondition', 'cannot remove the last administrator of the project');
  }
}

export class ProjectService {
  constructor(private readonly store: Store) {}

  async listProjects(userId: string | undefined): Promise<Project[]> {
    if (!userId) return [];
    return this.store.users.getProjects(userId);
  }

  async createProject(
    signal: AbortSignal | undefined,
    parentId: string,
    name: string,
    creatorUserId?: string,
  ): Promise<Project> {
    const problem = validateProjectName(name);
    if (problem) throw invalidArgument(problem);

    return withTransaction(this.store, signal, async (qtx) => {
      const parent = await qtx.projects.getById(parentId);
      if (!parent) throw notFound('parent project not found');
      try {
        return await provisionProject(qtx, { name, parentId: parent.id, adminUserId: creatorUserId });
      } catch (err) {
        if (errIsUniqueViolation(err)) throw userVisibleError('AlreadyExists', `project ${name} already exists`);
        throw err;
      }
    });
  }

  async deleteProject(signal: AbortSignal | undefined, projectId: string): Promise<void> {
    await withTransaction(this.store, signal, async (qtx) => {
      const project = await qtx.projects.getById(projectId);
      if (!project) throw notFound('project not found');
      if (!project.parentId) throw invalidArgument('cannot delete a top-level project');
      await qtx.projects.delete(project.id);
    });
  }

  async listProviders(projectId: string): Promise<Provider[]> {
    return this.store.providers.listByProject(projectId);
  }

  async getProvider(projectId: string, name: string): Promise<Provider> {
    const provider = await this.store.providers.getByName(projectId, name);
    if (!provider) throw notFound('provider not found');
    return provider;
  }

  /** Bindings on the project by subject; bindings of deleted users are skipped. */
  async listRoleAssignments(projectId: string): Promise<RoleAssignment[]> {
    const assignments: RoleAssignment[] = [];
    for (const binding of await this.store.roleBindings.listByProject(projectId)) {
      const user = await this.store.users.getById(binding.userId);
      if (user) assignments.push({ role: binding.role, subject: user.subject, projectId });
    }
    return assignments;
  }

  /** Replaces whatever role the subject held on the project. */
  async assignRole(
    signal: AbortSignal | undefined,
    projectId: string,
    subject: string,
    role: Role,
  ): Promise<RoleAssignment> {
    return withTransaction(this.store, signal, async (qtx) => {
      const user = await qtx.users.getBySubject(subject);
      if (!user) throw notFound('user not found');
      if (role !== Role.Admin) await keepAnAdmin(qtx, projectId, user.id);

      await qtx.roleBindings.deleteForUserOnProject(user.id, projectId);
      await qtx.roleBindings.create({
        id: uuid(),
        userId: user.id,
        role,
        isAdmin: role === Role.Admin,
        organizationId: await rootProjectId(qtx, projectId),
        projectId,
        createdAt: new Date().toISOString(),
      });
      return { role, subject, projectId };
    });
  }

  async removeRole(
    signal: AbortSignal | undefined,
    projectId: string,
    subject: string,
    role: Role,
  ): Promise<RoleAssignment> {
    return withTransaction(this.store, signal, async (qtx) => {
      const user = await qtx.users.getBySubject(subject);
      if (!user) throw notFound('user not found');
      if (role === Role.Admin) await keepAnAdmin(qtx, projectId, user.id);

      const removed = await qtx.roleBindings.deleteRole(user.id, projectId, role);
      if (removed === 0) throw notFound(`user does not have the ${role} role on this project`);
      return { role, subject, projectId };
    });
  }

  listRoles(): RoleDescription[] {
    return Object.values(Role).map((name) => ({ name, description: ROLE_DESCRIPTIONS[name] }));
  }
}
