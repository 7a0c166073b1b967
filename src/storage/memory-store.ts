/**
 * In-memory storage implementation.
 *
 * Reference backend for development and testing. Committed state is a
 * set of tables; a transaction works on a private copy of them and
 * replaces the committed tables on commit. Transactions are serialised by
 * one store-wide lock, which stands in for the row locks a database takes
 * with SELECT ... FOR UPDATE. Writes outside a transaction take the same
 * lock briefly; reads never wait.
 */

import { v4 as uuid } from 'uuid';
import { Artifact } from '../domain/artifact';
import { EntityKind } from '../domain/entities';
import { EvaluationFilter, RuleEvaluationRow, matchesFilter } from '../domain/evaluation';
import { Invitation, PendingInstallation } from '../domain/invitation';
import { EntityProfileRow, ProfileRow, RuleInstantiation } from '../domain/profile';
import { Project } from '../domain/project';
import { Provider } from '../domain/provider';
import { Role, RoleBinding } from '../domain/rbac';
import { RuleType } from '../domain/rule-type';
import { User } from '../domain/user';
import { Mutex } from './mutex';
import {
  ArtifactStore,
  InstallationStore,
  InvitationStore,
  ProfileStore,
  ProfileUpdate,
  ProjectStore,
  ProviderFilter,
  ProviderStore,
  Querier,
  RoleBindingStore,
  RuleEvaluationStore,
  RuleTypeStore,
  RuleTypeUpdate,
  Store,
  Transaction,
  TransactionClosedError,
  UniqueViolationError,
  UserStore,
} from './store';

/** Returned rows never alias stored rows. */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

interface Tables {
  users: Map<string, User>;
  projects: Map<string, Project>;
  providers: Map<string, Provider>;
  roleBindings: Map<string, RoleBinding>;
  ruleTypes: Map<string, RuleType>;
  profiles: Map<string, ProfileRow>;
  entityProfiles: Map<string, EntityProfileRow>;
  ruleInstantiations: Map<string, RuleInstantiation>;
  ruleEvaluations: Map<string, RuleEvaluationRow>;
  artifacts: Map<string, Artifact>;
  invitations: Map<string, Invitation>;
  installations: Map<string, PendingInstallation>;
}

function emptyTables(): Tables {
  return {
    users: new Map(),
    projects: new Map(),
    providers: new Map(),
    roleBindings: new Map(),
    ruleTypes: new Map(),
    profiles: new Map(),
    entityProfiles: new Map(),
    ruleInstantiations: new Map(),
    ruleEvaluations: new Map(),
    artifacts: new Map(),
    invitations: new Map(),
    installations: new Map(),
  };
}

/** How a sub-store reaches its tables: committed state or a transaction's copy. */
interface TableAccess {
  read(): Tables;
  write<T>(fn: (tables: Tables) => T): Promise<T>;
}

function deleteWhere<T>(table: Map<string, T>, predicate: (row: T) => boolean): number {
  let removed = 0;
  for (const [key, row] of table) {
    if (predicate(row)) {
      table.delete(key);
      removed++;
    }
  }
  return removed;
}

function deleteProfileCascade(tables: Tables, profileId: string): void {
  const entityProfileIds = new Set<string>();
  for (const row of tables.entityProfiles.values()) {
    if (row.profileId === profileId) entityProfileIds.add(row.id);
  }
  deleteWhere(tables.ruleInstantiations, (ri) => entityProfileIds.has(ri.entityProfileId));
  deleteWhere(tables.entityProfiles, (ep) => ep.profileId === profileId);
  deleteWhere(tables.ruleEvaluations, (ev) => ev.profileId === profileId);
  tables.profiles.delete(profileId);
}

function deleteProjectCascade(tables: Tables, projectId: string): void {
  for (const childProject of [...tables.projects.values()]) {
    if (childProject.parentId === projectId) deleteProjectCascade(tables, childProject.id);
  }
  for (const profile of [...tables.profiles.values()]) {
    if (profile.projectId === projectId) deleteProfileCascade(tables, profile.id);
  }
  deleteWhere(tables.ruleTypes, (rt) => rt.projectId === projectId);
  deleteWhere(tables.providers, (p) => p.projectId === projectId);
  deleteWhere(tables.roleBindings, (rb) => rb.projectId === projectId);
  deleteWhere(tables.invitations, (inv) => inv.projectId === projectId);
  deleteWhere(tables.artifacts, (a) => a.projectId === projectId);
  tables.projects.delete(projectId);
}

class MemoryUserStore implements UserStore {
  constructor(private access: TableAccess) {}

  async create(user: User): Promise<User> {
    return this.access.write((t) => {
      if (t.users.has(user.id)) throw new UniqueViolationError('users_pkey');
      for (const existing of t.users.values()) {
        if (existing.subject === user.subject) throw new UniqueViolationError('users_subject_key');
      }
      t.users.set(user.id, deepCopy(user));
      return deepCopy(user);
    });
  }

  async getById(id: string): Promise<User | null> {
    const user = this.access.read().users.get(id);
    return user ? deepCopy(user) : null;
  }

  async getBySubject(subject: string): Promise<User | null> {
    for (const user of this.access.read().users.values()) {
      if (user.subject === subject) return deepCopy(user);
    }
    return null;
  }

  async getProjects(userId: string): Promise<Project[]> {
    const tables = this.access.read();
    const seen = new Set<string>();
    const projects: Project[] = [];
    for (const binding of tables.roleBindings.values()) {
      if (binding.userId !== userId || !binding.projectId || seen.has(binding.projectId)) continue;
      seen.add(binding.projectId);
      const project = tables.projects.get(binding.projectId);
      if (project) projects.push(deepCopy(project));
    }
    return projects;
  }

  async getRoles(userId: string): Promise<RoleBinding[]> {
    return [...this.access.read().roleBindings.values()].filter((rb) => rb.userId === userId).map(deepCopy);
  }

  async delete(id: string): Promise<boolean> {
    return this.access.write((t) => {
      if (!t.users.delete(id)) return false;
      deleteWhere(t.roleBindings, (rb) => rb.userId === id);
      return true;
    });
  }
}

class MemoryProjectStore implements ProjectStore {
  constructor(private access: TableAccess) {}

  async create(project: Project): Promise<Project> {
    return this.access.write((t) => {
      if (t.projects.has(project.id)) throw new UniqueViolationError('projects_pkey');
      if (project.parentId !== undefined) {
        let ancestor = t.projects.get(project.parentId);
        if (!ancestor) throw new Error(`parent project ${project.parentId} does not exist`);
        while (ancestor) {
          if (ancestor.id === project.id) throw new Error(`project ${project.id} cannot be its own ancestor`);
          ancestor = ancestor.parentId === undefined ? undefined : t.projects.get(ancestor.parentId);
        }
      }
      const lowered = project.name.toLowerCase();
      for (const sibling of t.projects.values()) {
        if (sibling.parentId === project.parentId && sibling.name.toLowerCase() === lowered) {
          throw new UniqueViolationError('projects_parent_id_name_key');
        }
      }
      t.projects.set(project.id, deepCopy(project));
      return deepCopy(project);
    });
  }

  async getById(id: string): Promise<Project | null> {
    const project = this.access.read().projects.get(id);
    return project ? deepCopy(project) : null;
  }

  async getByName(name: string, parentId?: string): Promise<Project | null> {
    const lowered = name.toLowerCase();
    for (const project of this.access.read().projects.values()) {
      if (project.parentId === parentId && project.name.toLowerCase() === lowered) return deepCopy(project);
    }
    return null;
  }

  async getChildren(id: string): Promise<Project[]> {
    return [...this.access.read().projects.values()].filter((p) => p.parentId === id).map(deepCopy);
  }

  async delete(id: string): Promise<boolean> {
    return this.access.write((t) => {
      if (!t.projects.has(id)) return false;
      deleteProjectCascade(t, id);
      return true;
    });
  }
}

class MemoryProviderStore implements ProviderStore {
  constructor(private access: TableAccess) {}

  async create(provider: Provider): Promise<Provider> {
    return this.access.write((t) => {
      if (t.providers.has(provider.id)) throw new UniqueViolationError('providers_pkey');
      for (const existing of t.providers.values()) {
        if (existing.projectId === provider.projectId && existing.name === provider.name) {
          throw new UniqueViolationError('provider_name_project_id');
        }
      }
      t.providers.set(provider.id, deepCopy(provider));
      return deepCopy(provider);
    });
  }

  async getById(id: string): Promise<Provider | null> {
    const provider = this.access.read().providers.get(id);
    return provider ? deepCopy(provider) : null;
  }

  async getByName(projectId: string, name: string): Promise<Provider | null> {
    for (const provider of this.access.read().providers.values()) {
      if (provider.projectId === projectId && provider.name === name) return deepCopy(provider);
    }
    return null;
  }

  async listByProject(projectId: string): Promise<Provider[]> {
    return [...this.access.read().providers.values()].filter((p) => p.projectId === projectId).map(deepCopy);
  }

  async find(projectId: string, filter: ProviderFilter): Promise<Provider[]> {
    const { name, implements: capability } = filter;
    return (await this.listByProject(projectId)).filter(
      (p) => (name === undefined || p.name === name) && (capability === undefined || p.implements.includes(capability)),
    );
  }
}

class MemoryRoleBindingStore implements RoleBindingStore {
  constructor(private access: TableAccess) {}

  async create(binding: RoleBinding): Promise<RoleBinding> {
    return this.access.write((t) => {
      if (t.roleBindings.has(binding.id)) throw new UniqueViolationError('role_bindings_pkey');
      t.roleBindings.set(binding.id, deepCopy(binding));
      return deepCopy(binding);
    });
  }

  async listByUser(userId: string): Promise<RoleBinding[]> {
    return [...this.access.read().roleBindings.values()].filter((rb) => rb.userId === userId).map(deepCopy);
  }

  async listByProject(projectId: string): Promise<RoleBinding[]> {
    return [...this.access.read().roleBindings.values()].filter((rb) => rb.projectId === projectId).map(deepCopy);
  }

  async deleteForUserOnProject(userId: string, projectId: string): Promise<number> {
    return this.access.write((t) => deleteWhere(t.roleBindings, (rb) => rb.userId === userId && rb.projectId === projectId));
  }

  async deleteRole(userId: string, projectId: string, role: Role): Promise<number> {
    return this.access.write((t) =>
      deleteWhere(t.roleBindings, (rb) => rb.userId === userId && rb.projectId === projectId && rb.role === role),
    );
  }

  async deleteByUser(userId: string): Promise<number> {
    return this.access.write((t) => deleteWhere(t.roleBindings, (rb) => rb.userId === userId));
  }
}

class MemoryRuleTypeStore implements RuleTypeStore {
  constructor(private access: TableAccess) {}

  async create(ruleType: RuleType): Promise<RuleType> {
    return this.access.write((t) => {
      if (t.ruleTypes.has(ruleType.id)) throw new UniqueViolationError('rule_type_pkey');
      for (const existing of t.ruleTypes.values()) {
        if (existing.projectId === ruleType.projectId && existing.name === ruleType.name) {
          throw new UniqueViolationError('rule_type_project_id_name_key');
        }
      }
      t.ruleTypes.set(ruleType.id, deepCopy(ruleType));
      return deepCopy(ruleType);
    });
  }

  async update(id: string, update: RuleTypeUpdate): Promise<RuleType | null> {
    return this.access.write((t) => {
      const existing = t.ruleTypes.get(id);
      if (!existing) return null;
      const updated: RuleType = { ...existing, ...deepCopy(update), updatedAt: new Date().toISOString() };
      t.ruleTypes.set(id, updated);
      return deepCopy(updated);
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.access.write((t) => t.ruleTypes.delete(id));
  }

  async getById(id: string): Promise<RuleType | null> {
    const ruleType = this.access.read().ruleTypes.get(id);
    return ruleType ? deepCopy(ruleType) : null;
  }

  async getByName(projectId: string, name: string): Promise<RuleType | null> {
    for (const ruleType of this.access.read().ruleTypes.values()) {
      if (ruleType.projectId === projectId && ruleType.name === name) return deepCopy(ruleType);
    }
    return null;
  }

  async list(projectId: string, providerName: string): Promise<RuleType[]> {
    return [...this.access.read().ruleTypes.values()]
      .filter((rt) => rt.projectId === projectId && rt.providerName === providerName)
      .map(deepCopy);
  }
}

class MemoryProfileStore implements ProfileStore {
  constructor(private access: TableAccess) {}

  async create(profile: ProfileRow): Promise<ProfileRow> {
    return this.access.write((t) => {
      if (t.profiles.has(profile.id)) throw new UniqueViolationError('profiles_pkey');
      for (const existing of t.profiles.values()) {
        if (existing.projectId === profile.projectId && existing.name === profile.name) {
          throw new UniqueViolationError('profiles_project_id_name_key');
        }
      }
      t.profiles.set(profile.id, deepCopy(profile));
      return deepCopy(profile);
    });
  }

  async update(id: string, update: ProfileUpdate): Promise<ProfileRow | null> {
    return this.access.write((t) => {
      const existing = t.profiles.get(id);
      if (!existing) return null;
      const updated: ProfileRow = { ...existing, ...deepCopy(update), updatedAt: new Date().toISOString() };
      t.profiles.set(id, updated);
      return deepCopy(updated);
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.access.write((t) => {
      if (!t.profiles.has(id)) return false;
      deleteProfileCascade(t, id);
      return true;
    });
  }

  async getById(projectId: string, id: string): Promise<ProfileRow | null> {
    const profile = this.access.read().profiles.get(id);
    return profile && profile.projectId === projectId ? deepCopy(profile) : null;
  }

  async getByName(projectId: string, name: string): Promise<ProfileRow | null> {
    for (const profile of this.access.read().profiles.values()) {
      if (profile.projectId === projectId && profile.name === name) return deepCopy(profile);
    }
    return null;
  }

  // The store-wide transaction lock already serialises writers.
  async getByIdAndLock(projectId: string, id: string): Promise<ProfileRow | null> {
    return this.getById(projectId, id);
  }

  async getByNameAndLock(projectId: string, name: string): Promise<ProfileRow | null> {
    return this.getByName(projectId, name);
  }

  async list(projectId: string): Promise<ProfileRow[]> {
    return [...this.access.read().profiles.values()].filter((p) => p.projectId === projectId).map(deepCopy);
  }

  async createForEntity(row: EntityProfileRow): Promise<EntityProfileRow> {
    return this.access.write((t) => {
      for (const existing of t.entityProfiles.values()) {
        if (existing.profileId === row.profileId && existing.entity === row.entity) {
          throw new UniqueViolationError('entity_profiles_profile_id_entity_key');
        }
      }
      t.entityProfiles.set(row.id, deepCopy(row));
      return deepCopy(row);
    });
  }

  async upsertForEntity(row: EntityProfileRow): Promise<EntityProfileRow> {
    return this.access.write((t) => {
      for (const existing of t.entityProfiles.values()) {
        if (existing.profileId === row.profileId && existing.entity === row.entity) {
          existing.contextualRules = row.contextualRules;
          return deepCopy(existing);
        }
      }
      t.entityProfiles.set(row.id, deepCopy(row));
      return deepCopy(row);
    });
  }

  async deleteForEntity(profileId: string, entity: EntityKind): Promise<boolean> {
    return this.access.write((t) => {
      for (const existing of t.entityProfiles.values()) {
        if (existing.profileId === profileId && existing.entity === entity) {
          deleteWhere(t.ruleInstantiations, (ri) => ri.entityProfileId === existing.id);
          t.entityProfiles.delete(existing.id);
          return true;
        }
      }
      return false;
    });
  }

  async listForEntities(profileId: string): Promise<EntityProfileRow[]> {
    return [...this.access.read().entityProfiles.values()].filter((ep) => ep.profileId === profileId).map(deepCopy);
  }

  async upsertRuleInstantiation(instantiation: RuleInstantiation): Promise<RuleInstantiation> {
    return this.access.write((t) => {
      for (const existing of t.ruleInstantiations.values()) {
        if (
          existing.entityProfileId === instantiation.entityProfileId &&
          existing.ruleTypeId === instantiation.ruleTypeId &&
          existing.ruleName === instantiation.ruleName
        ) {
          return deepCopy(existing);
        }
      }
      t.ruleInstantiations.set(instantiation.id, deepCopy(instantiation));
      return deepCopy(instantiation);
    });
  }

  async deleteRuleInstantiation(entityProfileId: string, ruleTypeId: string, ruleName: string): Promise<boolean> {
    return this.access.write(
      (t) =>
        deleteWhere(
          t.ruleInstantiations,
          (ri) => ri.entityProfileId === entityProfileId && ri.ruleTypeId === ruleTypeId && ri.ruleName === ruleName,
        ) > 0,
    );
  }

  async listRuleInstantiations(profileId: string): Promise<RuleInstantiation[]> {
    const tables = this.access.read();
    return [...tables.ruleInstantiations.values()]
      .filter((ri) => tables.entityProfiles.get(ri.entityProfileId)?.profileId === profileId)
      .map(deepCopy);
  }

  async listProfilesInstantiatingRuleType(ruleTypeId: string): Promise<ProfileRow[]> {
    const tables = this.access.read();
    const profileIds = new Set<string>();
    for (const ri of tables.ruleInstantiations.values()) {
      if (ri.ruleTypeId !== ruleTypeId) continue;
      const entityProfile = tables.entityProfiles.get(ri.entityProfileId);
      if (entityProfile) profileIds.add(entityProfile.profileId);
    }
    return [...tables.profiles.values()].filter((p) => profileIds.has(p.id)).map(deepCopy);
  }
}

class MemoryRuleEvaluationStore implements RuleEvaluationStore {
  constructor(private access: TableAccess) {}

  async create(row: RuleEvaluationRow): Promise<RuleEvaluationRow> {
    return this.access.write((t) => {
      t.ruleEvaluations.set(row.id, deepCopy(row));
      return deepCopy(row);
    });
  }

  async listByProfileId(profileId: string, filter: EvaluationFilter = {}): Promise<RuleEvaluationRow[]> {
    return [...this.access.read().ruleEvaluations.values()]
      .filter((ev) => ev.profileId === profileId && matchesFilter(ev, filter))
      .map(deepCopy);
  }

  async deleteForProfileAndRuleType(profileId: string, ruleTypeId: string): Promise<number> {
    return this.access.write((t) =>
      deleteWhere(t.ruleEvaluations, (ev) => ev.profileId === profileId && ev.ruleTypeId === ruleTypeId),
    );
  }
}

class MemoryArtifactStore implements ArtifactStore {
  constructor(private access: TableAccess) {}

  async create(artifact: Artifact): Promise<Artifact> {
    return this.access.write((t) => {
      if (t.artifacts.has(artifact.id)) throw new UniqueViolationError('artifacts_pkey');
      t.artifacts.set(artifact.id, deepCopy(artifact));
      return deepCopy(artifact);
    });
  }

  async getById(id: string): Promise<Artifact | null> {
    const artifact = this.access.read().artifacts.get(id);
    return artifact ? deepCopy(artifact) : null;
  }
}

class MemoryInvitationStore implements InvitationStore {
  constructor(private access: TableAccess) {}

  async create(invitation: Invitation): Promise<Invitation> {
    return this.access.write((t) => {
      if (t.invitations.has(invitation.code)) throw new UniqueViolationError('user_invites_code_key');
      t.invitations.set(invitation.code, deepCopy(invitation));
      return deepCopy(invitation);
    });
  }

  async getByCode(code: string): Promise<Invitation | null> {
    const invitation = this.access.read().invitations.get(code);
    return invitation ? deepCopy(invitation) : null;
  }

  async listByProject(projectId: string): Promise<Invitation[]> {
    return [...this.access.read().invitations.values()].filter((i) => i.projectId === projectId).map(deepCopy);
  }

  async delete(code: string): Promise<boolean> {
    return this.access.write((t) => t.invitations.delete(code));
  }
}

class MemoryInstallationStore implements InstallationStore {
  constructor(private access: TableAccess) {}

  async create(installation: PendingInstallation): Promise<PendingInstallation> {
    return this.access.write((t) => {
      for (const existing of t.installations.values()) {
        if (existing.id === installation.id || existing.appInstallationId === installation.appInstallationId) {
          throw new UniqueViolationError('provider_github_app_installations_pkey');
        }
      }
      t.installations.set(installation.id, deepCopy(installation));
      return deepCopy(installation);
    });
  }

  async listPendingByForgeId(forgeId: string): Promise<PendingInstallation[]> {
    return [...this.access.read().installations.values()]
      .filter((i) => i.enrollingForgeId === forgeId && i.projectId === undefined)
      .map(deepCopy);
  }

  async claim(id: string, projectId: string): Promise<PendingInstallation | null> {
    return this.access.write((t) => {
      const installation = t.installations.get(id);
      if (!installation || installation.projectId !== undefined) return null;
      installation.projectId = projectId;
      return deepCopy(installation);
    });
  }
}

function createQuerier(access: TableAccess): Querier {
  return {
    users: new MemoryUserStore(access),
    projects: new MemoryProjectStore(access),
    providers: new MemoryProviderStore(access),
    roleBindings: new MemoryRoleBindingStore(access),
    ruleTypes: new MemoryRuleTypeStore(access),
    profiles: new MemoryProfileStore(access),
    ruleEvaluations: new MemoryRuleEvaluationStore(access),
    artifacts: new MemoryArtifactStore(access),
    invitations: new MemoryInvitationStore(access),
    installations: new MemoryInstallationStore(access),
  };
}

interface TransactionState {
  working: Tables;
  release: () => void;
  open: boolean;
  closedReason?: string;
  detach: () => void;
}

/** In-memory Store with serialised copy-on-begin transactions. */
export class MemoryStore implements Store {
  readonly users: UserStore;
  readonly projects: ProjectStore;
  readonly providers: ProviderStore;
  readonly roleBindings: RoleBindingStore;
  readonly ruleTypes: RuleTypeStore;
  readonly profiles: ProfileStore;
  readonly ruleEvaluations: RuleEvaluationStore;
  readonly artifacts: ArtifactStore;
  readonly invitations: InvitationStore;
  readonly installations: InstallationStore;

  private state: Tables = emptyTables();
  private readonly lock = new Mutex();
  private readonly transactions = new WeakMap<Transaction, TransactionState>();

  constructor() {
    const committed = createQuerier({
      read: () => this.state,
      write: async (fn) => {
        const release = await this.lock.acquire();
        try {
          return fn(this.state);
        } finally {
          release();
        }
      },
    });
    this.users = committed.users;
    this.projects = committed.projects;
    this.providers = committed.providers;
    this.roleBindings = committed.roleBindings;
    this.ruleTypes = committed.ruleTypes;
    this.profiles = committed.profiles;
    this.ruleEvaluations = committed.ruleEvaluations;
    this.artifacts = committed.artifacts;
    this.invitations = committed.invitations;
    this.installations = committed.installations;
  }

  async beginTransaction(signal?: AbortSignal): Promise<Transaction> {
    if (signal?.aborted) throw new TransactionClosedError('cancelled before begin');
    const release = await this.lock.acquire();
    if (signal?.aborted) {
      release();
      throw new TransactionClosedError('cancelled before begin');
    }

    const tx: Transaction = { id: `tx_${uuid()}` };
    const onAbort = () => this.close(tx, 'cancelled');
    signal?.addEventListener('abort', onAbort, { once: true });
    this.transactions.set(tx, {
      working: deepCopy(this.state),
      release,
      open: true,
      detach: () => signal?.removeEventListener('abort', onAbort),
    });
    return tx;
  }

  getQuerierWithTransaction(tx: Transaction): Querier {
    const working = (): Tables => this.openState(tx).working;
    return createQuerier({
      read: working,
      write: async (fn) => fn(working()),
    });
  }

  async commit(tx: Transaction): Promise<void> {
    const state = this.openState(tx);
    this.state = state.working;
    this.close(tx, 'committed');
  }

  async rollback(tx: Transaction): Promise<void> {
    this.close(tx, 'rolled back');
  }

  private openState(tx: Transaction): TransactionState {
    const state = this.transactions.get(tx);
    if (!state) throw new TransactionClosedError('unknown transaction');
    if (!state.open) throw new TransactionClosedError(state.closedReason ?? 'closed');
    return state;
  }

  private close(tx: Transaction, reason: string): void {
    const state = this.transactions.get(tx);
    if (!state || !state.open) return;
    state.open = false;
    state.closedReason = reason;
    state.detach();
    state.release();
  }
}

/** Create an in-memory store. */
export function createMemoryStore(): MemoryStore {
  return new MemoryStore();
}
