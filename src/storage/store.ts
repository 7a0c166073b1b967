/**
 * Storage layer interfaces.
 *
 * Defines the querier contract the services run against, with pluggable
 * backends. Lookups return null when there is no such row; creates throw
 * UniqueViolationError when a uniqueness constraint would be broken.
 * Multi-row writes go through beginTransaction, getQuerierWithTransaction,
 * then commit or rollback.
 */

import { Artifact } from '../domain/artifact';
import { EntityKind } from '../domain/entities';
import { EvaluationFilter, RuleEvaluationRow } from '../domain/evaluation';
import { Invitation, PendingInstallation } from '../domain/invitation';
import { EntityProfileRow, ProfileRow, RuleInstantiation } from '../domain/profile';
import { Project } from '../domain/project';
import { Provider, ProviderCapability } from '../domain/provider';
import { Role, RoleBinding } from '../domain/rbac';
import { RuleType } from '../domain/rule-type';
import { User } from '../domain/user';

/** Raised when an insert or update would break a uniqueness constraint. */
export class UniqueViolationError extends Error {
  constructor(readonly constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
    this.name = 'UniqueViolationError';
  }
}

export function errIsUniqueViolation(err: unknown): err is UniqueViolationError {
  return err instanceof UniqueViolationError;
}

/** Raised when a transaction is used after commit, rollback or cancellation. */
export class TransactionClosedError extends Error {
  constructor(reason: string) {
    super(`transaction is closed: ${reason}`);
    this.name = 'TransactionClosedError';
  }
}

export interface UserStore {
  create(user: User): Promise<User>;
  getById(id: string): Promise<User | null>;
  getBySubject(subject: string): Promise<User | null>;
  /** Projects the user holds a role binding on. */
  getProjects(userId: string): Promise<Project[]>;
  getRoles(userId: string): Promise<RoleBinding[]>;
  delete(id: string): Promise<boolean>;
}

export interface ProjectStore {
  /** Refuses a missing parent and parents that would form a cycle. */
  create(project: Project): Promise<Project>;
  getById(id: string): Promise<Project | null>;
  /** Sibling lookup; a missing parentId looks among root projects. */
  getByName(name: string, parentId?: string): Promise<Project | null>;
  getChildren(id: string): Promise<Project[]>;
  /** Cascades to providers, rule types, profiles and role bindings. */
  delete(id: string): Promise<boolean>;
}

export interface ProviderFilter {
  name?: string;
  implements?: ProviderCapability;
}

export interface ProviderStore {
  create(provider: Provider): Promise<Provider>;
  getById(id: string): Promise<Provider | null>;
  getByName(projectId: string, name: string): Promise<Provider | null>;
  listByProject(projectId: string): Promise<Provider[]>;
  find(projectId: string, filter: ProviderFilter): Promise<Provider[]>;
}

export interface RoleBindingStore {
  create(binding: RoleBinding): Promise<RoleBinding>;
  listByUser(userId: string): Promise<RoleBinding[]>;
  listByProject(projectId: string): Promise<RoleBinding[]>;
  /** Removes every binding of the user on the project; returns how many. */
  deleteForUserOnProject(userId: string, projectId: string): Promise<number>;
  /** Removes the user's bindings of one role on the project; returns how many. */
  deleteRole(userId: string, projectId: string, role: Role): Promise<number>;
  deleteByUser(userId: string): Promise<number>;
}

export type RuleTypeUpdate = Pick<RuleType, 'displayName' | 'description' | 'guidance' | 'severity' | 'definition'>;

export interface RuleTypeStore {
  create(ruleType: RuleType): Promise<RuleType>;
  update(id: string, update: RuleTypeUpdate): Promise<RuleType | null>;
  delete(id: string): Promise<boolean>;
  getById(id: string): Promise<RuleType | null>;
  getByName(projectId: string, name: string): Promise<RuleType | null>;
  list(projectId: string, providerName: string): Promise<RuleType[]>;
}

export type ProfileUpdate = Pick<ProfileRow, 'displayName' | 'labels' | 'remediate' | 'alert'>;

export interface ProfileStore {
  create(profile: ProfileRow): Promise<ProfileRow>;
  update(id: string, update: ProfileUpdate): Promise<ProfileRow | null>;
  /** Cascades to entity profiles, rule instantiations and evaluations. */
  delete(id: string): Promise<boolean>;
  getById(projectId: string, id: string): Promise<ProfileRow | null>;
  getByName(projectId: string, name: string): Promise<ProfileRow | null>;
  /** Reads the row and holds it for the rest of the transaction. */
  getByIdAndLock(projectId: string, id: string): Promise<ProfileRow | null>;
  getByNameAndLock(projectId: string, name: string): Promise<ProfileRow | null>;
  list(projectId: string): Promise<ProfileRow[]>;

  createForEntity(row: EntityProfileRow): Promise<EntityProfileRow>;
  /** Inserts or replaces the rules of one entity kind. */
  upsertForEntity(row: EntityProfileRow): Promise<EntityProfileRow>;
  deleteForEntity(profileId: string, entity: EntityKind): Promise<boolean>;
  listForEntities(profileId: string): Promise<EntityProfileRow[]>;

  upsertRuleInstantiation(instantiation: RuleInstantiation): Promise<RuleInstantiation>;
  deleteRuleInstantiation(entityProfileId: string, ruleTypeId: string, ruleName: string): Promise<boolean>;
  listRuleInstantiations(profileId: string): Promise<RuleInstantiation[]>;
  listProfilesInstantiatingRuleType(ruleTypeId: string): Promise<ProfileRow[]>;
}

export interface RuleEvaluationStore {
  create(row: RuleEvaluationRow): Promise<RuleEvaluationRow>;
  listByProfileId(profileId: string, filter?: EvaluationFilter): Promise<RuleEvaluationRow[]>;
  deleteForProfileAndRuleType(profileId: string, ruleTypeId: string): Promise<number>;
}

export interface ArtifactStore {
  create(artifact: Artifact): Promise<Artifact>;
  getById(id: string): Promise<Artifact | null>;
}

export interface InvitationStore {
  create(invitation: Invitation): Promise<Invitation>;
  getByCode(code: string): Promise<Invitation | null>;
  listByProject(projectId: string): Promise<Invitation[]>;
  delete(code: string): Promise<boolean>;
}

export interface InstallationStore {
  create(installation: PendingInstallation): Promise<PendingInstallation>;
  /** Unclaimed installations made by the given forge user. */
  listPendingByForgeId(forgeId: string): Promise<PendingInstallation[]>;
  claim(id: string, projectId: string): Promise<PendingInstallation | null>;
}

/** Everything a service can query, inside or outside a transaction. */
export interface Querier {
  users: UserStore;
  projects: ProjectStore;
  providers: ProviderStore;
  roleBindings: RoleBindingStore;
  ruleTypes: RuleTypeStore;
  profiles: ProfileStore;
  ruleEvaluations: RuleEvaluationStore;
  artifacts: ArtifactStore;
  invitations: InvitationStore;
  installations: InstallationStore;
}

/** Opaque transaction handle. */
export interface Transaction {
  readonly id: string;
}

/** Composite store: a querier over committed state plus transactions. */
export interface Store extends Querier {
  /** A transaction whose signal aborts is rolled back. */
  beginTransaction(signal?: AbortSignal): Promise<Transaction>;
  getQuerierWithTransaction(tx: Transaction): Querier;
  commit(tx: Transaction): Promise<void>;
  /** Idempotent; a no-op after commit. */
  rollback(tx: Transaction): Promise<void>;
}

/**
 * Run `fn` inside a transaction: commit when it resolves, roll back when
 * it throws or the signal aborts.
 */
export async function withTransaction<T>(
  store: Store,
  signal: AbortSignal | undefined,
  fn: (qtx: Querier) => Promise<T>,
): Promise<T> {
  const tx = await store.beginTransaction(signal);
  try {
    const result = await fn(store.getQuerierWithTransaction(tx));
    await store.commit(tx);
    return result;
  } catch (err) {
    await store.rollback(tx);
    throw err;
  }
}
