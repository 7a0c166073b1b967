/**
 * Profile lifecycle and status reporting.
 *
 * A profile write validates every rule reference against its rule type,
 * then replaces the profile row, its per-entity rule lists and its rule
 * instantiations inside one transaction. Reconcilers learn about the
 * change from a profile-initialised event published after commit.
 */

import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { isUuid, parseUuid } from '../domain/context';
import {
  ENTITY_KINDS,
  ENTITY_KIND_VALUES,
  EntityKind,
  encodeEntityKind,
  knownEntityKindsCsv,
  parseEntityKind,
} from '../domain/entities';
import { errorMessage, invalidArgument, notFound, statusError, userVisibleError } from '../domain/errors';
import {
  EvalStatus,
  EvaluationFilter,
  RuleEvaluationRow,
  aggregateStatus,
  isComplete,
  needsGuidance,
} from '../domain/evaluation';
import { EventPublisher, ProfileInitPayload, TOPIC_PROFILE_INIT } from '../domain/events';
import {
  EntityProfileRow,
  Profile,
  ProfileRow,
  ProfileSpec,
  RuleRef,
  RuleValidationError,
  computeRuleName,
  effectiveAlert,
  effectiveRemediate,
  rulesFor,
  validateProfileShape,
  validateRuleNames,
} from '../domain/profile';
import { Provider } from '../domain/provider';
import { Logger, logger as rootLogger } from '../logger';
import { SchemaCompileError } from '../schema/json-schema';
import { RuleValidator } from '../schema/rule-validator';
import { Querier, Store, errIsUniqueViolation, withTransaction } from '../storage/store';

export const RuleRefSchema = z.object({
  type: z.string(),
  name: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  def: z.record(z.unknown()),
});

const StoredRulesSchema = z.array(RuleRefSchema);

/** One rule of a profile, resolved to its rule type. */
interface RuleEntry {
  kind: EntityKind;
  ruleTypeId: string;
  ruleName: string;
}

function entryKey(entry: { kind: EntityKind; ruleTypeId: string; ruleName: string }): string {
  return `${entry.kind}/${entry.ruleTypeId}/${entry.ruleName}`;
}

/** Selects which evaluations a status read returns. */
export interface StatusSelector {
  all?: boolean;
  entity?: { id: string; type: string };
  rule?: string;
}

export interface ProfileStatus {
  profileId: string;
  profileName: string;
  profileStatus: EvalStatus;
  lastUpdated?: string;
}

export interface RuleEvaluationStatus {
  profileId: string;
  ruleId: string;
  ruleName: string;
  ruleTypeName: string;
  entity: string;
  status: EvalStatus;
  details: string;
  entityInfo: Record<string, string>;
  guidance: string;
  lastUpdated: string;
  remediationStatus: string;
  remediationDetails: string;
  remediationLastUpdated?: string;
}

export interface ProfileStatusResult {
  profileStatus: ProfileStatus;
  ruleEvaluationStatus: RuleEvaluationStatus[];
}

export class ProfileService {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly publisher: EventPublisher,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'profiles' });
  }

  async createProfile(
    signal: AbortSignal | undefined,
    projectId: string,
    providerName: string,
    spec: ProfileSpec,
  ): Promise<Profile> {
    const profile = await withTransaction(this.store, signal, async (qtx) => {
      const provider = await this.getProvider(qtx, projectId, providerName);
      const entries = await this.validateAndExtractRules(qtx, projectId, provider, spec);

      const now = new Date().toISOString();
      let row: ProfileRow;
      try {
        row = await qtx.profiles.create({
          id: uuid(),
          projectId,
          providerName: provider.name,
          name: spec.name,
          displayName: spec.displayName || spec.name,
          labels: spec.labels ?? [],
          remediate: spec.remediate ?? 'unset',
          alert: spec.alert ?? 'unset',
          createdAt: now,
          updatedAt: now,
        });
      } catch (err) {
        if (errIsUniqueViolation(err)) {
          throw userVisibleError('AlreadyExists', `profile ${spec.name} already exists`);
        }
        throw err;
      }

      const entityRows: EntityProfileRow[] = [];
      for (const kind of ENTITY_KIND_VALUES) {
        const rules = rulesFor(spec, kind);
        if (rules.length === 0) continue;
        const entityRow = await qtx.profiles.createForEntity({
          id: uuid(),
          profileId: row.id,
          entity: kind,
          contextualRules: JSON.stringify(rules),
          createdAt: now,
        });
        entityRows.push(entityRow);
        await this.instantiateRules(qtx, entityRow, entries, now);
      }

      return assembleProfile(row, entityRows);
    });

    await this.publishProfileInit(projectId, profile.providerName);
    return profile;
  }

  async updateProfile(
    signal: AbortSignal | undefined,
    projectId: string,
    providerName: string,
    spec: ProfileSpec,
  ): Promise<Profile> {
    const profile = await withTransaction(this.store, signal, async (qtx) => {
      const provider = await this.getProvider(qtx, projectId, providerName);

      const old = spec.id
        ? await qtx.profiles.getByIdAndLock(projectId, spec.id)
        : await qtx.profiles.getByNameAndLock(projectId, spec.name);
      if (!old) throw notFound('profile not found');
      if (old.name !== spec.name) throw invalidArgument('cannot change profile name');
      if (spec.projectId !== undefined && spec.projectId !== '' && parseUuid(spec.projectId) !== old.projectId) {
        throw invalidArgument('cannot change profile project');
      }
      if (old.providerName !== provider.name) throw invalidArgument('cannot change profile provider');

      const entries = await this.validateAndExtractRules(qtx, projectId, provider, spec);
      const oldEntityRows = await qtx.profiles.listForEntities(old.id);
      const oldKindByEntityProfile = new Map(oldEntityRows.map((r) => [r.id, r.entity]));
      const oldInstantiations = await qtx.profiles.listRuleInstantiations(old.id);

      const row = await qtx.profiles.update(old.id, {
        displayName: spec.displayName || spec.name,
        labels: spec.labels ?? old.labels,
        remediate: spec.remediate ?? old.remediate,
        alert: spec.alert ?? old.alert,
      });
      if (!row) throw notFound('profile not found');

      const now = new Date().toISOString();
      const entityRows: EntityProfileRow[] = [];
      for (const kind of ENTITY_KIND_VALUES) {
        const rules = rulesFor(spec, kind);
        if (rules.length === 0) {
          await qtx.profiles.deleteForEntity(old.id, kind);
          continue;
        }
        const entityRow = await qtx.profiles.upsertForEntity({
          id: uuid(),
          profileId: old.id,
          entity: kind,
          contextualRules: JSON.stringify(rules),
          createdAt: now,
        });
        entityRows.push(entityRow);
        await this.instantiateRules(qtx, entityRow, entries, now);
      }

      const kept = new Set(entries.map(entryKey));
      for (const instantiation of oldInstantiations) {
        const kind = oldKindByEntityProfile.get(instantiation.entityProfileId);
        if (kind === undefined) continue;
        if (kept.has(entryKey({ kind, ruleTypeId: instantiation.ruleTypeId, ruleName: instantiation.ruleName }))) {
          continue;
        }
        await qtx.profiles.deleteRuleInstantiation(
          instantiation.entityProfileId,
          instantiation.ruleTypeId,
          instantiation.ruleName,
        );
        await qtx.ruleEvaluations.deleteForProfileAndRuleType(old.id, instantiation.ruleTypeId);
      }

      return assembleProfile(row, entityRows);
    });

    await this.publishProfileInit(projectId, profile.providerName);
    return profile;
  }

  async deleteProfile(signal: AbortSignal | undefined, projectId: string, id: string): Promise<void> {
    await withTransaction(this.store, signal, async (qtx) => {
      const profile = await qtx.profiles.getById(projectId, id);
      if (!profile) throw notFound('profile not found');
      await qtx.profiles.delete(profile.id);
    });
  }

  async getProfileById(projectId: string, id: string): Promise<Profile> {
    const row = await this.store.profiles.getById(projectId, id);
    if (!row) throw notFound('profile not found');
    return assembleProfile(row, await this.store.profiles.listForEntities(row.id));
  }

  async getProfileByName(projectId: string, name: string): Promise<Profile> {
    const row = await this.store.profiles.getByName(projectId, name);
    if (!row) throw notFound('profile not found');
    return assembleProfile(row, await this.store.profiles.listForEntities(row.id));
  }

  async listProfiles(projectId: string): Promise<Profile[]> {
    const rows = await this.store.profiles.list(projectId);
    const profiles: Profile[] = [];
    for (const row of rows) {
      profiles.push(assembleProfile(row, await this.store.profiles.listForEntities(row.id)));
    }
    return profiles;
  }

  async getProfileStatusByName(
    projectId: string,
    providerName: string,
    name: string,
    selector: StatusSelector,
  ): Promise<ProfileStatusResult> {
    const row = await this.store.profiles.getByName(projectId, name);
    if (!row) throw notFound('profile status not found');

    const filter = parseSelector(selector);
    const profileStatus = await this.summarise(row);
    if (filter === null) return { profileStatus, ruleEvaluationStatus: [] };

    const evaluations = await this.store.ruleEvaluations.listByProfileId(row.id, filter);
    const ruleEvaluationStatus: RuleEvaluationStatus[] = [];
    for (const evaluation of evaluations) {
      if (!isComplete(evaluation)) {
        this.log.debug('skipping incomplete rule evaluation', { evaluationId: evaluation.id });
        continue;
      }
      ruleEvaluationStatus.push({
        profileId: row.id,
        ruleId: evaluation.ruleTypeId,
        ruleName: evaluation.ruleName,
        ruleTypeName: evaluation.ruleTypeName,
        entity: encodeEntityKind(evaluation.entity),
        status: evaluation.evalStatus,
        details: evaluation.evalDetails,
        entityInfo: await this.entityInfo(evaluation, providerName),
        guidance: needsGuidance(evaluation.evalStatus) ? await this.guidanceFor(evaluation.ruleTypeId) : '',
        lastUpdated: evaluation.evalLastUpdated,
        remediationStatus: evaluation.remStatus,
        remediationDetails: evaluation.remDetails,
        remediationLastUpdated: evaluation.remLastUpdated,
      });
    }
    return { profileStatus, ruleEvaluationStatus };
  }

  async getProfileStatusByProject(projectId: string): Promise<ProfileStatus[]> {
    const rows = await this.store.profiles.list(projectId);
    const statuses: ProfileStatus[] = [];
    for (const row of rows) {
      statuses.push(await this.summarise(row));
    }
    return statuses;
  }

  private async getProvider(qtx: Querier, projectId: string, providerName: string): Promise<Provider> {
    const provider = await qtx.providers.getByName(projectId, providerName);
    if (!provider) throw notFound('provider not found');
    return provider;
  }

  /** Checks the profile and resolves each of its rules to a rule type. */
  private async validateAndExtractRules(
    qtx: Querier,
    projectId: string,
    provider: Provider,
    spec: ProfileSpec,
  ): Promise<RuleEntry[]> {
    const shapeProblem = validateProfileShape(spec);
    if (shapeProblem) throw invalidArgument(`invalid profile: ${shapeProblem}`);

    const nameProblem = validateRuleNames(spec);
    if (nameProblem) throw invalidArgument(`profile failed rule name validation: ${nameProblem.reason}`);

    const validators = new Map<string, RuleValidator>();
    const entries: RuleEntry[] = [];
    try {
      for (const kind of ENTITY_KIND_VALUES) {
        for (const rule of rulesFor(spec, kind)) {
          const ruleType = await qtx.ruleTypes.getByName(projectId, rule.type);
          if (!ruleType || ruleType.providerName !== provider.name) {
            throw new RuleValidationError(rule.type, `cannot find rule type ${rule.type}`);
          }
          if (parseEntityKind(ruleType.definition.inEntity) !== kind) {
            throw new RuleValidationError(
              rule.type,
              `rule type ${ruleType.name} expects entity ${ruleType.definition.inEntity}, but was given entity ${kind}`,
            );
          }

          let validator = validators.get(ruleType.id);
          if (!validator) {
            validator = new RuleValidator(ruleType);
            validators.set(ruleType.id, validator);
          }
          validator.validateRuleDef(rule.def);
          validator.validateParams(rule.params);

          entries.push({ kind, ruleTypeId: ruleType.id, ruleName: computeRuleName(rule) });
        }
      }
    } catch (err) {
      if (err instanceof RuleValidationError) {
        throw invalidArgument(`profile contained invalid rule '${err.ruleType}': ${err.reason}`);
      }
      if (err instanceof SchemaCompileError) {
        throw statusError('Internal', 'error creating rule validator', err);
      }
      throw err;
    }
    return entries;
  }

  private async instantiateRules(
    qtx: Querier,
    entityRow: EntityProfileRow,
    entries: RuleEntry[],
    now: string,
  ): Promise<void> {
    for (const entry of entries) {
      if (entry.kind !== entityRow.entity) continue;
      await qtx.profiles.upsertRuleInstantiation({
        id: uuid(),
        entityProfileId: entityRow.id,
        ruleTypeId: entry.ruleTypeId,
        ruleName: entry.ruleName,
        createdAt: now,
      });
    }
  }

  private async publishProfileInit(projectId: string, providerName: string): Promise<void> {
    const payload: ProfileInitPayload = { provider_name: providerName, project_id: projectId };
    try {
      await this.publisher.publish(TOPIC_PROFILE_INIT, payload);
    } catch (err) {
      this.log.error('error publishing profile-initialised event', {
        projectId,
        error: errorMessage(err),
      });
    }
  }

  private async summarise(row: ProfileRow): Promise<ProfileStatus> {
    const evaluations = await this.store.ruleEvaluations.listByProfileId(row.id);
    const updates = evaluations.map((e) => e.evalLastUpdated).filter((t): t is string => t !== undefined);
    return {
      profileId: row.id,
      profileName: row.name,
      profileStatus: aggregateStatus(evaluations.map((e) => e.evalStatus)),
      lastUpdated: updates.length > 0 ? updates.sort()[updates.length - 1] : undefined,
    };
  }

  private async guidanceFor(ruleTypeId: string): Promise<string> {
    try {
      const ruleType = await this.store.ruleTypes.getById(ruleTypeId);
      return ruleType?.guidance ?? '';
    } catch (err) {
      this.log.warn('error getting rule type guidance', {
        ruleTypeId,
        error: errorMessage(err),
      });
      return '';
    }
  }

  private async entityInfo(evaluation: RuleEvaluationRow, providerName: string): Promise<Record<string, string>> {
    const info: Record<string, string> = {
      provider: providerName,
      entity_type: evaluation.entity,
      entity_id: evaluation.entityId,
    };
    try {
      await ENTITY_KINDS[evaluation.entity].enrich(evaluation, info, {
        getArtifact: (id) => this.store.artifacts.getById(id),
      });
    } catch (err) {
      this.log.warn('error enriching rule evaluation', {
        evaluationId: evaluation.id,
        error: errorMessage(err),
      });
    }
    return info;
  }
}

/** Null when the selector asks for no rule evaluations at all. */
function parseSelector(selector: StatusSelector): EvaluationFilter | null {
  const ruleName = selector.rule && selector.rule.length > 0 ? selector.rule : undefined;
  if (selector.all) return { ruleName };
  if (!selector.entity) return null;

  const kind = parseEntityKind(selector.entity.type);
  if (kind === null) {
    throw invalidArgument(`invalid entity type ${selector.entity.type}, please use one of ${knownEntityKindsCsv()}`);
  }
  if (!isUuid(selector.entity.id)) throw invalidArgument('invalid entity ID in selector');
  return { entityId: selector.entity.id, entity: kind, ruleName };
}

function parseStoredRules(row: EntityProfileRow): RuleRef[] {
  const parsed = StoredRulesSchema.safeParse(JSON.parse(row.contextualRules));
  if (!parsed.success) {
    throw statusError('Internal', `stored rules of entity profile ${row.id} are malformed`, parsed.error);
  }
  return parsed.data;
}

function assembleProfile(row: ProfileRow, entityRows: EntityProfileRow[]): Profile {
  const profile: Profile = {
    id: row.id,
    projectId: row.projectId,
    providerName: row.providerName,
    name: row.name,
    displayName: row.displayName || row.name,
    labels: row.labels,
    remediate: effectiveRemediate(row.remediate),
    alert: effectiveAlert(row.alert),
    repository: [],
    artifact: [],
    buildEnvironment: [],
    pullRequest: [],
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
  for (const entityRow of entityRows) {
    profile[ENTITY_KINDS[entityRow.entity].profileField] = parseStoredRules(entityRow);
  }
  return profile;
}
