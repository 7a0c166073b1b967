/**
 * Profile domain model.
 *
 * A profile binds rule references to entity kinds under one project and
 * provider. It is stored as a top-level row, one entity-profile row per
 * entity kind that has rules, and one rule instantiation per rule.
 */

import { ENTITY_KIND_VALUES, ENTITY_KINDS, EntityKind } from './entities';
import { isValidResourceName } from './rule-type';

export const ACTION_MODES = ['on', 'off', 'dry_run', 'unset'] as const;

export type ActionMode = (typeof ACTION_MODES)[number];

/** A reference to a rule type from inside a profile. */
export interface RuleRef {
  type: string;
  /** Effective name defaults to the rule type name. */
  name?: string;
  params?: Record<string, unknown>;
  def: Record<string, unknown>;
}

/** Per-entity rule lists, keyed the way profiles spell them. */
export interface ProfileRules {
  repository?: RuleRef[];
  artifact?: RuleRef[];
  buildEnvironment?: RuleRef[];
  pullRequest?: RuleRef[];
}

/** A profile as submitted by callers. */
export interface ProfileSpec extends ProfileRules {
  id?: string;
  name: string;
  displayName?: string;
  labels?: string[];
  remediate?: ActionMode;
  alert?: ActionMode;
  /** Only compared against the context on update. */
  projectId?: string;
  providerName?: string;
}

/** Top-level profile row. */
export interface ProfileRow {
  id: string;
  projectId: string;
  providerName: string;
  name: string;
  displayName: string;
  labels: string[];
  remediate: ActionMode;
  alert: ActionMode;
  createdAt: string;
  updatedAt: string;
}

/** One entity kind's rules of a profile; rules are kept as serialised JSON. */
export interface EntityProfileRow {
  id: string;
  profileId: string;
  entity: EntityKind;
  contextualRules: string;
  createdAt: string;
}

/** Links an entity profile to a rule type it uses. */
export interface RuleInstantiation {
  id: string;
  entityProfileId: string;
  ruleTypeId: string;
  ruleName: string;
  createdAt: string;
}

/** A profile as returned to callers. */
export interface Profile extends Required<ProfileRules> {
  id: string;
  projectId: string;
  providerName: string;
  name: string;
  displayName: string;
  labels: string[];
  remediate: ActionMode;
  alert: ActionMode;
  createdAt: string;
  updatedAt: string;
}

/** A rule problem attributed to the rule type it concerns. */
export class RuleValidationError extends Error {
  constructor(
    readonly ruleType: string,
    readonly reason: string,
  ) {
    super(`rule type ${ruleType}: ${reason}`);
    this.name = 'RuleValidationError';
  }
}

export function computeRuleName(rule: RuleRef): string {
  return rule.name && rule.name.length > 0 ? rule.name : rule.type;
}

export function rulesFor(profile: ProfileRules, kind: EntityKind): RuleRef[] {
  return profile[ENTITY_KINDS[kind].profileField] ?? [];
}

/** Read-back value of the remediate setting. */
export function effectiveRemediate(mode: ActionMode | undefined): ActionMode {
  return mode === undefined || mode === 'unset' ? 'off' : mode;
}

/** Read-back value of the alert setting. */
export function effectiveAlert(mode: ActionMode | undefined): ActionMode {
  return mode === undefined || mode === 'unset' ? 'on' : mode;
}

/** Shape checks that need no store access; returns a reason or null. */
export function validateProfileShape(profile: ProfileSpec): string | null {
  if (profile.name === '') return 'profile name cannot be empty';
  if (!isValidResourceName(profile.name)) {
    return `name "${profile.name}" must be alphanumeric, '-' or '_', at most 63 characters`;
  }
  for (const kind of ENTITY_KIND_VALUES) {
    const rules = rulesFor(profile, kind);
    for (let i = 0; i < rules.length; i++) {
      if (rules[i].type === '') return `${kind} rule ${i} is invalid: rule type cannot be empty`;
    }
  }
  return null;
}

/**
 * Rule names within one entity kind:
 * a name may not equal a different rule type present in the list,
 * two unnamed rules of the same type are ambiguous,
 * and explicit names must be unique, including against unnamed rules.
 */
export function validateRuleNames(profile: ProfileRules): RuleValidationError | null {
  for (const kind of ENTITY_KIND_VALUES) {
    const problem = validateRuleNamesForEntity(kind, rulesFor(profile, kind));
    if (problem) return problem;
  }
  return null;
}

function validateRuleNamesForEntity(kind: EntityKind, rules: RuleRef[]): RuleValidationError | null {
  const types = new Set<string>();
  const unnamedTypes = new Set<string>();

  for (const rule of rules) {
    const name = rule.name ?? '';
    types.add(rule.type);
    if (types.has(name) && name !== rule.type) {
      return new RuleValidationError(
        rule.type,
        `rule name '${name}' conflicts with a rule type in entity '${kind}', rule name cannot match other rule types`,
      );
    }
    if (name === '') {
      if (unnamedTypes.has(rule.type)) {
        return new RuleValidationError(
          rule.type,
          `multiple rules with empty name and same type in entity '${kind}', add unique names to rules`,
        );
      }
      unnamedTypes.add(rule.type);
    }
  }

  const namedTypes = new Map<string, string>();
  for (const rule of rules) {
    const name = rule.name ?? '';
    if (name === '') continue;
    const existing = namedTypes.get(name);
    if (existing === rule.type) {
      return new RuleValidationError(
        rule.type,
        `multiple rules of same type with same name '${name}' in entity '${kind}', assign unique names to rules`,
      );
    }
    if (existing !== undefined) {
      return new RuleValidationError(
        rule.type,
        `rule name '${name}' conflicts with rule name of type '${existing}' in entity '${kind}', assign unique names to rules`,
      );
    }
    if (name === rule.type && unnamedTypes.has(rule.type)) {
      return new RuleValidationError(
        rule.type,
        `rule name '${name}' conflicts with default rule name of unnamed rule in entity '${kind}', assign unique names to rules`,
      );
    }
    namedTypes.set(name, rule.type);
  }
  return null;
}
