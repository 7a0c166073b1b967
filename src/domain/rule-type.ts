/**
 * Rule type domain model.
 *
 * A rule type is a reusable evaluation template: how to ingest data about
 * an entity, how to evaluate it, and optionally how to remediate and alert.
 * Its two JSON-Schema documents describe the shape of a profile's rule
 * definition and of the rule's parameters.
 */

import { JsonSchema } from '../schema/json-schema';
import { parseEntityKind } from './entities';

/** One pipeline stage (ingest, eval, remediate, alert); shape depends on `type`. */
export interface RuleTypeStage {
  type: string;
  [key: string]: unknown;
}

export interface RuleTypeDefinition {
  inEntity: string;
  ruleSchema: JsonSchema;
  paramSchema?: JsonSchema;
  ingest: RuleTypeStage;
  eval: RuleTypeStage;
  remediate?: RuleTypeStage;
  alert?: RuleTypeStage;
}

export enum Severity {
  Unknown = 'unknown',
  Info = 'info',
  Low = 'low',
  Medium = 'medium',
  High = 'high',
  Critical = 'critical',
}

export interface RuleType {
  id: string;
  projectId: string;
  providerId: string;
  providerName: string;
  name: string;
  displayName: string;
  description: string;
  guidance: string;
  severity: Severity;
  definition: RuleTypeDefinition;
  createdAt: string;
  updatedAt: string;
}

/** Caller-supplied rule type, before it becomes a row. */
export interface RuleTypeInput {
  name: string;
  displayName?: string;
  description?: string;
  guidance?: string;
  severity?: Severity;
  def: RuleTypeDefinition;
}

const RESOURCE_NAME_PATTERN = /^[a-zA-Z0-9](?:[-_a-zA-Z0-9]{0,61}[a-zA-Z0-9])?$/;
const DIFF_TYPES = ['', 'dep', 'full'];

/** DNS-label style name shared by rule types and profiles. */
export function isValidResourceName(name: string): boolean {
  return RESOURCE_NAME_PATTERN.test(name);
}

/**
 * Static checks on a rule type that need no store access.
 * Returns a description of the first problem, or null.
 * Schema well-formedness is checked separately by the schema compiler.
 */
export function validateRuleTypeInput(input: RuleTypeInput): string | null {
  if (input.name === '') return 'invalid rule type: rule type name is empty';
  if (!isValidResourceName(input.name)) {
    return `invalid rule type: name "${input.name}" must be alphanumeric, '-' or '_', at most 63 characters`;
  }
  return validateDefinition(input.def);
}

function validateDefinition(def: RuleTypeDefinition): string | null {
  if (parseEntityKind(def.inEntity) === null) {
    return `invalid rule type definition: invalid entity type: ${def.inEntity}`;
  }
  if (def.ingest.type === '') return 'invalid rule type definition: data ingest type is empty';
  if (def.ingest.type === 'diff') {
    const diff = def.ingest.diff;
    if (diff === undefined || diff === null || typeof diff !== 'object') {
      return 'invalid rule type definition: diff ingest is nil';
    }
    const diffType = 'type' in diff ? diff.type : '';
    if (typeof diffType !== 'string' || !DIFF_TYPES.includes(diffType)) {
      return `invalid rule type definition: diffing type is invalid: ${String(diffType)}`;
    }
  }
  if (def.eval.type === '') return 'invalid rule type definition: data eval type is empty';
  return null;
}

export function inEntityChanged(oldDef: RuleTypeDefinition, newDef: RuleTypeDefinition): boolean {
  return parseEntityKind(oldDef.inEntity) !== parseEntityKind(newDef.inEntity);
}
