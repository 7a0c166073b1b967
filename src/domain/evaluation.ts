/**
 * Rule evaluation status model.
 *
 * Evaluation rows are written by the evaluation engine; this service only
 * reads them for status reporting and deletes them when a rule leaves a
 * profile.
 */

import { EntityKind } from './entities';

export const EVAL_STATUSES = ['success', 'failure', 'error', 'skipped', 'pending'] as const;
export type EvalStatus = (typeof EVAL_STATUSES)[number];

export const REMEDIATION_STATUSES = ['success', 'failure', 'error', 'skipped', 'not_available', 'pending'] as const;
export type RemediationStatus = (typeof REMEDIATION_STATUSES)[number];

/**
 * One evaluation of a rule against an entity. Fields left undefined are
 * not yet known; such rows are incomplete and are not reported.
 */
export interface RuleEvaluationRow {
  id: string;
  profileId: string;
  ruleTypeId: string;
  ruleTypeName: string;
  ruleName: string;
  entity: EntityKind;
  entityId: string;
  repository?: { id: string; owner: string; name: string };
  evalStatus?: EvalStatus;
  evalDetails?: string;
  evalLastUpdated?: string;
  remStatus?: RemediationStatus;
  remDetails?: string;
  remLastUpdated?: string;
}

/** A row whose required status fields are all present. */
export type CompleteEvaluationRow = RuleEvaluationRow &
  Required<Pick<RuleEvaluationRow, 'evalStatus' | 'evalDetails' | 'evalLastUpdated' | 'remStatus' | 'remDetails'>>;

export function isComplete(row: RuleEvaluationRow): row is CompleteEvaluationRow {
  return (
    row.evalStatus !== undefined &&
    row.evalDetails !== undefined &&
    row.evalLastUpdated !== undefined &&
    row.remStatus !== undefined &&
    row.remDetails !== undefined
  );
}

/** Filter on evaluations; an empty filter matches everything. */
export interface EvaluationFilter {
  entityId?: string;
  entity?: EntityKind;
  ruleName?: string;
}

export function matchesFilter(row: RuleEvaluationRow, filter: EvaluationFilter): boolean {
  if (filter.entityId !== undefined && row.entityId !== filter.entityId) return false;
  if (filter.entity !== undefined && row.entity !== filter.entity) return false;
  if (filter.ruleName !== undefined && row.ruleName !== filter.ruleName && row.ruleTypeName !== filter.ruleName) {
    return false;
  }
  return true;
}

const AGGREGATE_ORDER: readonly EvalStatus[] = ['error', 'failure', 'success', 'skipped'];

/** Worst status wins: error, then failure, success, skipped; nothing known is pending. */
export function aggregateStatus(statuses: readonly (EvalStatus | undefined)[]): EvalStatus {
  for (const candidate of AGGREGATE_ORDER) {
    if (statuses.includes(candidate)) return candidate;
  }
  return 'pending';
}

export function needsGuidance(status: EvalStatus): boolean {
  return status === 'failure' || status === 'error';
}
