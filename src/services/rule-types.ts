/**
 * Rule type lifecycle.
 *
 * Updates of a rule type that profiles already instantiate must keep
 * every existing rule definition and parameter set valid, so both schema
 * changes are checked for backward compatibility. Rule types in use
 * cannot be deleted.
 */

import { v4 as uuid } from 'uuid';
import { invalidArgument, notFound, userVisibleError } from '../domain/errors';
import { validateGuidance } from '../domain/guidance';
import { Provider } from '../domain/provider';
import { RuleType, RuleTypeInput, Severity, inEntityChanged, validateRuleTypeInput } from '../domain/rule-type';
import { SchemaCompileError, compileSchema } from '../schema/json-schema';
import { checkSchemaUpdate } from '../schema/schema-update';
import { Store, errIsUniqueViolation, withTransaction } from '../storage/store';

/** Static checks shared by create and update; throws InvalidArgument. */
export function validateRuleTypeForWrite(input: RuleTypeInput): void {
  const problem = validateRuleTypeInput(input);
  if (problem) throw invalidArgument(problem);

  try {
    compileSchema(input.def.ruleSchema);
    if (input.def.paramSchema) compileSchema(input.def.paramSchema);
  } catch (err) {
    if (err instanceof SchemaCompileError) {
      throw invalidArgument(`invalid rule type definition: cannot create json schema: ${err.message}`);
    }
    throw err;
  }

  const guidanceProblem = validateGuidance(input.guidance ?? '');
  if (guidanceProblem) throw invalidArgument(`invalid guidance: ${guidanceProblem}`);
}

export class RuleTypeService {
  constructor(private readonly store: Store) {}

  async createRuleType(
    signal: AbortSignal | undefined,
    projectId: string,
    provider: Provider,
    input: RuleTypeInput,
  ): Promise<RuleType> {
    validateRuleTypeForWrite(input);

    return withTransaction(this.store, signal, async (qtx) => {
      const existing = await qtx.ruleTypes.getByName(projectId, input.name);
      if (existing) throw userVisibleError('AlreadyExists', `rule type ${input.name} already exists`);

      const now = new Date().toISOString();
      try {
        return await qtx.ruleTypes.create({
          id: uuid(),
          projectId,
          providerId: provider.id,
          providerName: provider.name,
          name: input.name,
          displayName: input.displayName ?? '',
          description: input.description ?? '',
          guidance: input.guidance ?? '',
          severity: input.severity ?? Severity.Unknown,
          definition: input.def,
          createdAt: now,
          updatedAt: now,
        });
      } catch (err) {
        if (errIsUniqueViolation(err)) {
          throw userVisibleError('AlreadyExists', `rule type ${input.name} already exists`);
        }
        throw err;
      }
    });
  }

  async updateRuleType(
    signal: AbortSignal | undefined,
    projectId: string,
    provider: Provider,
    input: RuleTypeInput,
  ): Promise<RuleType> {
    validateRuleTypeForWrite(input);

    return withTransaction(this.store, signal, async (qtx) => {
      const existing = await qtx.ruleTypes.getByName(projectId, input.name);
      if (!existing || existing.providerName !== provider.name) {
        throw notFound(`rule type ${input.name} not found`);
      }

      const dependents = await qtx.profiles.listProfilesInstantiatingRuleType(existing.id);
      if (dependents.length > 0) {
        if (inEntityChanged(existing.definition, input.def)) {
          throw userVisibleError(
            'FailedPrecondition',
            `cannot change the entity of rule type ${input.name}: it is used by profiles ${dependents.map((p) => p.name).join(', ')}`,
          );
        }
        const ruleProblem = checkSchemaUpdate(existing.definition.ruleSchema, input.def.ruleSchema);
        if (ruleProblem) throw invalidArgument(`Rule schema update is invalid: ${ruleProblem}`);
        const paramProblem = checkSchemaUpdate(existing.definition.paramSchema, input.def.paramSchema);
        if (paramProblem) throw invalidArgument(`Parameter schema update is invalid: ${paramProblem}`);
      }

      const updated = await qtx.ruleTypes.update(existing.id, {
        displayName: input.displayName ?? existing.displayName,
        description: input.description ?? '',
        guidance: input.guidance ?? '',
        severity: input.severity ?? existing.severity,
        definition: input.def,
      });
      if (!updated) throw notFound(`rule type ${input.name} not found`);
      return updated;
    });
  }

  /** The rule type must belong, through its provider, to the given project. */
  async deleteRuleType(signal: AbortSignal | undefined, projectId: string, id: string): Promise<void> {
    await withTransaction(this.store, signal, async (qtx) => {
      const ruleType = await qtx.ruleTypes.getById(id);
      if (!ruleType) throw notFound('rule type not found');
      const provider = await qtx.providers.getById(ruleType.providerId);
      if (!provider || provider.projectId !== projectId) throw notFound('rule type not found');

      const dependents = await qtx.profiles.listProfilesInstantiatingRuleType(id);
      if (dependents.length > 0) {
        throw userVisibleError(
          'FailedPrecondition',
          `cannot delete: rule type ${id} is used by profiles ${dependents.map((p) => p.name).join(', ')}`,
        );
      }
      await qtx.ruleTypes.delete(id);
    });
  }

  async getRuleTypeByName(projectId: string, providerName: string, name: string): Promise<RuleType> {
    const ruleType = await this.store.ruleTypes.getByName(projectId, name);
    if (!ruleType || ruleType.providerName !== providerName) throw notFound(`rule type ${name} not found`);
    return ruleType;
  }

  async getRuleTypeById(projectId: string, id: string): Promise<RuleType> {
    const ruleType = await this.store.ruleTypes.getById(id);
    if (!ruleType || ruleType.projectId !== projectId) throw notFound('rule type not found');
    return ruleType;
  }

  async listRuleTypes(projectId: string, providerName: string): Promise<RuleType[]> {
    return this.store.ruleTypes.list(projectId, providerName);
  }
}
