/**
 * Validates profile rule references against their rule type's schemas.
 */

import { ValidateFunction } from 'ajv';
import { RuleValidationError } from '../domain/profile';
import { RuleType } from '../domain/rule-type';
import { compileSchema, validateInstance } from './json-schema';

export class RuleValidator {
  private readonly ruleSchema: ValidateFunction;
  private readonly paramSchema?: ValidateFunction;

  /** Throws SchemaCompileError when the rule type's schemas do not compile. */
  constructor(private readonly ruleType: RuleType) {
    this.ruleSchema = compileSchema(ruleType.definition.ruleSchema);
    const params = ruleType.definition.paramSchema;
    if (params && Object.keys(params).length > 0) {
      this.paramSchema = compileSchema(params);
    }
  }

  validateRuleDef(def: Record<string, unknown>): void {
    const problem = validateInstance(this.ruleSchema, def);
    if (problem) throw new RuleValidationError(this.ruleType.name, problem);
  }

  /** Missing params are checked as an empty object. */
  validateParams(params: Record<string, unknown> | undefined): void {
    if (!this.paramSchema) return;
    const problem = validateInstance(this.paramSchema, params ?? {});
    if (problem) throw new RuleValidationError(this.ruleType.name, problem);
  }
}
