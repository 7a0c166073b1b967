import { RuleValidationError } from '../../src/domain/profile';
import { RuleType, Severity } from '../../src/domain/rule-type';
import { SchemaCompileError, compileSchema, validateInstance } from '../../src/schema/json-schema';
import { RuleValidator } from '../../src/schema/rule-validator';

function ruleType(paramSchema?: Record<string, unknown>): RuleType {
  return {
    id: 'rt-1',
    projectId: 'project-1',
    providerId: 'provider-1',
    providerName: 'forge',
    name: 'branch_protection',
    displayName: '',
    description: '',
    guidance: '',
    severity: Severity.Medium,
    definition: {
      inEntity: 'repository',
      ruleSchema: {
        type: 'object',
        properties: { branch: { type: 'string' } },
        required: ['branch'],
      },
      paramSchema,
      ingest: { type: 'rest' },
      eval: { type: 'jq' },
    },
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}

function captured(fn: () => void): RuleValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RuleValidationError) return err;
    throw err;
  }
  throw new Error('expected a RuleValidationError');
}

describe('RuleValidator', () => {
  it('accepts a definition matching the rule schema', () => {
    expect(() => new RuleValidator(ruleType()).validateRuleDef({ branch: 'main' })).not.toThrow();
  });

  it('names the rule type and the failing path', () => {
    const err = captured(() => new RuleValidator(ruleType()).validateRuleDef({ branch: 7 }));
    expect(err.ruleType).toBe('branch_protection');
    expect(err.reason).toBe('/branch: must be string');
  });

  it('reports missing required fields at the root', () => {
    const err = captured(() => new RuleValidator(ruleType()).validateRuleDef({}));
    expect(err.reason).toBe("(root): must have required property 'branch'");
  });

  it('skips parameter checks when the rule type has no parameter schema', () => {
    expect(() => new RuleValidator(ruleType()).validateParams({ anything: true })).not.toThrow();
    expect(() => new RuleValidator(ruleType({})).validateParams(undefined)).not.toThrow();
  });

  it('validates missing parameters as an empty object', () => {
    const validator = new RuleValidator(ruleType({ type: 'object', required: ['approvals'] }));
    const err = captured(() => validator.validateParams(undefined));
    expect(err.reason).toBe("(root): must have required property 'approvals'");
  });
});

describe('compileSchema', () => {
  it('rejects documents that are not JSON Schema', () => {
    expect(() => compileSchema({ type: 'not-a-type' })).toThrow(SchemaCompileError);
  });

  it('joins every problem of an instance', () => {
    const validate = compileSchema({
      type: 'object',
      properties: { a: { type: 'string' }, b: { type: 'integer' } },
    });
    expect(validateInstance(validate, { a: 1, b: 'x' })).toBe('/a: must be string; /b: must be integer');
    expect(validateInstance(validate, { a: 'ok', b: 2 })).toBeNull();
  });
});
