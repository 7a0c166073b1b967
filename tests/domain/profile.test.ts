import {
  ProfileSpec,
  computeRuleName,
  effectiveAlert,
  effectiveRemediate,
  rulesFor,
  validateProfileShape,
  validateRuleNames,
} from '../../src/domain/profile';

function profileWith(repository: ProfileSpec['repository']): ProfileSpec {
  return { name: 'baseline', repository };
}

describe('profile rule names', () => {
  it('uses the rule type name when a rule has no name', () => {
    expect(computeRuleName({ type: 'branch_protection', def: {} })).toBe('branch_protection');
    expect(computeRuleName({ type: 'branch_protection', name: '', def: {} })).toBe('branch_protection');
    expect(computeRuleName({ type: 'branch_protection', name: 'main-only', def: {} })).toBe('main-only');
  });

  it('accepts two rules of one type with distinct names', () => {
    const profile = profileWith([
      { type: 'branch_protection', name: 'main', def: {} },
      { type: 'branch_protection', name: 'release', def: {} },
    ]);
    expect(validateRuleNames(profile)).toBeNull();
  });

  it('rejects two unnamed rules of the same type', () => {
    const problem = validateRuleNames(
      profileWith([
        { type: 'secret_scanning', def: {} },
        { type: 'secret_scanning', def: {} },
      ]),
    );
    expect(problem?.ruleType).toBe('secret_scanning');
    expect(problem?.reason).toBe(
      "multiple rules with empty name and same type in entity 'repository', add unique names to rules",
    );
  });

  it('rejects a rule named after another rule type in the list', () => {
    const problem = validateRuleNames(
      profileWith([
        { type: 'secret_scanning', def: {} },
        { type: 'branch_protection', name: 'secret_scanning', def: {} },
      ]),
    );
    expect(problem?.reason).toBe(
      "rule name 'secret_scanning' conflicts with a rule type in entity 'repository', rule name cannot match other rule types",
    );
  });

  it('rejects a name shared by rules of different types', () => {
    const problem = validateRuleNames(
      profileWith([
        { type: 'secret_scanning', name: 'shared', def: {} },
        { type: 'branch_protection', name: 'shared', def: {} },
      ]),
    );
    expect(problem?.reason).toBe(
      "rule name 'shared' conflicts with rule name of type 'secret_scanning' in entity 'repository', assign unique names to rules",
    );
  });

  it('checks each entity kind separately', () => {
    const profile: ProfileSpec = {
      name: 'baseline',
      repository: [{ type: 'secret_scanning', def: {} }],
      artifact: [{ type: 'secret_scanning', def: {} }],
    };
    expect(validateRuleNames(profile)).toBeNull();
  });
});

describe('profile shape', () => {
  it('requires a name', () => {
    expect(validateProfileShape({ name: '' })).toBe('profile name cannot be empty');
  });

  it('rejects names outside the resource name pattern', () => {
    expect(validateProfileShape({ name: 'has space' })).toBe(
      `name "has space" must be alphanumeric, '-' or '_', at most 63 characters`,
    );
  });

  it('reports the position of a rule with no type', () => {
    const spec: ProfileSpec = {
      name: 'baseline',
      pullRequest: [
        { type: 'pr_review', def: {} },
        { type: '', def: {} },
      ],
    };
    expect(validateProfileShape(spec)).toBe('pull_request rule 1 is invalid: rule type cannot be empty');
  });

  it('maps entity kinds to their rule lists', () => {
    const spec: ProfileSpec = { name: 'baseline', buildEnvironment: [{ type: 'runner_pinning', def: {} }] };
    expect(rulesFor(spec, 'build_environment')).toEqual([{ type: 'runner_pinning', def: {} }]);
    expect(rulesFor(spec, 'repository')).toEqual([]);
  });
});

describe('action modes', () => {
  it('reads unset remediation as off and unset alerting as on', () => {
    expect(effectiveRemediate(undefined)).toBe('off');
    expect(effectiveRemediate('unset')).toBe('off');
    expect(effectiveRemediate('dry_run')).toBe('dry_run');
    expect(effectiveAlert(undefined)).toBe('on');
    expect(effectiveAlert('unset')).toBe('on');
    expect(effectiveAlert('off')).toBe('off');
  });
});
