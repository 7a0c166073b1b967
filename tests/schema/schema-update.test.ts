/**
 * Backward-compatibility rules for rule and parameter schema updates.
 */

import { checkSchemaUpdate } from '../../src/schema/schema-update';

const severity = {
  type: 'object',
  properties: {
    severity: { type: 'string', enum: ['low', 'medium', 'high'] },
  },
};

describe('checkSchemaUpdate', () => {
  it('accepts an identical schema', () => {
    expect(checkSchemaUpdate(severity, severity)).toBeNull();
  });

  it('accepts a missing or empty new schema', () => {
    expect(checkSchemaUpdate(severity, undefined)).toBeNull();
    expect(checkSchemaUpdate(severity, {})).toBeNull();
  });

  it('rejects removing an enum value', () => {
    const next = {
      type: 'object',
      properties: { severity: { type: 'string', enum: ['medium', 'high'] } },
    };
    expect(checkSchemaUpdate(severity, next)).toBe('cannot remove enum values from schema at "severity": "low"');
  });

  it('accepts adding an enum value', () => {
    const next = {
      type: 'object',
      properties: { severity: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] } },
    };
    expect(checkSchemaUpdate(severity, next)).toBeNull();
  });

  it('rejects restricting a free field to an enum', () => {
    const old = { type: 'object', properties: { branch: { type: 'string' } } };
    const next = { type: 'object', properties: { branch: { type: 'string', enum: ['main'] } } };
    expect(checkSchemaUpdate(old, next)).toBe('cannot restrict schema to enum values at "branch"');
  });

  it('rejects adding a required property', () => {
    const next = { ...severity, required: ['severity'] };
    expect(checkSchemaUpdate(severity, next)).toBe('cannot add required fields to schema: severity');
  });

  it('rejects required fields on a previously empty schema', () => {
    expect(checkSchemaUpdate({}, { type: 'object', required: ['branch'] })).toBe(
      'cannot add required fields to schema',
    );
    expect(checkSchemaUpdate(undefined, severity)).toBeNull();
  });

  it('rejects removing a property', () => {
    const next = { type: 'object', properties: {} };
    expect(checkSchemaUpdate(severity, next)).toBe('cannot remove properties from schema: severity');
  });

  it('accepts adding an optional property', () => {
    const next = {
      type: 'object',
      properties: { ...severity.properties, branch: { type: 'string' } },
    };
    expect(checkSchemaUpdate(severity, next)).toBeNull();
  });

  it('rejects changing the type of a property', () => {
    const old = { type: 'object', properties: { count: { type: 'string' } } };
    const next = { type: 'object', properties: { count: { type: 'boolean' } } };
    expect(checkSchemaUpdate(old, next)).toBe('cannot change type of schema at "count"');
  });

  it('treats number as a widening of integer', () => {
    const old = { type: 'object', properties: { count: { type: 'integer' } } };
    const next = { type: 'object', properties: { count: { type: 'number' } } };
    expect(checkSchemaUpdate(old, next)).toBeNull();
    expect(checkSchemaUpdate(next, old)).toBe('cannot change type of schema at "count"');
  });

  it('rejects tightening bounds and accepts loosening them', () => {
    const old = { type: 'object', properties: { count: { type: 'integer', minimum: 1, maximum: 10 } } };
    const tighter = { type: 'object', properties: { count: { type: 'integer', minimum: 2, maximum: 10 } } };
    const looser = { type: 'object', properties: { count: { type: 'integer', minimum: 0, maximum: 20 } } };
    expect(checkSchemaUpdate(old, tighter)).toBe('cannot tighten minimum at "count"');
    expect(checkSchemaUpdate(old, looser)).toBeNull();
  });

  it('rejects disallowing additional properties', () => {
    expect(checkSchemaUpdate(severity, { ...severity, additionalProperties: false })).toBe(
      'cannot disallow additional properties',
    );
  });

  it('follows nested objects and array items', () => {
    const old = {
      type: 'object',
      properties: {
        branches: { type: 'array', items: { type: 'object', properties: { name: { type: 'string' } } } },
      },
    };
    const next = {
      type: 'object',
      properties: {
        branches: {
          type: 'array',
          items: { type: 'object', properties: { name: { type: 'string', pattern: '^release-' } } },
        },
      },
    };
    expect(checkSchemaUpdate(old, next)).toBe('cannot change pattern at "branches.[].name"');
  });

  it('rejects required fields added through a combinator', () => {
    const old = { type: 'object', properties: { a: { type: 'string' } } };
    expect(checkSchemaUpdate(old, { ...old, allOf: [{ required: ['a'] }] })).toBe('cannot add or change allOf');
    expect(checkSchemaUpdate({}, { anyOf: [{ required: ['a'] }] })).toBe('cannot add or change anyOf');
  });

  it('rejects conditional and pattern constraints on nested properties', () => {
    const old = {
      type: 'object',
      properties: { labels: { type: 'object' } },
    };
    const next = {
      type: 'object',
      properties: { labels: { type: 'object', propertyNames: { pattern: '^[a-z]+$' } } },
    };
    expect(checkSchemaUpdate(old, next)).toBe('cannot add or change propertyNames at "labels"');
    expect(checkSchemaUpdate(old, { ...old, if: { required: ['labels'] }, then: { required: ['owner'] } })).toBe(
      'cannot add or change if',
    );
  });

  it('accepts combinators that are unchanged or removed', () => {
    const old = { type: 'object', oneOf: [{ required: ['a'] }, { required: ['b'] }] };
    expect(checkSchemaUpdate(old, { type: 'object', oneOf: [{ required: ['a'] }, { required: ['b'] }] })).toBeNull();
    expect(checkSchemaUpdate(old, { type: 'object' })).toBeNull();
  });
});
