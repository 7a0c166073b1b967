/**
 * Backward-compatibility check between two versions of a JSON Schema.
 *
 * A new schema is compatible with an old one when every instance the old
 * schema accepts is still accepted by the new one. The check is
 * structural and conservative: it never reports a breaking change as
 * compatible, but it may reject some rewrites that are in fact equivalent.
 */

import { isDeepStrictEqual } from 'util';
import { JsonSchema, isJsonObject } from './json-schema';

type Schema = Record<string, unknown>;

const LOWER_BOUNDS = ['minimum', 'exclusiveMinimum', 'minLength', 'minItems', 'minProperties'] as const;
const UPPER_BOUNDS = ['maximum', 'exclusiveMaximum', 'maxLength', 'maxItems', 'maxProperties'] as const;
const EXACT_KEYWORDS = ['pattern', 'format', 'multipleOf'] as const;
// Keywords whose effect is not compared structurally: adding or changing one is breaking.
const OPAQUE_KEYWORDS = [
  'allOf',
  'anyOf',
  'oneOf',
  'not',
  'if',
  'then',
  'else',
  'dependentRequired',
  'dependentSchemas',
  'dependencies',
  'patternProperties',
  'propertyNames',
  'contains',
  'prefixItems',
  'unevaluatedProperties',
  'unevaluatedItems',
  '$ref',
  '$defs',
  'definitions',
] as const;

/**
 * Returns why replacing `oldSchema` by `newSchema` could reject instances
 * that were valid before, or null when the update is compatible.
 */
export function checkSchemaUpdate(oldSchema: JsonSchema | undefined, newSchema: JsonSchema | undefined): string | null {
  if (newSchema === undefined || isEmpty(newSchema)) return null;
  if (oldSchema === undefined || isEmpty(oldSchema)) {
    if (hasRequired(newSchema)) return 'cannot add required fields to schema';
    return compareOpaque({}, newSchema, '');
  }
  return compareNode(oldSchema, newSchema, '', 'object');
}

function isEmpty(schema: Schema): boolean {
  return Object.keys(schema).length === 0;
}

function hasRequired(schema: Schema): boolean {
  const required = schema.required;
  return Array.isArray(required) && required.length > 0;
}

function at(path: string): string {
  return path === '' ? '' : ` at "${path}"`;
}

function child(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

/** Declared types of a node; null means any type is accepted. */
function typesOf(schema: Schema, implicit: string | null): string[] | null | Error {
  const type = schema.type;
  if (type === undefined) return implicit === null ? null : [implicit];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type) && type.every((t): t is string => typeof t === 'string')) return type;
  return new Error('invalid type field');
}

function typeCovered(oldType: string, newTypes: string[]): boolean {
  return newTypes.includes(oldType) || (oldType === 'integer' && newTypes.includes('number'));
}

function compareNode(oldNode: unknown, newNode: unknown, path: string, implicitType: string | null): string | null {
  if (newNode === true || (isJsonObject(newNode) && Object.keys(newNode).length === 0)) return null;
  if (!isJsonObject(oldNode) || !isJsonObject(newNode)) {
    return isDeepStrictEqual(oldNode, newNode) ? null : `cannot change schema${at(path)}`;
  }

  return (
    compareTypes(oldNode, newNode, path, implicitType) ??
    compareEnum(oldNode, newNode, path) ??
    compareConst(oldNode, newNode, path) ??
    compareRequired(oldNode, newNode, path) ??
    compareProperties(oldNode, newNode, path) ??
    compareAdditionalProperties(oldNode, newNode, path) ??
    compareItems(oldNode, newNode, path) ??
    compareBounds(oldNode, newNode, path) ??
    compareOpaque(oldNode, newNode, path)
  );
}

function compareTypes(oldNode: Schema, newNode: Schema, path: string, implicitType: string | null): string | null {
  const oldTypes = typesOf(oldNode, implicitType);
  const newTypes = typesOf(newNode, implicitType);
  if (oldTypes instanceof Error) return `${oldTypes.message} in old schema${at(path)}`;
  if (newTypes instanceof Error) return `${newTypes.message} in new schema${at(path)}`;
  if (newTypes === null) return null;
  if (oldTypes === null || !oldTypes.every((t) => typeCovered(t, newTypes))) {
    return `cannot change type of schema${at(path)}`;
  }
  return null;
}

function compareEnum(oldNode: Schema, newNode: Schema, path: string): string | null {
  const newValues = newNode.enum;
  const oldValues = oldNode.enum;
  if (!Array.isArray(newValues)) return null;
  if (!Array.isArray(oldValues)) return `cannot restrict schema to enum values${at(path)}`;
  const removed = oldValues.filter((value) => !newValues.some((candidate) => isDeepStrictEqual(value, candidate)));
  if (removed.length > 0) {
    return `cannot remove enum values from schema${at(path)}: ${removed.map((v) => JSON.stringify(v)).join(', ')}`;
  }
  return null;
}

function compareConst(oldNode: Schema, newNode: Schema, path: string): string | null {
  if (!('const' in newNode)) return null;
  if ('const' in oldNode && isDeepStrictEqual(oldNode.const, newNode.const)) return null;
  return `cannot add or change const value${at(path)}`;
}

function compareRequired(oldNode: Schema, newNode: Schema, path: string): string | null {
  const newRequired = newNode.required;
  if (!Array.isArray(newRequired)) return null;
  const oldRequired: unknown[] = Array.isArray(oldNode.required) ? oldNode.required : [];
  const added = newRequired.filter((name) => !oldRequired.includes(name));
  if (added.length > 0) {
    return `cannot add required fields to schema${at(path)}: ${added.join(', ')}`;
  }
  return null;
}

function compareProperties(oldNode: Schema, newNode: Schema, path: string): string | null {
  const oldProps = isJsonObject(oldNode.properties) ? oldNode.properties : {};
  const newProps: Schema = isJsonObject(newNode.properties) ? newNode.properties : {};
  for (const [name, oldProp] of Object.entries(oldProps)) {
    if (!(name in newProps)) {
      return `cannot remove properties from schema${at(path)}: ${name}`;
    }
    const problem = compareNode(oldProp, newProps[name], child(path, name), null);
    if (problem) return problem;
  }
  return null;
}

function compareAdditionalProperties(oldNode: Schema, newNode: Schema, path: string): string | null {
  const oldAdditional = oldNode.additionalProperties;
  const newAdditional = newNode.additionalProperties;
  if (newAdditional === undefined || newAdditional === true) return null;
  if (newAdditional === false) {
    return oldAdditional === false ? null : `cannot disallow additional properties${at(path)}`;
  }
  if (oldAdditional === undefined || oldAdditional === true) {
    return isJsonObject(newAdditional) && Object.keys(newAdditional).length === 0
      ? null
      : `cannot constrain additional properties${at(path)}`;
  }
  if (oldAdditional === false) return null;
  return compareNode(oldAdditional, newAdditional, child(path, '*'), null);
}

function compareItems(oldNode: Schema, newNode: Schema, path: string): string | null {
  const newItems = newNode.items;
  if (newItems === undefined) return null;
  return compareNode(oldNode.items ?? true, newItems, child(path, '[]'), null);
}

function compareBounds(oldNode: Schema, newNode: Schema, path: string): string | null {
  for (const keyword of LOWER_BOUNDS) {
    const next = newNode[keyword];
    if (typeof next !== 'number') continue;
    const prev = oldNode[keyword];
    if (typeof prev !== 'number' || next > prev) return `cannot tighten ${keyword}${at(path)}`;
  }
  for (const keyword of UPPER_BOUNDS) {
    const next = newNode[keyword];
    if (typeof next !== 'number') continue;
    const prev = oldNode[keyword];
    if (typeof prev !== 'number' || next < prev) return `cannot tighten ${keyword}${at(path)}`;
  }
  if (newNode.uniqueItems === true && oldNode.uniqueItems !== true) {
    return `cannot tighten uniqueItems${at(path)}`;
  }
  for (const keyword of EXACT_KEYWORDS) {
    if (newNode[keyword] === undefined) continue;
    if (!isDeepStrictEqual(oldNode[keyword], newNode[keyword])) return `cannot change ${keyword}${at(path)}`;
  }
  return null;
}

function compareOpaque(oldNode: Schema, newNode: Schema, path: string): string | null {
  for (const keyword of OPAQUE_KEYWORDS) {
    if (newNode[keyword] === undefined) continue;
    if (!isDeepStrictEqual(oldNode[keyword], newNode[keyword])) return `cannot add or change ${keyword}${at(path)}`;
  }
  return null;
}
