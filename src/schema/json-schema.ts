/**
 * JSON Schema compilation and instance validation.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { errorMessage } from '../domain/errors';

/** A JSON-Schema document. */
export type JsonSchema = Record<string, unknown>;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  // Rule type schemas may carry an $id; compiling the same one twice must not clash.
  addUsedSchema: false,
  validateFormats: false,
});

export class SchemaCompileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaCompileError';
  }
}

/**
 * Compile a schema, throwing SchemaCompileError if it is not a well-formed
 * document. The schema does not stay in the ajv cache.
 */
export function compileSchema(schema: JsonSchema): ValidateFunction {
  try {
    if (ajv.validateSchema(schema) !== true) {
      throw new SchemaCompileError(formatErrors(ajv.errors));
    }
    return ajv.compile(schema);
  } catch (err) {
    if (err instanceof SchemaCompileError) throw err;
    throw new SchemaCompileError(errorMessage(err));
  } finally {
    // ajv normalises a string $id on removal; any other $id never reached its cache.
    if (schema.$id === undefined || typeof schema.$id === 'string') ajv.removeSchema(schema);
  }
}

/** Validate an instance; returns a readable description of every problem, or null. */
export function validateInstance(validate: ValidateFunction, instance: unknown): string | null {
  if (validate(instance)) return null;
  return formatErrors(validate.errors);
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'invalid schema';
  return errors
    .map((e) => `${e.instancePath === '' ? '(root)' : e.instancePath}: ${e.message ?? 'is invalid'}`)
    .join('; ');
}
