import { readFileSync } from 'fs';
import { join } from 'path';
import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { RailwayConfigDocument } from '../configs/types';
import type { ProjectTokenData } from '../configs/queries';
import type { GithubRelease } from '../configs/update-check';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
addFormats(ajv);

// Schemas live in <package>/schemas, two levels above both src/schemas and dist/schemas.
function loadSchema(name: string): SchemaObject {
  const schemaPath = join(__dirname, '..', '..', 'schemas', `${name}.schema.json`);
  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  return schema;
}

// Compiled on first use
function lazyValidator<T>(name: string): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | undefined;
  return () => {
    compiled ??= ajv.compile<T>(loadSchema(name));
    return compiled;
  };
}

export const validators = {
  config: lazyValidator<RailwayConfigDocument>('config'),
  'project-token': lazyValidator<ProjectTokenData>('project-token'),
  'github-release': lazyValidator<GithubRelease>('github-release'),
};

export type KnownSchema = keyof typeof validators;

export interface ValidationResult {
  valid: boolean;
  errors: Array<{ path: string; message: string }>;
}

export function validate(schema: KnownSchema, data: unknown): ValidationResult {
  const validator: ValidateFunction<unknown> = validators[schema]();
  const valid = validator(data);
  return {
    valid,
    errors: valid
      ? []
      : (validator.errors ?? []).map((e) => ({
          path: e.instancePath || '/',
          message: e.message ?? 'Unknown error',
        })),
  };
}

/**
 * One-line summary of validation errors, e.g. `/user/token: must be string,null`.
 */
export function summarizeErrors(result: ValidationResult): string {
  return result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}
