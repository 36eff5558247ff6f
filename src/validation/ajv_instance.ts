/**
 * Ajv validation instance with schema validators
 * Configuration files and the resolved environment must validate before use
 */

import Ajv, { type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { EnvConfig } from '@/core/env';
import type { BenchmarksFile, MacroContextFile, UniverseFile } from '@/core/config';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
});

// Add format validators (email, hostname, date, ...)
addFormats(ajv);

// Lazy-loaded validators
function lazyValidator<T>(schemaName: SchemaName): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;
  return () => {
    if (!compiled) {
      compiled = ajv.compile<T>(loadSchema(schemaName));
    }
    return compiled;
  };
}

const getEnvValidator = lazyValidator<EnvConfig>('env.v1');
const getUniverseValidator = lazyValidator<UniverseFile>('universe.v1');
const getBenchmarksValidator = lazyValidator<BenchmarksFile>('benchmarks.v1');
const getMacroContextValidator = lazyValidator<MacroContextFile>('macro_context.v1');

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateEnv(data: unknown): ValidationResult<EnvConfig> {
  return runValidator(getEnvValidator(), data);
}

export function validateUniverseFile(data: unknown): ValidationResult<UniverseFile> {
  return runValidator(getUniverseValidator(), data);
}

export function validateBenchmarksFile(data: unknown): ValidationResult<BenchmarksFile> {
  return runValidator(getBenchmarksValidator(), data);
}

export function validateMacroContextFile(data: unknown): ValidationResult<MacroContextFile> {
  return runValidator(getMacroContextValidator(), data);
}
