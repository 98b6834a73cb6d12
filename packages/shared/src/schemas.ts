/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for extracted arrest records.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { ValidationResult } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

export const ARREST_RECORD_SCHEMA_FILE = 'arrest_record.schema.json';

// Schema loading - lazy loaded on first use
let arrestRecordSchema: SchemaObject | null = null;
let arrestRecordValidator: ValidateFunction | null = null;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (isSchemaObject(parsed)) return parsed;
    logger.warn(`Schema file is not a JSON object: ${schemaPath}`);
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getArrestRecordSchema(): SchemaObject {
  if (!arrestRecordSchema) {
    arrestRecordSchema = loadSchema(ARREST_RECORD_SCHEMA_FILE);
  }
  return arrestRecordSchema;
}

function getArrestRecordValidator(): ValidateFunction {
  if (!arrestRecordValidator) {
    arrestRecordValidator = ajv.compile(getArrestRecordSchema());
  }
  return arrestRecordValidator;
}

/**
 * Validate an ArrestRecord against arrest_record.schema.json
 */
export function validateArrestRecord(data: unknown): ValidationResult {
  const validate = getArrestRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('ArrestRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a list of records; errors are prefixed with the record's index.
 */
export function validateArrestRecords(records: readonly unknown[]): ValidationResult {
  const errors: string[] = [];

  records.forEach((record, index) => {
    const result = validateArrestRecord(record);
    for (const error of result.errors ?? []) {
      errors.push(`[${index}]${error}`);
    }
  });

  return errors.length > 0 ? { valid: false, errors } : { valid: true };
}

export const schemas = {
  get arrestRecord() {
    return getArrestRecordSchema();
  },
};
