/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the payloads returned by each structured
 * extraction call. A payload that fails its schema counts as a failed section.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { ExtractionStage } from './templates/types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export const SECTION_SCHEMA_FILES: Record<ExtractionStage, string> = {
  basic: 'basic_section.schema.json',
  financial: 'financial_section.schema.json',
  technical: 'technical_section.schema.json',
  scoring: 'scoring_section.schema.json',
  simple: 'simple_fields.schema.json',
};

// Compiled lazily on first use
const validators = new Map<ExtractionStage, ValidateFunction>();

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    `/app/docs/contracts/${schemaName}`,
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return parsed;
}

function getValidator(stage: ExtractionStage): ValidateFunction {
  let validate = validators.get(stage);
  if (!validate) {
    validate = ajv.compile(loadSchema(SECTION_SCHEMA_FILES[stage]));
    validators.set(stage, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate the payload of one structured extraction call against its
 * section schema.
 */
export function validateSection(stage: ExtractionStage, data: unknown): ValidationResult {
  const validate = getValidator(stage);
  const valid = validate(data);

  if (!valid) {
    const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Section payload validation failed', { section: stage, errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
