import AjvModule, { type ErrorObject, type JSONSchemaType, type ValidateFunction } from 'ajv';
import { SOURCE_TYPES, type CaseRecord } from '../records/types.js';

/**
 * JSON Schema validation for rows read back from the record store
 */

// ajv ships CommonJS; under ESM the class sits on the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow additional properties
});

const RECORD_ROW_SCHEMA: JSONSchemaType<CaseRecord> = {
  type: 'object',
  properties: {
    supreme_case_number: { type: 'string' },
    supreme_case_link: { type: 'string' },
    appeals_case_number: { type: 'string' },
    appeals_case_link: { type: 'string' },
    source_type: { type: 'string', enum: [...SOURCE_TYPES] },
  },
  required: [
    'supreme_case_number',
    'supreme_case_link',
    'appeals_case_number',
    'appeals_case_link',
    'source_type',
  ],
  additionalProperties: true,
};

const validateRecordRowSchema: ValidateFunction<CaseRecord> = ajv.compile(RECORD_ROW_SCHEMA);

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

export function validateRecordRow(row: unknown): ValidationResult<CaseRecord> {
  if (validateRecordRowSchema(row)) {
    return { valid: true, data: row };
  }
  return {
    valid: false,
    errors: validateRecordRowSchema.errors || undefined,
  };
}

/**
 * One line per ajv error, e.g. "/source_type must be equal to one of the allowed values"
 */
export function formatValidationErrors(errors: ErrorObject[] | undefined): string {
  if (!errors || errors.length === 0) {
    return 'unknown validation error';
  }
  return errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`).join('; ');
}
