/**
 * Request Validation Module
 *
 * Validates request bodies against JSON schemas using ajv.
 * Invalid bodies raise ValidationError with field-specific details.
 */

import Ajv, { JSONSchemaType, ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { CreateTeamInput, UpdateTeamInput } from '../models/team';
import { CreateHeroInput, UpdateHeroInput } from '../models/hero';
import { ValidationError } from '../models/errors';

// Upper bound of a PostgreSQL INTEGER column
export const MAX_INTEGER = 2147483647;

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

const teamCreateSchema: JSONSchemaType<CreateTeamInput> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    headquarters: { type: 'string', minLength: 1 },
  },
  required: ['name', 'headquarters'],
  additionalProperties: false,
};

// Update schemas are plain schema objects: JSONSchemaType would force the
// optional string fields to accept null, which the columns do not.
const teamUpdateSchema: SchemaObject = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    headquarters: { type: 'string', minLength: 1 },
  },
  additionalProperties: false,
};

const heroCreateSchema: JSONSchemaType<CreateHeroInput> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    secret_name: { type: 'string', minLength: 1 },
    password: { type: 'string', minLength: 1 },
    age: { type: 'integer', minimum: 0, maximum: MAX_INTEGER, nullable: true },
    team_id: { type: 'integer', minimum: 1, maximum: MAX_INTEGER, nullable: true },
  },
  required: ['name', 'secret_name', 'password'],
  additionalProperties: false,
};

const heroUpdateSchema: SchemaObject = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    secret_name: { type: 'string', minLength: 1 },
    password: { type: 'string', minLength: 1 },
    age: { type: 'integer', minimum: 0, maximum: MAX_INTEGER, nullable: true },
    team_id: { type: 'integer', minimum: 1, maximum: MAX_INTEGER, nullable: true },
  },
  additionalProperties: false,
};

const validators = {
  teamCreate: ajv.compile<CreateTeamInput>(teamCreateSchema),
  teamUpdate: ajv.compile<UpdateTeamInput>(teamUpdateSchema),
  heroCreate: ajv.compile<CreateHeroInput>(heroCreateSchema),
  heroUpdate: ajv.compile<UpdateHeroInput>(heroUpdateSchema),
};

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : error.params.missingProperty || error.params.additionalProperty || 'body';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${error.params.limit}`;
    } else if (error.keyword === 'maximum') {
      message = `Must be <= ${error.params.limit}`;
    } else if (error.keyword === 'minLength') {
      message = `Must be at least ${error.params.limit} characters`;
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${error.params.additionalProperty}`;
    }

    details[field] = message;
  }

  return details;
}

function validate<T>(validator: ValidateFunction<T>, body: unknown, message: string): T {
  if (validator(body)) {
    return body;
  }

  throw new ValidationError(message, formatValidationErrors(validator.errors || []));
}

export function validateTeamCreate(body: unknown): CreateTeamInput {
  return validate(validators.teamCreate, body, 'Invalid team');
}

export function validateTeamUpdate(body: unknown): UpdateTeamInput {
  return validate(validators.teamUpdate, body, 'Invalid team update');
}

export function validateHeroCreate(body: unknown): CreateHeroInput {
  return validate(validators.heroCreate, body, 'Invalid hero');
}

export function validateHeroUpdate(body: unknown): UpdateHeroInput {
  return validate(validators.heroUpdate, body, 'Invalid hero update');
}
