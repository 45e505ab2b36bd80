/**
 * Command Validation Module
 *
 * Validates control command parameters against JSON schemas using ajv.
 * Runs synchronously before any request is built; failures throw
 * ValidationError with field-specific details.
 */

import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import { AddTimeDirection } from '../models/command';
import { ValidationError } from '../models/errors';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
  verbose: true,
});

/**
 * Event id parameters (load_event, start_event)
 */
export interface EventIdParams {
  event_id: string;
}

const eventIdSchema: JSONSchemaType<EventIdParams> = {
  type: 'object',
  properties: {
    event_id: { type: 'string', minLength: 1, pattern: '\\S' },
  },
  required: ['event_id'],
  additionalProperties: false,
};

/**
 * Rundown position parameters
 */
export interface EventIndexParams {
  event_index: number;
}

const eventIndexSchema: JSONSchemaType<EventIndexParams> = {
  type: 'object',
  properties: {
    event_index: { type: 'integer', minimum: 0 },
  },
  required: ['event_index'],
  additionalProperties: false,
};

/**
 * Cue parameters
 */
export interface EventCueParams {
  event_cue: string;
}

const eventCueSchema: JSONSchemaType<EventCueParams> = {
  type: 'object',
  properties: {
    event_cue: { type: 'string', minLength: 1, pattern: '\\S' },
  },
  required: ['event_cue'],
  additionalProperties: false,
};

/**
 * Add time parameters; time is signed milliseconds
 */
export interface AddTimeParams {
  time: number;
  direction: AddTimeDirection;
}

const addTimeSchema: JSONSchemaType<AddTimeParams> = {
  type: 'object',
  properties: {
    time: { type: 'integer' },
    direction: { type: 'string', enum: Object.values(AddTimeDirection) },
  },
  required: ['time', 'direction'],
  additionalProperties: false,
};

const validators = {
  eventId: ajv.compile(eventIdSchema),
  eventIndex: ajv.compile(eventIndexSchema),
  eventCue: ajv.compile(eventCueSchema),
  addTime: ajv.compile(addTimeSchema),
};

/**
 * Format ajv validation errors into field-specific error details
 */
function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : String(error.params.missingProperty ?? 'params');

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}, received ${typeof error.data}`;
    } else if (error.keyword === 'enum') {
      message = `Must be one of: ${Object.values(AddTimeDirection).join(', ')}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${error.params.limit}`;
    } else if (error.keyword === 'minLength' || error.keyword === 'pattern') {
      message = 'Must not be empty';
    }

    // Keep the first (most specific) message per field
    if (!details[field]) {
      details[field] = message;
    }
  }

  return details;
}

function check<T>(
  validator: ValidateFunction<T>,
  params: unknown,
  message: string
): T {
  if (validator(params)) {
    return params;
  }
  throw new ValidationError(message, formatValidationErrors(validator.errors ?? []));
}

export function validateEventId(eventId: unknown): EventIdParams {
  return check(validators.eventId, { event_id: eventId }, 'Invalid event id');
}

export function validateEventIndex(index: unknown): EventIndexParams {
  return check(validators.eventIndex, { event_index: index }, 'Invalid event index');
}

export function validateEventCue(cue: unknown): EventCueParams {
  return check(validators.eventCue, { event_cue: cue }, 'Invalid event cue');
}

/**
 * Validate add-time parameters
 *
 * @throws ValidationError if time is not a non-zero integer or direction is
 *   not one of both, start, duration, end
 */
export function validateAddTime(time: unknown, direction: unknown): AddTimeParams {
  const params = check(validators.addTime, { time, direction }, 'Invalid add time parameters');
  if (params.time === 0) {
    throw new ValidationError('Invalid add time parameters', { time: 'Must not be zero' });
  }
  return params;
}

