import { PharmacyId } from '../../domain-types';
import { WorkflowError } from '../workflow-error';
import { DeclarationDraft } from './declaration-types';

export const DECLARATION_LIMITS = {
  name: 200,
  authorizationCode: 50,
  batchNumber: 100,
  countryOfOrigin: 100,
  // INTEGER column bound
  quantity: 2147483647,
} as const;

const REQUIRED_DECLARATION_FIELDS = ['name', 'authorizationCode', 'batchNumber', 'expirationDate', 'quantity'] as const;

const ISO_DATE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const TRUE_STRINGS = new Set(['true', '1', 'yes']);
const FALSE_STRINGS = new Set(['false', '0', 'no']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ensures the body is an object and every listed field is present and non-null.
 * All missing fields are reported together.
 */
export function validateRequiredFields(data: unknown, fields: readonly string[]): Record<string, unknown> {
  if (!isRecord(data) || Object.keys(data).length === 0) {
    throw WorkflowError.validation('empty_request', 'Request body is required');
  }

  const missing = fields.filter((field) => data[field] === undefined || data[field] === null);
  if (missing.length > 0) {
    throw WorkflowError.validation('missing_required_fields', `Missing required fields: ${missing.join(', ')}`, {
      fields: missing,
    });
  }

  return data;
}

export function validateStringField(
  value: unknown,
  field: string,
  options: { minLength?: number; maxLength?: number } = {}
): string {
  const { minLength = 1, maxLength } = options;

  if (typeof value !== 'string') {
    throw WorkflowError.validation('invalid_string_type', `${field} must be a string`, { field });
  }

  const trimmed = value.trim();
  if (trimmed.length < minLength) {
    throw WorkflowError.validation('string_too_short', `${field} must be at least ${minLength} character(s)`, {
      field,
    });
  }
  if (maxLength !== undefined && trimmed.length > maxLength) {
    throw WorkflowError.validation('string_too_long', `${field} must be at most ${maxLength} character(s)`, {
      field,
    });
  }

  return trimmed;
}

export function validateIntegerField(
  value: unknown,
  field: string,
  options: { min?: number; max?: number } = {}
): number {
  let parsed: number | null = null;

  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    parsed = value;
  } else if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    const candidate = Number.parseInt(value.trim(), 10);
    parsed = Number.isSafeInteger(candidate) ? candidate : null;
  }

  if (parsed === null) {
    throw WorkflowError.validation('invalid_integer_type', `${field} must be an integer`, { field });
  }
  if (options.min !== undefined && parsed < options.min) {
    throw WorkflowError.validation('integer_below_minimum', `${field} must be at least ${options.min}`, { field });
  }
  if (options.max !== undefined && parsed > options.max) {
    throw WorkflowError.validation('integer_above_maximum', `${field} must be at most ${options.max}`, { field });
  }

  return parsed;
}

export function validateUuidField(value: unknown, field: string): string {
  if (typeof value !== 'string' || !UUID_REGEX.test(value.trim())) {
    throw WorkflowError.validation('invalid_uuid', `${field} must be a UUID`, { field });
  }
  return value.trim().toLowerCase();
}

export function validateBooleanField(value: unknown, field: string): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  throw WorkflowError.validation('invalid_boolean_type', `${field} must be a boolean (true/false)`, { field });
}

/**
 * Accepts YYYY-MM-DD or an ISO 8601 date-time. Values without a zone
 * designator are read as UTC.
 */
export function validateDateField(value: unknown, field: string): Date {
  if (typeof value !== 'string') {
    throw WorkflowError.validation('invalid_date_format', `${field} must be a string in ISO format`, { field });
  }

  const invalid = () =>
    WorkflowError.validation('invalid_iso_date_format', `${field} must be in ISO format (YYYY-MM-DD or ISO 8601)`, {
      field,
    });

  const raw = value.trim();
  const match = ISO_DATE_REGEX.exec(raw);
  if (!match) {
    throw invalid();
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (calendarDay.getUTCFullYear() !== year || calendarDay.getUTCMonth() !== month - 1 || calendarDay.getUTCDate() !== day) {
    throw invalid();
  }

  const hasTime = match[4] !== undefined;
  const hasZone = match[7] !== undefined;
  let normalized = raw.replace(' ', 'T');
  if (hasTime && !hasZone) {
    normalized = `${normalized}Z`;
  }

  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    throw invalid();
  }
  return parsed;
}

export function validateDateNotExpired(date: Date, now: Date, field: string = 'expirationDate'): Date {
  if (date.getTime() <= now.getTime()) {
    throw WorkflowError.validation('expired_date', `${field} has already passed. Cannot declare expired items.`, {
      field,
    });
  }
  return date;
}

/**
 * Validates a citizen's declaration payload. Pure: no reads, no writes.
 * Pharmacy existence is checked later, inside the declaring transaction.
 */
export function validateDeclarationInput(input: unknown, now: Date): DeclarationDraft {
  const data = validateRequiredFields(input, REQUIRED_DECLARATION_FIELDS);

  const name = validateStringField(data.name, 'name', { maxLength: DECLARATION_LIMITS.name });
  const authorizationCode = validateStringField(data.authorizationCode, 'authorizationCode', {
    maxLength: DECLARATION_LIMITS.authorizationCode,
  });
  const batchNumber = validateStringField(data.batchNumber, 'batchNumber', {
    maxLength: DECLARATION_LIMITS.batchNumber,
  });
  const expirationDate = validateDateNotExpired(validateDateField(data.expirationDate, 'expirationDate'), now);
  const quantity = validateIntegerField(data.quantity, 'quantity', {
    min: 1,
    max: DECLARATION_LIMITS.quantity,
  });

  const isImported =
    data.isImported === undefined || data.isImported === null ? false : validateBooleanField(data.isImported, 'isImported');

  // Country of origin only carries meaning for imported stock
  let countryOfOrigin: string | null = null;
  if (isImported && data.countryOfOrigin !== undefined && data.countryOfOrigin !== null && data.countryOfOrigin !== '') {
    countryOfOrigin = validateStringField(data.countryOfOrigin, 'countryOfOrigin', {
      maxLength: DECLARATION_LIMITS.countryOfOrigin,
    });
  }

  let pharmacyId: PharmacyId | null = null;
  if (data.pharmacyId !== undefined && data.pharmacyId !== null) {
    pharmacyId = validateUuidField(data.pharmacyId, 'pharmacyId') as PharmacyId;
  }

  return {
    name,
    authorizationCode,
    batchNumber,
    expirationDate,
    quantity,
    isImported,
    countryOfOrigin,
    pharmacyId,
  };
}
