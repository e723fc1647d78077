import { ValidationError } from "../services/storeErrors";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function requireBody(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError("Request body must be a JSON object.");
  }
  return value;
}

export function readRequiredString(
  body: Record<string, unknown>,
  field: string,
): string {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing or invalid '${field}' field.`);
  }
  return value.trim();
}

/**
 * Message text (subjects, bodies, template text) is kept exactly as typed;
 * only an all-blank value is rejected.
 */
export function readRequiredText(
  body: Record<string, unknown>,
  field: string,
): string {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing or invalid '${field}' field.`);
  }
  return value;
}

/**
 * undefined when the field is absent or blank.
 */
export function readOptionalText(
  body: Record<string, unknown>,
  field: string,
): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`Field '${field}' must be a string.`);
  }
  return value.trim() === "" ? undefined : value;
}

/**
 * undefined when the field is absent, null when it is null or blank.
 */
export function readOptionalString(
  body: Record<string, unknown>,
  field: string,
): string | null | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value !== "string") {
    throw new ValidationError(`Field '${field}' must be a string.`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

export function readOptionalNumber(
  body: Record<string, unknown>,
  field: string,
  options: { min?: number } = {},
): number | null | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`Field '${field}' must be a number.`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ValidationError(
      `Field '${field}' must be at least ${options.min}.`,
    );
  }
  return value;
}

export function readRequiredNumber(
  body: Record<string, unknown>,
  field: string,
): number {
  const value = readOptionalNumber(body, field);
  if (value === undefined || value === null) {
    throw new ValidationError(`Missing or invalid '${field}' field.`);
  }
  return value;
}

export function readOptionalBoolean(
  body: Record<string, unknown>,
  field: string,
): boolean | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ValidationError(`Field '${field}' must be true or false.`);
  }
  return value;
}

export function readOptionalDate(
  body: Record<string, unknown>,
  field: string,
): string | null | undefined {
  const value = readOptionalString(body, field);
  if (value === undefined || value === null) return value;
  // Date rolls 2026-02-30 over into March; the round trip rejects it.
  const parsed = new Date(`${value}T00:00:00Z`);
  if (
    !ISO_DATE_PATTERN.test(value) ||
    Number.isNaN(parsed.getTime()) ||
    parsed.toISOString().slice(0, 10) !== value
  ) {
    throw new ValidationError(`Field '${field}' must be a YYYY-MM-DD date.`);
  }
  return value;
}

export function readOptionalEnum<T extends string>(
  body: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
): T | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(
      `Field '${field}' must be one of: ${allowed
        .map((candidate) => (candidate === "" ? '""' : candidate))
        .join(", ")}.`,
    );
  }
  return match;
}

/**
 * Like readOptionalEnum, but null clears the field.
 */
export function readNullableEnum<T extends string>(
  body: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
): T | null | undefined {
  if (body[field] === null) return null;
  return readOptionalEnum(body, field, allowed);
}

export function readRequiredEnum<T extends string>(
  body: Record<string, unknown>,
  field: string,
  allowed: readonly T[],
): T {
  const value = readOptionalEnum(body, field, allowed);
  if (value === undefined) {
    throw new ValidationError(`Missing or invalid '${field}' field.`);
  }
  return value;
}

export function parseIdParam(value: string | undefined, name = "id"): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${name} '${value ?? ""}'.`);
  }
  return id;
}

export function readConfirmation(body: unknown): string | null {
  if (!isRecord(body)) return null;
  return typeof body.confirmation === "string" ? body.confirmation : null;
}
