/**
 * Request body helpers shared by the settings and sequence validators
 */

import { ValidationError } from "./errors";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(
  input: Record<string, unknown>,
  field: string,
): string {
  const value = input[field];
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`, field);
  }
  return value.trim();
}

/**
 * Integer field within [min, max]; max defaults to unbounded
 */
export function readInteger(
  input: Record<string, unknown>,
  field: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const value = input[field];
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    const range =
      max === Number.MAX_SAFE_INTEGER
        ? `>= ${min}`
        : `between ${min} and ${max}`;
    throw new ValidationError(`${field} must be an integer ${range}`, field);
  }
  return value;
}
