/**
 * src/shared/params/param-bag.ts
 *
 * WHY:
 * - Operations arrive with a loosely typed bag of named inputs
 *   (parsed from model output, typed by hand in tests, ...).
 * - Handlers read fields through the accessors below instead of poking at
 *   raw values, so "field missing" is always an explicit `undefined`.
 *
 * RULES:
 * - Absent keys, `undefined` and blank strings all read as absent.
 * - A present value of the wrong shape is a VALIDATION_ERROR, never a silent absence.
 */

import { AppError } from '../errors/errors';

export type ParamValue = string | number;

export type ParamBag = Readonly<Record<string, ParamValue | undefined>>;

export const EMPTY_PARAMS: ParamBag = Object.freeze({});

const INTEGER_TEXT = /^[+-]?\d+$/;

function rawParam(params: ParamBag, key: string): ParamValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(params, key)) return undefined;
  const value = params[key];
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

/** Text field. Numbers are rejected, not stringified. */
export function optionalString(params: ParamBag, key: string): string | undefined {
  const value = rawParam(params, key);
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw AppError.validationError(`'${key}' must be a string`, { key });
  }
  return value;
}

/**
 * Integer field. Accepts numbers and integer-looking strings ("7", " 7 ").
 */
export function optionalInteger(params: ParamBag, key: string): number | undefined {
  const value = rawParam(params, key);
  if (value === undefined) return undefined;

  let parsed = Number.NaN;
  if (typeof value === 'number') {
    parsed = value;
  } else if (INTEGER_TEXT.test(value.trim())) {
    parsed = Number(value.trim());
  }

  if (!Number.isSafeInteger(parsed)) {
    throw AppError.validationError(`'${key}' must be an integer`, { key });
  }
  return parsed;
}
