/**
 * Script Filename Validator
 *
 * Script names look like `<anything>_<YYYY>_<MM>_<DD>_v<N>.sql`. The date token is
 * the first `YYYY_MM_DD` substring; the version token must end the name.
 */

import { IgnoreReasons } from '../../types/DeploymentTypes';
import { DataFormatError } from '../../types/DeploymentErrors';

const DATE_TOKEN = /\d{4}_\d{2}_\d{2}/;
const VERSION_TOKEN = /_v(\d+)\.sql$/;

export type ParsedScriptName =
  | { valid: true; date: Date; version: number }
  | { valid: false; reason: string };

/** Final `/` segment of a path. */
export function scriptNameOf(path: string): string {
  const segments = path.split('/');
  return segments[segments.length - 1];
}

/**
 * Parse a `YYYY_MM_DD` token into a UTC-midnight Date.
 * @throws DataFormatError when the token is not a real calendar date
 */
export function parseScriptDate(token: string): Date {
  const match = /^(\d{4})_(\d{2})_(\d{2})$/.exec(token);
  if (!match) {
    throw new DataFormatError(`Date token must be YYYY_MM_DD: ${token}`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2024_02_30 over to March; a real date round-trips
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new DataFormatError(`Not a calendar date: ${token}`);
  }
  return date;
}

export function extractVersion(scriptName: string): number | undefined {
  const match = VERSION_TOKEN.exec(scriptName);
  if (!match) return undefined;
  const version = Number(match[1]);
  return Number.isSafeInteger(version) ? version : undefined;
}

export function parseScriptName(scriptName: string): ParsedScriptName {
  const dateMatch = DATE_TOKEN.exec(scriptName);
  if (!dateMatch) {
    return { valid: false, reason: IgnoreReasons.NO_DATE };
  }

  const version = extractVersion(scriptName);
  if (version === undefined) {
    return { valid: false, reason: IgnoreReasons.NO_VERSION };
  }

  let date: Date;
  try {
    date = parseScriptDate(dateMatch[0]);
  } catch (error) {
    if (error instanceof DataFormatError) {
      return { valid: false, reason: IgnoreReasons.INVALID_DATE };
    }
    throw error;
  }

  return { valid: true, date, version };
}
