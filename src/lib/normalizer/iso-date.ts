/**
 * ISO-8601 parsing for seeded date strings
 */

import { isValid, parseISO } from "date-fns";

const DATE_TIME_SEPARATOR_RE = /[T ]/;
const OFFSET_RE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

/**
 * True when the time part carries `Z` or a `±hh[:mm]` offset.
 * Only the text after the separator is checked: a date part such as
 * `2023-05-01` ends in `-01` without being an offset.
 */
function hasOffset(value: string): boolean {
  const separator = DATE_TIME_SEPARATOR_RE.exec(value);
  if (!separator) {
    return false;
  }
  return OFFSET_RE.test(value.slice(separator.index + 1));
}

/**
 * Parse an ISO-8601 date or timestamp.
 *
 * Values without an offset are read as UTC rather than local time, so the
 * same dataset seeds identical instants on every host. Returns `null` for
 * anything date-fns cannot read as a valid date.
 *
 * @example
 * parseIsoDate("2023-05-01T00:00:00") // 2023-05-01T00:00:00.000Z
 * parseIsoDate("20230501T10") // 2023-05-01T10:00:00.000Z
 * parseIsoDate("2023-05-01T02:00:00+02:00") // 2023-05-01T00:00:00.000Z
 * parseIsoDate("not-a-date") // null
 */
export function parseIsoDate(value: string): Date | null {
  let candidate = value;
  if (!hasOffset(value)) {
    // Pin naive values to UTC before parsing; a local parse would fold
    // times that fall in a DST gap
    candidate = DATE_TIME_SEPARATOR_RE.test(value) ? `${value}Z` : `${value}T00:00:00Z`;
  }

  const parsed = parseISO(candidate);
  return isValid(parsed) ? parsed : null;
}
