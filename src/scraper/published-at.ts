/**
 * Publication timestamp normalization
 *
 * Article pages render `2025.12.15. 오후 1:23`, optionally prefixed with
 * `입력` / `기사입력`. Output is `YYYY-MM-DD HH:MM:SS`; anything that does not
 * fit the template is returned unchanged.
 */

import { DateTime } from 'luxon';

const BOILERPLATE = ['기사입력', '입력'];
const AM_MARKER = '오전';
const PM_MARKER = '오후';

const DATE_TIME_FORMAT = 'yyyy.M.d. H:mm';
const DATE_ONLY_FORMAT = 'yyyy.M.d.';
const CANONICAL_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export function normalizePublishedAt(raw: string): string {
  let text = raw;
  for (const phrase of BOILERPLATE) {
    text = text.split(phrase).join(' ');
  }

  const isPm = text.includes(PM_MARKER);
  const isAm = text.includes(AM_MARKER);
  if (isPm && isAm) {
    return raw;
  }

  text = text.replace(PM_MARKER, ' ').replace(AM_MARKER, ' ').replace(/\s+/g, ' ').trim();

  const withTime = DateTime.fromFormat(text, DATE_TIME_FORMAT, { zone: 'utc' });
  if (withTime.isValid) {
    const hour = toTwentyFourHour(withTime.hour, isAm, isPm);
    if (hour === null) {
      return raw;
    }
    return withTime.set({ hour }).toFormat(CANONICAL_FORMAT);
  }

  const dateOnly = DateTime.fromFormat(text, DATE_ONLY_FORMAT, { zone: 'utc' });
  if (dateOnly.isValid && !isAm && !isPm) {
    return dateOnly.toFormat(CANONICAL_FORMAT);
  }

  return raw;
}

function toTwentyFourHour(hour: number, isAm: boolean, isPm: boolean): number | null {
  if (!isAm && !isPm) {
    return hour;
  }
  // 12-hour clock with a marker
  if (hour < 1 || hour > 12) {
    return null;
  }
  if (isPm) {
    return hour === 12 ? 12 : hour + 12;
  }
  return hour === 12 ? 0 : hour;
}

export function isCanonicalTimestamp(value: string): boolean {
  return DateTime.fromFormat(value, CANONICAL_FORMAT, { zone: 'utc' }).isValid;
}
