import moment, { type Moment } from 'moment';
import 'moment-timezone';
import { constants } from './constants';

/**
 * Converts a stored timestamp into the given zone. Structured values are taken as-is; strings must be
 * ISO-8601 (read as UTC when they carry no offset). Returns null for anything that can't be parsed.
 */
export function parseDateTimeSafe(value: unknown, timeZone: string = constants.TIME_ZONE): Moment | null {
  if (moment.isMoment(value)) {
    return value.isValid() ? value.clone().tz(timeZone) : null;
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : moment(value).tz(timeZone);
  }
  if (typeof value === 'string') {
    const parsed = moment.utc(value, moment.ISO_8601, true);
    return parsed.isValid() ? parsed.tz(timeZone) : null;
  }
  return null;
}

export function formatDateTimeSafe(value: unknown, timeZone: string = constants.TIME_ZONE): string {
  const dateTime = parseDateTimeSafe(value, timeZone);
  if (!dateTime) {
    return 'Invalid date';
  }
  return `${dateTime.format(constants.DISPLAY_DATE_TIME_FORMAT)} ${dateTime.zoneAbbr()}`;
}
