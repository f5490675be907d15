import moment, { type Moment } from 'moment';
import 'moment-timezone';
import { constants } from './constants';
import { parseDateTimeSafe } from './datetime';
import SessionStatus from '../models/session_status.model';

export const SESSION_STATUS_ICONS = {
  Invalid: '❌',
  Past: '🟥',
  Ongoing: '🟨',
  Upcoming: '🟩'
} as const;

// Precedence matters: Invalid, then Past, then Ongoing (inclusive bounds), then Upcoming.
export function classifySession(start: unknown, end: unknown, now: Moment = moment()): SessionStatus {
  const startDateTime = parseDateTimeSafe(start);
  const endDateTime = parseDateTimeSafe(end);
  const currentDateTime = now.clone().tz(constants.TIME_ZONE);

  if (!startDateTime || !endDateTime) {
    return { status: 'Invalid', icon: SESSION_STATUS_ICONS.Invalid };
  }
  if (endDateTime.isBefore(currentDateTime)) {
    return { status: 'Past', icon: SESSION_STATUS_ICONS.Past };
  } else if (startDateTime.isSameOrBefore(currentDateTime) && currentDateTime.isSameOrBefore(endDateTime)) {
    return { status: 'Ongoing', icon: SESSION_STATUS_ICONS.Ongoing };
  } else {
    return { status: 'Upcoming', icon: SESSION_STATUS_ICONS.Upcoming };
  }
}
