import User from './user.model';
import { SessionStatusLabel } from './session_status.model';

export default interface Session {
  id?: string;
  mentor?: User;
  mentee?: User;
  mentorshipRequestId?: string | null;
  start?: string;
  end?: string;
  startFormatted?: string;
  endFormatted?: string;
  meetingUrl?: string;
  calendarEventId?: string | null;
  reminderSent?: boolean;
  status?: SessionStatusLabel;
  statusIcon?: string;
}
