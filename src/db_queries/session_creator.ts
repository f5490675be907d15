import autoBind from 'auto-bind';
import moment, { type Moment } from 'moment';
import pg from 'pg';
import { DBQueryClient } from '../db/conn';
import { formatDateTimeSafe } from '../utils/datetime';
import { Users } from './users';
import { CalendarEvents } from './calendar_events';
import { UsersSendEmails } from './users_send_emails';
import MeetingEvent from '../models/meeting_event.model';
import Session from '../models/session.model';
import SessionCreationResult from '../models/session_creation_result.model';
import User from '../models/user.model';

export interface SessionCreatorService {
  createSessionWithMeeting(client: DBQueryClient, mentorId: string, menteeId: string, start: Moment, end: Moment, mentorshipRequestId?: string): Promise<SessionCreationResult>;
  sendSessionScheduledEmails(session: Session): Promise<void>;
  cancelMeetingEvent(eventId: string): Promise<void>;
}

export class SessionCreator implements SessionCreatorService {
  private users: Users;
  private calendarEvents: CalendarEvents;
  private usersSendEmails: UsersSendEmails;

  constructor(
    calendarEvents: CalendarEvents = new CalendarEvents(),
    usersSendEmails: UsersSendEmails = new UsersSendEmails(),
    users: Users = new Users()
  ) {
    this.calendarEvents = calendarEvents;
    this.usersSendEmails = usersSendEmails;
    this.users = users;
    autoBind(this);
  }

  /**
   * Books the meeting and stores the session row on the given client. Never throws: any failure comes
   * back as `success: false` with the reason, and a meeting booked before the failure is cancelled.
   */
  async createSessionWithMeeting(client: DBQueryClient, mentorId: string, menteeId: string, start: Moment, end: Moment, mentorshipRequestId?: string): Promise<SessionCreationResult> {
    let meetingEvent: MeetingEvent | undefined;
    try {
      const mentor = await this.users.getUserFromDB(mentorId, client);
      const mentee = await this.users.getUserFromDB(menteeId, client);
      meetingEvent = await this.calendarEvents.createMeetingEvent({
        summary: 'MentorLink mentorship session',
        description: `Mentorship session between ${mentor.email} and ${mentee.email}`,
        start: start,
        end: end,
        attendees: [mentor.email ?? '', mentee.email ?? ''].filter(email => email != '')
      });
      const insertSessionQuery = `INSERT INTO session (mentorid, menteeid, mentorshiprequestid, start, "end", meet_link, calendar_event_id, reminder_sent)
        VALUES ($1, $2, $3, $4, $5, $6, $7, false)
        RETURNING *`;
      const values = [
        mentorId,
        menteeId,
        mentorshipRequestId ?? null,
        start.toISOString(),
        end.toISOString(),
        meetingEvent.meetingUrl,
        meetingEvent.eventId
      ];
      const { rows } = await client.query(insertSessionQuery, values);
      const session = this.mapSessionRow(rows[0], mentor, mentee);
      return {
        success: true,
        message: 'Session booked',
        session: session
      };
    } catch (error) {
      console.error('[session-creator] Failed to create session', error);
      if (meetingEvent) {
        await this.cancelMeetingEvent(meetingEvent.eventId);
      }
      return {
        success: false,
        message: `Failed to create session: ${error instanceof Error ? error.message : String(error)}`
      };
    }
  }

  async cancelMeetingEvent(eventId: string): Promise<void> {
    try {
      await this.calendarEvents.deleteMeetingEvent(eventId);
    } catch (error) {
      console.error(`[session-creator] Failed to cancel calendar event ${eventId}`, error);
    }
  }

  mapSessionRow(row: pg.QueryResultRow, mentor: User, mentee: User): Session {
    return {
      id: row.sessionid,
      mentor: mentor,
      mentee: mentee,
      mentorshipRequestId: row.mentorshiprequestid,
      start: moment.utc(row.start).toISOString(),
      end: moment.utc(row.end).toISOString(),
      startFormatted: formatDateTimeSafe(row.start),
      endFormatted: formatDateTimeSafe(row.end),
      meetingUrl: row.meet_link,
      calendarEventId: row.calendar_event_id,
      reminderSent: row.reminder_sent
    };
  }

  async sendSessionScheduledEmails(session: Session): Promise<void> {
    const results = await this.usersSendEmails.sendEmailSessionScheduled(session);
    if (results.includes(false)) {
      console.error(`[session-creator] Some session emails were not delivered for session ${session.id}`);
    }
  }
}
