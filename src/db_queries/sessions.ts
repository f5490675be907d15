import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import moment, { type Moment } from 'moment';
import pg from 'pg';
import { validate as uuidValidate } from 'uuid';
import { Conn, DBQueryClient } from '../db/conn';
import { helpers } from '../utils/helpers';
import { formatDateTimeSafe, parseDateTimeSafe } from '../utils/datetime';
import { classifySession } from '../utils/session_status';
import { NotFoundError, ValidationError } from '../utils/errors';
import { UsersSendEmails } from './users_send_emails';
import Session from '../models/session.model';
import { UserRole } from '../models/user.model';

const conn = new Conn();
const pool = conn.pool;

const SESSION_COLUMNS = `s.sessionid, s.mentorid, s.menteeid, s.mentorshiprequestid, s.start, s."end", s.meet_link, s.calendar_event_id, s.reminder_sent,
  mentor.email AS mentor_email, mentor_profile.name AS mentor_name,
  mentee.email AS mentee_email, mentee_profile.name AS mentee_name`;

const SESSION_JOINS = `JOIN users mentor
    ON s.mentorid = mentor.userid
  LEFT OUTER JOIN profile mentor_profile
    ON s.mentorid = mentor_profile.userid
  JOIN users mentee
    ON s.menteeid = mentee.userid
  LEFT OUTER JOIN profile mentee_profile
    ON s.menteeid = mentee_profile.userid`;

export class Sessions {
  private usersSendEmails: UsersSendEmails;

  constructor(usersSendEmails: UsersSendEmails = new UsersSendEmails()) {
    this.usersSendEmails = usersSendEmails;
    autoBind(this);
  }

  async getSessions(request: Request, response: Response): Promise<void> {
    try {
      const { id: userId, role } = helpers.getRequestUser(request);
      const sessions = await this.getSessionsFromDB(userId, role, pool);
      response.status(200).json(sessions);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getSessionsFromDB(userId: string, role: UserRole, client: DBQueryClient, now: Moment = moment()): Promise<Array<Session>> {
    const userColumn = role == 'Mentor' ? 's.mentorid' : 's.menteeid';
    const getSessionsQuery = `SELECT ${SESSION_COLUMNS}
      FROM session s
      ${SESSION_JOINS}
      WHERE ${userColumn} = $1
      ORDER BY s.start DESC`;
    const { rows } = await client.query(getSessionsQuery, [userId]);
    return rows.map(row => this.mapSessionRow(row, now));
  }

  async getSessionFromDB(sessionId: string, client: DBQueryClient, now: Moment = moment()): Promise<Session> {
    if (!uuidValidate(sessionId)) {
      throw new ValidationError('Invalid session id');
    }
    const getSessionQuery = `SELECT ${SESSION_COLUMNS}
      FROM session s
      ${SESSION_JOINS}
      WHERE s.sessionid = $1`;
    const { rows } = await client.query(getSessionQuery, [sessionId]);
    if (!rows[0]) {
      throw new NotFoundError('Session not found');
    }
    return this.mapSessionRow(rows[0], now);
  }

  mapSessionRow(row: pg.QueryResultRow, now: Moment): Session {
    const { status, icon } = classifySession(row.start, row.end, now);
    return {
      id: row.sessionid,
      mentor: {
        id: row.mentorid,
        email: row.mentor_email ?? 'Unknown',
        profile: { name: row.mentor_name ?? '' }
      },
      mentee: {
        id: row.menteeid,
        email: row.mentee_email ?? 'Unknown',
        profile: { name: row.mentee_name ?? '' }
      },
      mentorshipRequestId: row.mentorshiprequestid,
      start: parseDateTimeSafe(row.start)?.toISOString(),
      end: parseDateTimeSafe(row.end)?.toISOString(),
      startFormatted: formatDateTimeSafe(row.start),
      endFormatted: formatDateTimeSafe(row.end),
      meetingUrl: row.meet_link ?? '#',
      calendarEventId: row.calendar_event_id,
      reminderSent: row.reminder_sent,
      status: status,
      statusIcon: icon
    };
  }

  async sendSessionReminder(request: Request, response: Response): Promise<void> {
    const sessionId = request.params.id;
    try {
      const mentorId = helpers.getRequestUser(request).id;
      const isSent = await this.sendSessionReminderFromDB(sessionId, mentorId, pool);
      if (isSent) {
        response.status(200).send({ message: 'Reminder email sent!' });
      } else {
        response.status(502).send({ message: 'Failed to send reminder.' });
      }
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async sendSessionReminderFromDB(sessionId: string, mentorId: string, client: DBQueryClient): Promise<boolean> {
    const session = await this.getSessionFromDB(sessionId, client);
    if (session.mentor?.id != mentorId) {
      throw new NotFoundError('Session not found');
    }
    const isSent = await this.usersSendEmails.sendEmailSessionReminder(session);
    if (isSent) {
      await this.setReminderSent(sessionId, client);
    }
    return isSent;
  }

  async setReminderSent(sessionId: string, client: DBQueryClient): Promise<void> {
    const updateSessionQuery = 'UPDATE session SET reminder_sent = true WHERE sessionid = $1';
    await client.query(updateSessionQuery, [sessionId]);
  }

  /**
   * Sessions booked inside the window are skipped: their participants have just been sent the scheduled email.
   */
  async sendUpcomingSessionRemindersFromDB(withinMinutes: number, client: DBQueryClient, now: Moment = moment()): Promise<number> {
    const getUpcomingSessionsQuery = `SELECT ${SESSION_COLUMNS}
      FROM session s
      ${SESSION_JOINS}
      WHERE s.reminder_sent IS DISTINCT FROM true
        AND s.start > $1
        AND s.start <= $2
        AND s.created_at < s.start - make_interval(mins => $3)`;
    const values = [now.toISOString(), now.clone().add(withinMinutes, 'minutes').toISOString(), withinMinutes];
    const { rows } = await client.query(getUpcomingSessionsQuery, values);
    let remindersSent = 0;
    for (const row of rows) {
      const session = this.mapSessionRow(row, now);
      if (await this.usersSendEmails.sendEmailSessionReminder(session)) {
        await this.setReminderSent(session.id ?? '', client);
        remindersSent++;
      }
    }
    return remindersSent;
  }
}
