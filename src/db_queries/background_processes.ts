import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import dotenv from 'dotenv';
import { Conn, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import { MentorshipRequests } from './mentorship_requests';
import { Sessions } from './sessions';

const conn = new Conn();
const pool = conn.pool;
dotenv.config();

export class BackgroundProcesses {
  private sessions: Sessions;
  private mentorshipRequests: MentorshipRequests;

  constructor(sessions: Sessions = new Sessions(), mentorshipRequests: MentorshipRequests = new MentorshipRequests()) {
    this.sessions = sessions;
    this.mentorshipRequests = mentorshipRequests;
    autoBind(this);
  }

  async sendSessionReminders(request: Request, response: Response): Promise<void> {
    try {
      const remindersSent = await this.sendSessionRemindersFromDB(pool);
      response.status(200).send({ message: `Session reminders sent: ${remindersSent}` });
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async sendSessionRemindersFromDB(client: DBQueryClient): Promise<number> {
    const withinMinutes = helpers.getEnvNumber('SESSION_REMINDER_MINUTES', constants.SESSION_REMINDER_MINUTES);
    return this.sessions.sendUpcomingSessionRemindersFromDB(withinMinutes, client);
  }

  async expireMentorshipRequests(request: Request, response: Response): Promise<void> {
    try {
      const expired = await this.expireMentorshipRequestsFromDB(pool);
      response.status(200).send({ message: `Mentorship requests expired: ${expired}` });
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async expireMentorshipRequestsFromDB(client: DBQueryClient): Promise<number> {
    const olderThanDays = helpers.getEnvNumber('REQUEST_EXPIRY_DAYS', constants.REQUEST_EXPIRY_DAYS);
    const expired = await this.mentorshipRequests.expirePendingRequestsFromDB(olderThanDays, client);
    if (expired > 0) {
      console.log(`[background] Expired ${expired} pending mentorship requests`);
    }
    return expired;
  }

  // Each job runs on its own; one failing does not stop the other.
  async runScheduledJobs(): Promise<void> {
    try {
      await this.sendSessionRemindersFromDB(pool);
    } catch (error) {
      console.error('[background] Session reminders failed', error);
    }
    try {
      await this.expireMentorshipRequestsFromDB(pool);
    } catch (error) {
      console.error('[background] Request expiry failed', error);
    }
  }
}
