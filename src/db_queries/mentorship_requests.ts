import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import moment, { type Moment } from 'moment';
import 'moment-timezone';
import pg from 'pg';
import * as yup from 'yup';
import { validate as uuidValidate } from 'uuid';
import { Conn, DBPool, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import { NotFoundError, ValidationError } from '../utils/errors';
import { Users } from './users';
import { SessionCreator, SessionCreatorService } from './session_creator';
import { UsersSendEmails } from './users_send_emails';
import MentorshipRequest from '../models/mentorship_request.model';
import Session from '../models/session.model';
import User from '../models/user.model';

const conn = new Conn();

const MENTORSHIP_REQUEST_COLUMNS = `mr.mentorshiprequestid, mr.status, mr.created_at,
  mr.mentorid, mentor.email AS mentor_email, mentor_profile.name AS mentor_name, mentor_profile.profile_image_url AS mentor_profile_image_url,
  mr.menteeid, mentee.email AS mentee_email, mentee_profile.name AS mentee_name, mentee_profile.bio AS mentee_bio,
  mentee_profile.skills AS mentee_skills, mentee_profile.goals AS mentee_goals, mentee_profile.profile_image_url AS mentee_profile_image_url`;

const MENTORSHIP_REQUEST_JOINS = `JOIN users mentor
    ON mr.mentorid = mentor.userid
  LEFT OUTER JOIN profile mentor_profile
    ON mr.mentorid = mentor_profile.userid
  JOIN users mentee
    ON mr.menteeid = mentee.userid
  LEFT OUTER JOIN profile mentee_profile
    ON mr.menteeid = mentee_profile.userid`;

export type AcceptMentorshipRequestResult =
  | { success: true; message: string; request: MentorshipRequest; session: Session }
  | { success: false; message: string };

export class MentorshipRequests {
  private users: Users;
  private sessionCreator: SessionCreatorService;
  private usersSendEmails: UsersSendEmails;
  private pool: DBPool;

  constructor(
    sessionCreator: SessionCreatorService = new SessionCreator(),
    usersSendEmails: UsersSendEmails = new UsersSendEmails(),
    users: Users = new Users(),
    pool: DBPool = conn.pool
  ) {
    this.sessionCreator = sessionCreator;
    this.usersSendEmails = usersSendEmails;
    this.users = users;
    this.pool = pool;
    autoBind(this);
  }

  sendMentorshipRequestValidationSchema = {
    bodySchema: yup.object({
      mentorId: yup.string().required('Please choose a mentor')
    })
  };

  async getMentorshipRequests(request: Request, response: Response): Promise<void> {
    try {
      const { id: userId, role } = helpers.getRequestUser(request);
      const mentorshipRequests = role == 'Mentor'
        ? await this.getPendingRequestsForMentorFromDB(userId, this.pool)
        : await this.getRequestsForMenteeFromDB(userId, this.pool);
      response.status(200).json(mentorshipRequests);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getPendingRequestsForMentorFromDB(mentorId: string, client: DBQueryClient): Promise<Array<MentorshipRequest>> {
    const getRequestsQuery = `SELECT ${MENTORSHIP_REQUEST_COLUMNS}
      FROM mentorshiprequest mr
      ${MENTORSHIP_REQUEST_JOINS}
      WHERE mr.mentorid = $1 AND mr.status = 'PENDING'
      ORDER BY mr.created_at ASC`;
    const { rows } = await client.query(getRequestsQuery, [mentorId]);
    return rows.map(row => this.mapMentorshipRequestRow(row));
  }

  async getRequestsForMenteeFromDB(menteeId: string, client: DBQueryClient): Promise<Array<MentorshipRequest>> {
    const getRequestsQuery = `SELECT ${MENTORSHIP_REQUEST_COLUMNS}
      FROM mentorshiprequest mr
      ${MENTORSHIP_REQUEST_JOINS}
      WHERE mr.menteeid = $1
      ORDER BY mr.created_at DESC`;
    const { rows } = await client.query(getRequestsQuery, [menteeId]);
    return rows.map(row => this.mapMentorshipRequestRow(row));
  }

  async getMentorshipRequestFromDB(mentorshipRequestId: string, client: DBQueryClient): Promise<MentorshipRequest> {
    if (!uuidValidate(mentorshipRequestId)) {
      throw new ValidationError('Invalid mentorship request id');
    }
    const getRequestQuery = `SELECT ${MENTORSHIP_REQUEST_COLUMNS}
      FROM mentorshiprequest mr
      ${MENTORSHIP_REQUEST_JOINS}
      WHERE mr.mentorshiprequestid = $1`;
    const { rows } = await client.query(getRequestQuery, [mentorshipRequestId]);
    if (!rows[0]) {
      throw new NotFoundError('Mentorship request not found');
    }
    return this.mapMentorshipRequestRow(rows[0]);
  }

  mapMentorshipRequestRow(row: pg.QueryResultRow): MentorshipRequest {
    const mentor: User = {
      id: row.mentorid,
      email: row.mentor_email,
      profile: {
        name: row.mentor_name ?? '',
        profileImageUrl: row.mentor_profile_image_url ?? null
      }
    };
    const mentee: User = {
      id: row.menteeid,
      email: row.mentee_email,
      profile: {
        name: row.mentee_name ?? '',
        bio: row.mentee_bio ?? '',
        skills: row.mentee_skills ?? '',
        goals: row.mentee_goals ?? '',
        profileImageUrl: row.mentee_profile_image_url ?? null
      }
    };
    return {
      id: row.mentorshiprequestid,
      mentor: mentor,
      mentee: mentee,
      status: row.status,
      createdAt: moment.utc(row.created_at).format(constants.DATE_TIME_FORMAT)
    };
  }

  async sendMentorshipRequest(request: Request, response: Response): Promise<void> {
    const client = await this.pool.connect();
    try {
      const menteeId = helpers.getRequestUser(request).id;
      const { mentorId } = this.sendMentorshipRequestValidationSchema.bodySchema.validateSync(request.body);
      await client.query('BEGIN');
      const mentorshipRequest = await this.sendMentorshipRequestFromDB(menteeId, mentorId, client);
      await client.query('COMMIT');
      response.status(200).json(mentorshipRequest);
      if (mentorshipRequest.mentor && mentorshipRequest.mentee) {
        await this.usersSendEmails.sendEmailMentorshipRequest(mentorshipRequest.mentor, mentorshipRequest.mentee);
      }
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
  }

  async sendMentorshipRequestFromDB(menteeId: string, mentorId: string, client: DBQueryClient): Promise<MentorshipRequest> {
    const mentor = await this.users.getUserFromDB(mentorId, client);
    if (mentor.role != 'Mentor') {
      throw new ValidationError('Mentorship requests can only be sent to mentors');
    }
    const getPendingRequestQuery = `SELECT mentorshiprequestid FROM mentorshiprequest
      WHERE menteeid = $1 AND mentorid = $2 AND status = 'PENDING'`;
    const { rows } = await client.query(getPendingRequestQuery, [menteeId, mentorId]);
    if (rows[0]) {
      throw new ValidationError('You already have a pending request with this mentor');
    }
    const insertRequestQuery = `INSERT INTO mentorshiprequest (menteeid, mentorid, status, created_at)
      VALUES ($1, $2, 'PENDING', now())
      RETURNING mentorshiprequestid`;
    const { rows: insertedRows } = await client.query(insertRequestQuery, [menteeId, mentorId]);
    return this.getMentorshipRequestFromDB(insertedRows[0].mentorshiprequestid, client);
  }

  async acceptMentorshipRequest(request: Request, response: Response): Promise<void> {
    const mentorshipRequestId = request.params.id;
    const client = await this.pool.connect();
    let acceptedSession: Session | undefined;
    try {
      const mentorId = helpers.getRequestUser(request).id;
      await client.query('BEGIN');
      const result = await this.acceptMentorshipRequestFromDB(mentorshipRequestId, mentorId, client);
      if (!result.success) {
        await client.query('ROLLBACK');
        response.status(502).send({ message: result.message });
        return ;
      }
      await this.commitAcceptedRequest(result.session, client);
      response.status(200).json(result);
      acceptedSession = result.session;
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
    if (acceptedSession) {
      await this.sessionCreator.sendSessionScheduledEmails(acceptedSession);
    }
  }

  async commitAcceptedRequest(session: Session, client: DBQueryClient): Promise<void> {
    try {
      await client.query('COMMIT');
    } catch (error) {
      await this.cancelSessionMeeting(session);
      throw error;
    }
  }

  // The session row rolls back with the transaction; the calendar event has to be removed by hand.
  async cancelSessionMeeting(session: Session): Promise<void> {
    if (session.calendarEventId) {
      await this.sessionCreator.cancelMeetingEvent(session.calendarEventId);
    }
  }

  /**
   * Books a session starting five minutes from `now` and only then marks the request ACCEPTED. When the
   * session can't be created nothing is updated and the request stays PENDING.
   */
  async acceptMentorshipRequestFromDB(mentorshipRequestId: string, mentorId: string, client: DBQueryClient, now: Moment = moment()): Promise<AcceptMentorshipRequestResult> {
    const mentorshipRequest = await this.getMentorshipRequestForMentorFromDB(mentorshipRequestId, mentorId, client);
    const menteeId = mentorshipRequest.mentee?.id ?? '';
    const start = now.clone().tz(constants.TIME_ZONE).add(constants.SESSION_START_DELAY_MINUTES, 'minutes');
    const end = start.clone().add(constants.SESSION_DURATION_MINUTES, 'minutes');
    const sessionResult = await this.sessionCreator.createSessionWithMeeting(client, mentorId, menteeId, start, end, mentorshipRequestId);
    if (!sessionResult.success || !sessionResult.session) {
      return { success: false, message: sessionResult.message };
    }
    try {
      await this.updateMentorshipRequestStatus(mentorshipRequestId, 'ACCEPTED', client);
    } catch (error) {
      await this.cancelSessionMeeting(sessionResult.session);
      throw error;
    }
    mentorshipRequest.status = 'ACCEPTED';
    return {
      success: true,
      message: 'Request accepted and session booked!',
      request: mentorshipRequest,
      session: sessionResult.session
    };
  }

  async rejectMentorshipRequest(request: Request, response: Response): Promise<void> {
    const mentorshipRequestId = request.params.id;
    const client = await this.pool.connect();
    try {
      const mentorId = helpers.getRequestUser(request).id;
      await client.query('BEGIN');
      const mentorshipRequest = await this.rejectMentorshipRequestFromDB(mentorshipRequestId, mentorId, client);
      await client.query('COMMIT');
      response.status(200).json(mentorshipRequest);
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
  }

  async rejectMentorshipRequestFromDB(mentorshipRequestId: string, mentorId: string, client: DBQueryClient): Promise<MentorshipRequest> {
    const mentorshipRequest = await this.getMentorshipRequestForMentorFromDB(mentorshipRequestId, mentorId, client);
    await this.updateMentorshipRequestStatus(mentorshipRequestId, 'REJECTED', client);
    mentorshipRequest.status = 'REJECTED';
    return mentorshipRequest;
  }

  async getMentorshipRequestForMentorFromDB(mentorshipRequestId: string, mentorId: string, client: DBQueryClient): Promise<MentorshipRequest> {
    const mentorshipRequest = await this.getMentorshipRequestFromDB(mentorshipRequestId, client);
    if (mentorshipRequest.mentor?.id != mentorId) {
      throw new NotFoundError('Mentorship request not found');
    }
    if (mentorshipRequest.status != 'PENDING') {
      throw new ValidationError('Mentorship request is no longer pending');
    }
    return mentorshipRequest;
  }

  // Guarded on PENDING so a retried or concurrent transition can't apply twice.
  async updateMentorshipRequestStatus(mentorshipRequestId: string, status: 'ACCEPTED' | 'REJECTED', client: DBQueryClient): Promise<void> {
    const updateRequestQuery = `UPDATE mentorshiprequest SET status = $1
      WHERE mentorshiprequestid = $2 AND status = 'PENDING'
      RETURNING mentorshiprequestid`;
    const { rows } = await client.query(updateRequestQuery, [status, mentorshipRequestId]);
    if (!rows[0]) {
      throw new ValidationError('Mentorship request is no longer pending');
    }
  }

  async expirePendingRequestsFromDB(olderThanDays: number, client: DBQueryClient): Promise<number> {
    const expireRequestsQuery = `UPDATE mentorshiprequest SET status = 'REJECTED'
      WHERE status = 'PENDING'
        AND created_at < now() - make_interval(days => $1)
      RETURNING mentorshiprequestid`;
    const { rows } = await client.query(expireRequestsQuery, [olderThanDays]);
    return rows.length;
  }
}
