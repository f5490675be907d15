import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import moment, { type Moment } from 'moment';
import { Conn, DBPool, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import Stats, { AdminDashboardStats, MenteeDashboardStats, MentorDashboardStats } from '../models/dashboard_stats.model';
import { MentorshipRequestStatus, isMentorshipRequestStatus } from '../models/mentorship_request.model';
import { UserRole, isUserRole } from '../models/user.model';

const conn = new Conn();

export class DashboardStats {
  private pool: DBPool;

  constructor(pool: DBPool = conn.pool) {
    this.pool = pool;
    autoBind(this);
  }

  async getDashboardStats(request: Request, response: Response): Promise<void> {
    const client = await this.pool.connect();
    try {
      const { id: userId, role } = helpers.getRequestUser(request);
      await client.query('BEGIN');
      await client.query(constants.READ_ONLY_TRANSACTION);
      let stats: Stats;
      if (role == 'Mentor') {
        stats = await this.getMentorDashboardStatsFromDB(userId, client);
      } else if (role == 'Mentee') {
        stats = await this.getMenteeDashboardStatsFromDB(userId, client);
      } else {
        stats = await this.getAdminDashboardStatsFromDB(client);
      }
      await client.query('COMMIT');
      response.status(200).json(stats);
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
  }

  async getMentorDashboardStatsFromDB(mentorId: string, client: DBQueryClient, now: Moment = moment()): Promise<MentorDashboardStats> {
    const requests = await this.getRequestsByStatus('mentorid', mentorId, client);
    const getSessionsQuery = `SELECT COUNT(*) AS total, COUNT(*) FILTER (WHERE start > $2) AS upcoming
      FROM session WHERE mentorid = $1`;
    const { rows: sessionRows } = await client.query(getSessionsQuery, [mentorId, now.toISOString()]);
    const getAvailabilityQuery = 'SELECT COUNT(*) AS total FROM availability WHERE mentorid = $1';
    const { rows: availabilityRows } = await client.query(getAvailabilityQuery, [mentorId]);
    return {
      role: 'Mentor',
      incomingRequests: requests.PENDING + requests.ACCEPTED + requests.REJECTED,
      pendingRequests: requests.PENDING,
      totalSessions: parseInt(sessionRows[0]?.total ?? '0'),
      upcomingSessions: parseInt(sessionRows[0]?.upcoming ?? '0'),
      availabilitySlots: parseInt(availabilityRows[0]?.total ?? '0')
    };
  }

  async getMenteeDashboardStatsFromDB(menteeId: string, client: DBQueryClient, now: Moment = moment()): Promise<MenteeDashboardStats> {
    const requests = await this.getRequestsByStatus('menteeid', menteeId, client);
    const getSessionsQuery = `SELECT COUNT(*) AS total, COUNT(*) FILTER (WHERE start > $2) AS upcoming
      FROM session WHERE menteeid = $1`;
    const { rows } = await client.query(getSessionsQuery, [menteeId, now.toISOString()]);
    return {
      role: 'Mentee',
      requests: requests,
      totalSessions: parseInt(rows[0]?.total ?? '0'),
      upcomingSessions: parseInt(rows[0]?.upcoming ?? '0')
    };
  }

  async getAdminDashboardStatsFromDB(client: DBQueryClient): Promise<AdminDashboardStats> {
    const users: Record<UserRole, number> = { Admin: 0, Mentor: 0, Mentee: 0 };
    const { rows: userRows } = await client.query('SELECT role, COUNT(*) AS total FROM users GROUP BY role');
    for (const row of userRows) {
      const role: unknown = row.role;
      if (isUserRole(role)) {
        users[role] = parseInt(row.total);
      }
    }
    const requests = await this.getRequestsByStatus(null, null, client);
    const { rows: sessionRows } = await client.query('SELECT COUNT(*) AS total FROM session');
    return {
      role: 'Admin',
      users: users,
      requests: requests,
      totalSessions: parseInt(sessionRows[0]?.total ?? '0')
    };
  }

  async getRequestsByStatus(userColumn: 'mentorid' | 'menteeid' | null, userId: string | null, client: DBQueryClient): Promise<Record<MentorshipRequestStatus, number>> {
    const requests: Record<MentorshipRequestStatus, number> = { PENDING: 0, ACCEPTED: 0, REJECTED: 0 };
    let getRequestsQuery = 'SELECT status, COUNT(*) AS total FROM mentorshiprequest';
    const values: string[] = [];
    if (userColumn && userId) {
      getRequestsQuery += ` WHERE ${userColumn} = $1`;
      values.push(userId);
    }
    getRequestsQuery += ' GROUP BY status';
    const { rows } = await client.query(getRequestsQuery, values);
    for (const row of rows) {
      const status: unknown = row.status;
      if (isMentorshipRequestStatus(status)) {
        requests[status] = parseInt(row.total);
      }
    }
    return requests;
  }
}
