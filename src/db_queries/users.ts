import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import moment from 'moment';
import pg from 'pg';
import { validate as uuidValidate } from 'uuid';
import { Conn, DBQueryClient } from '../db/conn';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import { NotFoundError, ValidationError } from '../utils/errors';
import User from '../models/user.model';
import Profile from '../models/profile.model';

const conn = new Conn();
const pool = conn.pool;

export const USER_WITH_PROFILE_COLUMNS = `u.userid, u.email, u.role, u.must_change_password, u.profile_completed, u.created_at,
  p.name, p.bio, p.skills, p.goals, p.profile_image_url`;

export class Users {
  constructor() {
    autoBind(this);
  }

  async getUser(request: Request, response: Response): Promise<void> {
    try {
      const user = await this.getUserFromDB(helpers.getRequestUser(request).id, pool);
      response.status(200).json(user);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getMentors(request: Request, response: Response): Promise<void> {
    try {
      const getMentorsQuery = `SELECT ${USER_WITH_PROFILE_COLUMNS}
        FROM users u
        LEFT OUTER JOIN profile p
          ON u.userid = p.userid
        WHERE u.role = 'Mentor'
        ORDER BY p.name ASC NULLS LAST, u.email ASC`;
      const { rows }: pg.QueryResult = await pool.query(getMentorsQuery);
      response.status(200).json(rows.map(row => this.mapUserRow(row)));
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getUserFromDB(id: string, client: DBQueryClient): Promise<User> {
    if (!uuidValidate(id)) {
      throw new ValidationError('Invalid user id');
    }
    const getUserQuery = `SELECT ${USER_WITH_PROFILE_COLUMNS}
      FROM users u
      LEFT OUTER JOIN profile p
        ON u.userid = p.userid
      WHERE u.userid = $1`;
    const { rows } = await client.query(getUserQuery, [id]);
    if (rows.length === 0) {
      throw new NotFoundError('User not found');
    }
    return this.mapUserRow(rows[0]);
  }

  async getUserByEmailFromDB(email: string, client: DBQueryClient): Promise<pg.QueryResultRow | undefined> {
    const getUserQuery = 'SELECT * FROM users WHERE lower(email) = lower($1)';
    const { rows } = await client.query(getUserQuery, [email]);
    return rows[0];
  }

  mapUserRow(row: pg.QueryResultRow): User {
    const profile: Profile = {
      userId: row.userid,
      name: row.name ?? '',
      bio: row.bio ?? '',
      skills: row.skills ?? '',
      goals: row.goals ?? '',
      profileImageUrl: row.profile_image_url ?? null
    };
    return {
      id: row.userid,
      email: row.email,
      role: row.role,
      mustChangePassword: row.must_change_password,
      profileCompleted: row.profile_completed,
      createdAt: row.created_at != null ? moment.utc(row.created_at).format(constants.DATE_TIME_FORMAT) : undefined,
      profile: profile
    };
  }
}
