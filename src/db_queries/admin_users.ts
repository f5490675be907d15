import { Request, Response } from 'express';
import autoBind from 'auto-bind';
import * as yup from 'yup';
import { validate as uuidValidate } from 'uuid';
import { Conn, DBQueryClient } from '../db/conn';
import { helpers } from '../utils/helpers';
import { NotFoundError, ValidationError } from '../utils/errors';
import { Auth } from './auth';
import { USER_WITH_PROFILE_COLUMNS, Users } from './users';
import User, { USER_ROLES, UserRole } from '../models/user.model';

const conn = new Conn();
const pool = conn.pool;

export interface TemporaryPasswordResult {
  user: User;
  temporaryPassword: string;
}

export class AdminUsers {
  private auth: Auth;
  private users: Users;

  constructor(auth: Auth = new Auth(), users: Users = new Users()) {
    this.auth = auth;
    this.users = users;
    autoBind(this);
  }

  addUserValidationSchema = {
    bodySchema: yup.object({
      email: yup.string().email('Please enter a valid email address').required('Some values are missing'),
      role: yup.string().oneOf(USER_ROLES, 'Role must be Admin, Mentor or Mentee').required('Some values are missing')
    })
  };

  updateRoleValidationSchema = {
    paramSchema: yup.object({
      id: yup.string().required()
    }),
    bodySchema: yup.object({
      role: yup.string().oneOf(USER_ROLES, 'Role must be Admin, Mentor or Mentee').required('Some values are missing')
    })
  };

  async getUsers(request: Request, response: Response): Promise<void> {
    try {
      const users = await this.getUsersFromDB(pool);
      response.status(200).json(users);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async getUsersFromDB(client: DBQueryClient): Promise<Array<User>> {
    const getUsersQuery = `SELECT ${USER_WITH_PROFILE_COLUMNS}
      FROM users u
      LEFT OUTER JOIN profile p
        ON u.userid = p.userid
      ORDER BY u.created_at DESC`;
    const { rows } = await client.query(getUsersQuery);
    return rows.map(row => this.users.mapUserRow(row));
  }

  async addUser(request: Request, response: Response): Promise<void> {
    const client = await pool.connect();
    try {
      const { email, role } = this.addUserValidationSchema.bodySchema.validateSync(request.body);
      await client.query('BEGIN');
      const result = await this.addUserFromDB(email, role, client);
      await client.query('COMMIT');
      response.status(200).json(result);
    } catch (error) {
      await client.query('ROLLBACK');
      helpers.sendError(response, error);
    } finally {
      client.release();
    }
  }

  async addUserFromDB(email: string, role: UserRole, client: DBQueryClient): Promise<TemporaryPasswordResult> {
    const temporaryPassword = helpers.generateTemporaryPassword();
    const user = await this.auth.addUserFromDB({ email: email, password: temporaryPassword, role: role }, true, client);
    console.log(`[admin] User created: ${user.email} (${role})`);
    return {
      user: user,
      temporaryPassword: temporaryPassword
    };
  }

  async updateUserRole(request: Request, response: Response): Promise<void> {
    const userId = request.params.id;
    try {
      const adminId = helpers.getRequestUser(request).id;
      const { role } = this.updateRoleValidationSchema.bodySchema.validateSync(request.body);
      const user = await this.updateUserRoleFromDB(adminId, userId, role, pool);
      response.status(200).json(user);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async updateUserRoleFromDB(adminId: string, userId: string, role: UserRole, client: DBQueryClient): Promise<User> {
    this.checkUserId(userId);
    if (adminId == userId && role != 'Admin') {
      throw new ValidationError('You cannot change your own role');
    }
    const updateRoleQuery = 'UPDATE users SET role = $1 WHERE userid = $2';
    const { rowCount } = await client.query(updateRoleQuery, [role, userId]);
    if (!rowCount) {
      throw new NotFoundError('User not found');
    }
    return this.users.getUserFromDB(userId, client);
  }

  async resetUserPassword(request: Request, response: Response): Promise<void> {
    const userId = request.params.id;
    try {
      const result = await this.resetUserPasswordFromDB(userId, pool);
      response.status(200).json(result);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async resetUserPasswordFromDB(userId: string, client: DBQueryClient): Promise<TemporaryPasswordResult> {
    this.checkUserId(userId);
    const temporaryPassword = helpers.generateTemporaryPassword();
    const resetPasswordQuery = 'UPDATE users SET password = $1, must_change_password = true WHERE userid = $2';
    const { rowCount } = await client.query(resetPasswordQuery, [helpers.hashPassword(temporaryPassword), userId]);
    if (!rowCount) {
      throw new NotFoundError('User not found');
    }
    const user = await this.users.getUserFromDB(userId, client);
    return {
      user: user,
      temporaryPassword: temporaryPassword
    };
  }

  async deleteUser(request: Request, response: Response): Promise<void> {
    const userId = request.params.id;
    try {
      const adminId = helpers.getRequestUser(request).id;
      await this.deleteUserFromDB(adminId, userId, pool);
      response.status(200).send({ message: 'User deleted' });
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async deleteUserFromDB(adminId: string, userId: string, client: DBQueryClient): Promise<void> {
    this.checkUserId(userId);
    if (adminId == userId) {
      throw new ValidationError('You cannot delete your own account');
    }
    // Profile, availability, requests and sessions go with the user (ON DELETE CASCADE).
    const deleteUserQuery = 'DELETE FROM users WHERE userid = $1';
    const { rowCount } = await client.query(deleteUserQuery, [userId]);
    if (!rowCount) {
      throw new NotFoundError('User not found');
    }
    console.log(`[admin] User deleted: ${userId}`);
  }

  private checkUserId(userId: string): void {
    if (!uuidValidate(userId)) {
      throw new ValidationError('Invalid user id');
    }
  }
}
