import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import pg from 'pg';
import dotenv from 'dotenv';
import autoBind from 'auto-bind';
import * as yup from 'yup';
import { v4 as uuidv4 } from 'uuid';
import { Conn, DBQueryClient } from '../db/conn';
import { helpers } from '../utils/helpers';
import { ValidationError } from '../utils/errors';
import { Users } from './users';
import Tokens from '../models/tokens.model';
import User, { UserRole } from '../models/user.model';

const conn: Conn = new Conn();
const pool = conn.pool;
const users: Users = new Users();
dotenv.config();

const PUBLIC_ROUTES = ['/signup', '/login'];

const tokenSchema = yup.object({
  userId: yup.string().required()
});

export class Auth {
  constructor() {
    autoBind(this);
  }

  signUpValidationSchema = {
    bodySchema: yup.object({
      email: yup.string().email('Please enter a valid email address').required('Some values are missing'),
      password: yup.string().min(6, 'Password must be at least 6 characters').required('Some values are missing'),
      role: yup.string().oneOf(['Mentor', 'Mentee'], 'Role must be Mentor or Mentee').required('Some values are missing')
    })
  };

  loginValidationSchema = {
    bodySchema: yup.object({
      email: yup.string().required('Some values are missing'),
      password: yup.string().required('Some values are missing')
    })
  };

  changePasswordValidationSchema = {
    bodySchema: yup.object({
      oldPassword: yup.string().required('Some values are missing'),
      newPassword: yup.string().min(6, 'Password must be at least 6 characters').required('Some values are missing')
    })
  };

  async signUp(request: Request, response: Response): Promise<void> {
    try {
      const { email, password, role } = this.signUpValidationSchema.bodySchema.validateSync(request.body);
      const user = await this.addUserFromDB({ email: email, password: password, role: role }, false, pool);
      const tokens = this.getTokens(user);
      response.status(200).send(tokens);
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async addUserFromDB(user: User, mustChangePassword: boolean, client: DBQueryClient): Promise<User> {
    const email = user.email ?? '';
    const password = user.password ?? '';
    if (!helpers.isValidEmail(email)) {
      throw new ValidationError('Please enter a valid email address');
    }
    const existingUser = await users.getUserByEmailFromDB(email, client);
    if (existingUser) {
      throw new ValidationError('User already exists.');
    }
    const createUserQuery = `INSERT INTO
      users (userid, email, password, role, must_change_password, profile_completed, created_at)
      VALUES ($1, $2, $3, $4, $5, false, now())
      RETURNING userid, email, role, must_change_password, profile_completed, created_at`;
    const values = [
      uuidv4(),
      email.toLowerCase(),
      helpers.hashPassword(password),
      user.role,
      mustChangePassword
    ];
    const { rows } = await client.query(createUserQuery, values);
    return users.mapUserRow(rows[0]);
  }

  async login(request: Request, response: Response): Promise<void> {
    try {
      const { email, password } = this.loginValidationSchema.bodySchema.validateSync(request.body);
      const row = await users.getUserByEmailFromDB(email, pool);
      if (!row || !helpers.comparePassword(row.password, password)) {
        response.status(400).send({'message': 'The credentials you provided are incorrect'});
        return ;
      }
      response.status(200).send(this.getTokens(users.mapUserRow(row)));
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  getTokens(user: User): Tokens {
    const userId = user.id ?? '';
    return {
      userId: userId,
      role: user.role ?? 'Mentee',
      accessToken: helpers.generateAccessToken(userId)
    };
  }

  async changePassword(request: Request, response: Response): Promise<void> {
    try {
      const userId = helpers.getRequestUser(request).id;
      const { oldPassword, newPassword } = this.changePasswordValidationSchema.bodySchema.validateSync(request.body);
      await this.changePasswordFromDB(userId, oldPassword, newPassword, pool);
      response.status(200).send({'message': 'Password changed successfully'});
    } catch (error) {
      helpers.sendError(response, error);
    }
  }

  async changePasswordFromDB(userId: string, oldPassword: string, newPassword: string, client: DBQueryClient): Promise<void> {
    const getPasswordQuery = 'SELECT password FROM users WHERE userid = $1';
    const { rows } = await client.query(getPasswordQuery, [userId]);
    if (!rows[0] || !helpers.comparePassword(rows[0].password, oldPassword)) {
      throw new ValidationError('The current password is incorrect');
    }
    if (oldPassword == newPassword) {
      throw new ValidationError('The new password must be different from the current one');
    }
    const updatePasswordQuery = 'UPDATE users SET password = $1, must_change_password = false WHERE userid = $2';
    await client.query(updatePasswordQuery, [helpers.hashPassword(newPassword), userId]);
  }

  // Mounted under /api/v1, so `request.path` is relative to it and carries no query string.
  verifyAccessTokenFilter(request: Request, response: Response, next: NextFunction): void {
    if (PUBLIC_ROUTES.includes(request.path)) {
      next();
      return ;
    }
    this.verifyAccessToken(request, response, next).catch(next);
  }

  async verifyAccessToken(request: Request, response: Response, next: NextFunction): Promise<void> {
    if (!request.headers.authorization) {
      response.status(401).send({'message': 'Token is not provided'});
      return ;
    }
    const token: string = request.headers.authorization.replace('Bearer ','');
    if (!token) {
      response.status(401).send({'message': 'Token is not provided'});
      return ;
    }
    try {
      const decoded = tokenSchema.validateSync(jwt.verify(token, helpers.getEnv('JWT_SECRET_KEY')));
      const getUsersQuery = 'SELECT userid, role, must_change_password, profile_completed FROM users WHERE userid = $1';
      const { rows }: pg.QueryResult = await pool.query(getUsersQuery, [decoded.userId]);
      if (!rows[0]) {
        response.status(401).send({'message': 'The token you provided is invalid'});
        return ;
      }
      request.user = {
        id: rows[0].userid,
        role: rows[0].role,
        mustChangePassword: rows[0].must_change_password,
        profileCompleted: rows[0].profile_completed
      };
      next();
    } catch (error) {
      response.status(401).send({'message': 'The token you provided is invalid'});
    }
  }

  requireRole(...roles: UserRole[]) {
    return (request: Request, response: Response, next: NextFunction): void => {
      if (!request.user) {
        response.status(401).send({'message': 'Token is not provided'});
        return ;
      }
      if (!roles.includes(request.user.role)) {
        response.status(403).send({'message': `This action requires the ${roles.join(' or ')} role`});
        return ;
      }
      next();
    };
  }

  // Password change comes first, then (for non-admins) a completed profile.
  requireOnboarded(request: Request, response: Response, next: NextFunction): void {
    if (!request.user) {
      response.status(401).send({'message': 'Token is not provided'});
      return ;
    }
    if (request.user.mustChangePassword) {
      response.status(403).send({'message': 'You must change your password before continuing'});
      return ;
    }
    if (request.user.role != 'Admin' && !request.user.profileCompleted) {
      response.status(403).send({'message': 'You must complete your profile before continuing'});
      return ;
    }
    next();
  }

  async setupAdminAccount(): Promise<void> {
    const email = process.env.ADMIN_EMAIL;
    const password = process.env.ADMIN_PASSWORD;
    if (!email || !password) {
      return ;
    }
    const existingAdmin = await users.getUserByEmailFromDB(email, pool);
    if (!existingAdmin) {
      await this.addUserFromDB({ email: email, password: password, role: 'Admin' }, false, pool);
      console.log(`Admin account created: ${email}`);
    }
  }
}
