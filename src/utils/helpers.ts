import { Request, Response } from 'express';
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import multer from 'multer';
import dotenv from 'dotenv';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError as SchemaValidationError } from 'yup';
import { constants } from './constants';
import { ForbiddenError, NotFoundError, UnauthorizedError, ValidationError } from './errors';
import User, { RequestUser } from '../models/user.model';

dotenv.config();

export class Helpers {
  getEnv(name: string, fallback?: string): string {
    const value = process.env[name] || fallback;
    if (value === undefined) {
      throw new Error(`Missing environment variable ${name}`);
    }
    return value;
  }

  getEnvNumber(name: string, fallback: number): number {
    const value = parseInt(process.env[name] || '');
    return isNaN(value) ? fallback : value;
  }

  hashPassword(password: string): string {
    return bcrypt.hashSync(password, bcrypt.genSaltSync(constants.PASSWORD_SALT_ROUNDS));
  }

  comparePassword(hashPassword: string, password: string): boolean {
    return bcrypt.compareSync(password, hashPassword);
  }

  isValidEmail(email: string): boolean {
    return /\S+@\S+\.\S+/.test(email);
  }

  isEmptyObject(obj: object): boolean {
    return JSON.stringify(obj) === '{}';
  }

  generateAccessToken(id: string): string {
    return jwt.sign({
      userId: id
    },
      this.getEnv('JWT_SECRET_KEY'), { expiresIn: constants.ACCESS_TOKEN_EXPIRY_SECONDS }
    );
  }

  generateTemporaryPassword(): string {
    return uuidv4().replace(/-/g, '').substring(0, 12);
  }

  getUserDisplayName(user: User | undefined): string {
    const name = user?.profile?.name;
    if (name != null && name.trim() != '') {
      return name.indexOf(' ') > 0 ? name.substring(0, name.indexOf(' ')) : name;
    }
    return user?.email ?? '';
  }

  // Set by the access token filter; missing only on the public routes.
  getRequestUser(request: Request): RequestUser {
    if (!request.user) {
      throw new UnauthorizedError('Token is not provided');
    }
    return request.user;
  }

  getErrorStatus(error: unknown): number {
    if (error instanceof ValidationError || error instanceof SchemaValidationError || error instanceof multer.MulterError) {
      return 400;
    }
    if (error instanceof UnauthorizedError) {
      return 401;
    }
    if (error instanceof ForbiddenError) {
      return 403;
    }
    if (error instanceof NotFoundError) {
      return 404;
    }
    return 500;
  }

  sendError(response: Response, error: unknown): void {
    const status = this.getErrorStatus(error);
    if (status >= 500) {
      console.log(error);
    }
    const message = error instanceof Error ? error.message : 'Unexpected error';
    response.status(status).send({ message: message });
  }
}

export const helpers = new Helpers();
