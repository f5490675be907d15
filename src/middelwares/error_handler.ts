import { Request, Response, NextFunction } from 'express';
import { helpers } from '../utils/helpers';

// Last in the chain: turns errors passed to `next` (multer limits, token lookups) into JSON.
export const errorHandler = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(error);
    return;
  }
  helpers.sendError(res, error);
};
