import { Request, Response, NextFunction } from 'express';
import { Schema } from 'yup';
import { helpers } from '../utils/helpers';

export interface RequestSchemas {
  paramSchema?: Schema;
  bodySchema?: Schema;
}

/**
 * Rejects the request with 400 when its params or body don't match. The body is replaced by the
 * schema's output, so handlers see trimmed strings and applied defaults.
 */
export const reqValidator =
  ({ paramSchema, bodySchema }: RequestSchemas) =>
  (req: Request, res: Response, next: NextFunction): void => {
    try {
      if (paramSchema) {
        paramSchema.validateSync(req.params);
      }
      if (bodySchema) {
        req.body = bodySchema.validateSync(req.body ?? {});
      }
      next();
    } catch (error: unknown) {
      helpers.sendError(res, error);
    }
  };
