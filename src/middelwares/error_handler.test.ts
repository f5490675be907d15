import express from 'express';
import multer from 'multer';
import request from 'supertest';
import { errorHandler } from './error_handler';

describe('Error handler', () => {
  test('errorHandler answers an upload over the size limit with 400 and JSON', async () => {
    const app = express();
    app.put('/profile', (req, res, next) => {
      next(new multer.MulterError('LIMIT_FILE_SIZE', 'profileImage'));
    });
    app.use(errorHandler);

    const response = await request(app).put('/profile');

    expect(response.status).toEqual(400);
    expect(response.body).toEqual({ message: 'File too large' });
  });

  test('errorHandler answers unexpected errors with 500', async () => {
    const app = express();
    app.get('/user', (req, res, next) => {
      next(new Error('Connection terminated'));
    });
    app.use(errorHandler);

    const response = await request(app).get('/user');

    expect(response.status).toEqual(500);
    expect(response.body).toEqual({ message: 'Connection terminated' });
  });
});
