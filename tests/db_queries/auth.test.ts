import express from 'express';
import request from 'supertest';
import { Auth } from '../../src/db_queries/auth';
import { ValidationError } from '../../src/utils/errors';
import { helpers } from '../../src/utils/helpers';
import { FakeDBClient } from '../utils/fake_db_client';
import { MENTEE_ID } from '../utils/test_data';

const auth = new Auth();
let client: FakeDBClient;

beforeEach(() => {
  client = new FakeDBClient().on(/SELECT password FROM users/, [{ password: helpers.hashPassword('old-password') }]);
});

describe('Change password functionality', () => {
  test('changePasswordFromDB stores the new password and clears the forced change', async () => {
    await auth.changePasswordFromDB(MENTEE_ID, 'old-password', 'new-password', client);

    const updateQuery = client.findQueries(/UPDATE users SET password/)[0];
    expect(updateQuery.text).toContain('must_change_password = false');
    expect(updateQuery.values[1]).toEqual(MENTEE_ID);
    expect(helpers.comparePassword(String(updateQuery.values[0]), 'new-password')).toBeTruthy();
  });

  test('changePasswordFromDB rejects a wrong current password', async () => {
    await expect(auth.changePasswordFromDB(MENTEE_ID, 'wrong-password', 'new-password', client))
      .rejects.toThrow(new ValidationError('The current password is incorrect'));
    expect(client.findQueries(/UPDATE/).length).toEqual(0);
  });

  test('changePasswordFromDB rejects reusing the current password', async () => {
    await expect(auth.changePasswordFromDB(MENTEE_ID, 'old-password', 'old-password', client))
      .rejects.toThrow('The new password must be different from the current one');
  });
});

describe('Sign up functionality', () => {
  test('signUpValidationSchema only allows mentors and mentees to sign up', () => {
    const bodySchema = auth.signUpValidationSchema.bodySchema;

    expect(bodySchema.isValidSync({ email: 'mentee@example.com', password: 'secret1', role: 'Mentee' })).toBeTruthy();
    expect(bodySchema.isValidSync({ email: 'admin@example.com', password: 'secret1', role: 'Admin' })).toBeFalsy();
    expect(bodySchema.isValidSync({ email: 'mentee@example.com', password: '123', role: 'Mentee' })).toBeFalsy();
  });

  test('getTokens returns a signed access token for the user', () => {
    const tokens = auth.getTokens({ id: MENTEE_ID, role: 'Mentee' });

    expect(tokens.userId).toEqual(MENTEE_ID);
    expect(tokens.role).toEqual('Mentee');
    expect(tokens.accessToken.split('.').length).toEqual(3);
  });
});

describe('Access token filter functionality', () => {
  function getApp(): express.Express {
    const app = express();
    app.use(express.json());
    app.use('/api/v1', auth.verifyAccessTokenFilter);
    app.post('/api/v1/login', (req, res) => {
      res.status(200).send({ message: 'Public route' });
    });
    app.put('/api/v1/change_password', auth.changePassword);
    return app;
  }

  test('verifyAccessTokenFilter lets the public routes through without a token', async () => {
    const response = await request(getApp()).post('/api/v1/login').send({});

    expect(response.status).toEqual(200);
    expect(response.body).toEqual({ message: 'Public route' });
  });

  test('verifyAccessTokenFilter does not treat a public route in the query string as public', async () => {
    const response = await request(getApp())
      .put('/api/v1/change_password?next=/login')
      .send({ oldPassword: 'old-password', newPassword: 'new-password' });

    expect(response.status).toEqual(401);
    expect(response.body).toEqual({ message: 'Token is not provided' });
  });

  test('changePassword answers 401 when the request carries no user', async () => {
    const app = express();
    app.use(express.json());
    app.put('/change_password', auth.changePassword);

    const response = await request(app)
      .put('/change_password')
      .send({ oldPassword: 'old-password', newPassword: 'new-password' });

    expect(response.status).toEqual(401);
    expect(response.body).toEqual({ message: 'Token is not provided' });
  });

  test('requireRole and requireOnboarded answer 401 when the request carries no user', async () => {
    const app = express();
    app.get('/admin', auth.requireRole('Admin'), (req, res) => {
      res.status(200).send({});
    });
    app.get('/dashboard', auth.requireOnboarded, (req, res) => {
      res.status(200).send({});
    });

    expect((await request(app).get('/admin')).status).toEqual(401);
    expect((await request(app).get('/dashboard')).status).toEqual(401);
  });
});
