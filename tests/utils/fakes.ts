import { type Moment } from 'moment';
import { SendMailOptions } from 'nodemailer';
import { AxiosRequestConfig } from 'axios';
import { DBQueryClient } from '../../src/db/conn';
import { FakeDBClient } from './fake_db_client';
import { HttpClient } from '../../src/db_queries/calendar_events';
import { SessionCreatorService } from '../../src/db_queries/session_creator';
import { MailTransporter } from '../../src/db_queries/users_send_emails';
import Session from '../../src/models/session.model';
import SessionCreationResult from '../../src/models/session_creation_result.model';

export class FakeMailTransporter implements MailTransporter {
  sentEmails: Array<SendMailOptions> = [];
  private shouldFail: boolean;

  constructor(shouldFail = false) {
    this.shouldFail = shouldFail;
  }

  async sendMail(options: SendMailOptions): Promise<unknown> {
    if (this.shouldFail) {
      throw new Error('SMTP connection refused');
    }
    this.sentEmails.push(options);
    return {};
  }
}

export interface SessionCreatorCall {
  mentorId: string;
  menteeId: string;
  start: Moment;
  end: Moment;
  mentorshipRequestId?: string;
}

/**
 * Returns a fixed result. When given the fake client it also records which statements had run by the
 * time the scheduled emails were sent.
 */
export class FakeSessionCreator implements SessionCreatorService {
  calls: Array<SessionCreatorCall> = [];
  emailedSessions: Array<Session> = [];
  statementsBeforeEmails: Array<string> = [];
  cancelledEventIds: Array<string> = [];
  private result: SessionCreationResult;
  private client?: FakeDBClient;

  constructor(result: SessionCreationResult, client?: FakeDBClient) {
    this.result = result;
    this.client = client;
  }

  async createSessionWithMeeting(client: DBQueryClient, mentorId: string, menteeId: string, start: Moment, end: Moment, mentorshipRequestId?: string): Promise<SessionCreationResult> {
    this.calls.push({ mentorId, menteeId, start, end, mentorshipRequestId });
    return this.result;
  }

  async sendSessionScheduledEmails(session: Session): Promise<void> {
    this.emailedSessions.push(session);
    this.statementsBeforeEmails = this.client?.getTransactionStatements() ?? [];
  }

  async cancelMeetingEvent(eventId: string): Promise<void> {
    this.cancelledEventIds.push(eventId);
  }
}

export interface RecordedPost {
  url: string;
  data: unknown;
  config?: AxiosRequestConfig;
}

export interface RecordedDelete {
  url: string;
  config?: AxiosRequestConfig;
}

/**
 * Answers Google's token endpoint with a placeholder token and every other POST with `eventResponse`,
 * or throws `error` when one is given.
 */
export class FakeHttpClient implements HttpClient {
  posts: Array<RecordedPost> = [];
  deletes: Array<RecordedDelete> = [];
  private eventResponse: unknown;
  private error?: Error;

  constructor(eventResponse: unknown, error?: Error) {
    this.eventResponse = eventResponse;
    this.error = error;
  }

  async post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }> {
    this.posts.push({ url: url, data: data, config: config });
    if (this.error) {
      throw this.error;
    }
    if (url.includes('oauth2.googleapis.com')) {
      return { data: { access_token: 'test-token', expires_in: 3599 } };
    }
    return { data: this.eventResponse };
  }

  async delete(url: string, config?: AxiosRequestConfig): Promise<unknown> {
    this.deletes.push({ url: url, config: config });
    return {};
  }
}
