import axios, { AxiosRequestConfig } from 'axios';
import autoBind from 'auto-bind';
import dotenv from 'dotenv';
import * as yup from 'yup';
import { type Moment } from 'moment';
import { v4 as uuidv4 } from 'uuid';
import { constants } from '../utils/constants';
import { helpers } from '../utils/helpers';
import MeetingEvent from '../models/meeting_event.model';

dotenv.config();

const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
const GOOGLE_CALENDAR_URL = 'https://www.googleapis.com/calendar/v3/calendars';

export interface HttpClient {
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
  delete(url: string, config?: AxiosRequestConfig): Promise<unknown>;
}

export interface MeetingEventParams {
  summary: string;
  description?: string;
  start: Moment;
  end: Moment;
  attendees: string[];
}

const tokenResponseSchema = yup.object({
  access_token: yup.string().required()
});

const eventResponseSchema = yup.object({
  id: yup.string().required(),
  hangoutLink: yup.string(),
  conferenceData: yup.object({
    entryPoints: yup.array(
      yup.object({
        entryPointType: yup.string(),
        uri: yup.string()
      })
    )
  }).default(undefined)
});

/**
 * Creates calendar events with a Google Meet conference attached. Access tokens are minted from
 * the refresh token configured for the service account's calendar.
 */
export class CalendarEvents {
  private http: HttpClient;

  constructor(http: HttpClient = axios) {
    this.http = http;
    autoBind(this);
  }

  async getAccessToken(): Promise<string> {
    const { data } = await this.http.post(GOOGLE_TOKEN_URL, {
      client_id: helpers.getEnv('GOOGLE_CLIENT_ID'),
      client_secret: helpers.getEnv('GOOGLE_CLIENT_SECRET'),
      refresh_token: helpers.getEnv('GOOGLE_REFRESH_TOKEN'),
      grant_type: 'refresh_token'
    });
    return tokenResponseSchema.validateSync(data).access_token;
  }

  getEventsUrl(): string {
    const calendarId = encodeURIComponent(helpers.getEnv('GOOGLE_CALENDAR_ID', 'primary'));
    return `${GOOGLE_CALENDAR_URL}/${calendarId}/events`;
  }

  async createMeetingEvent(params: MeetingEventParams): Promise<MeetingEvent> {
    const accessToken = await this.getAccessToken();
    const body = {
      summary: params.summary,
      description: params.description,
      start: { dateTime: params.start.toISOString(), timeZone: constants.TIME_ZONE },
      end: { dateTime: params.end.toISOString(), timeZone: constants.TIME_ZONE },
      attendees: params.attendees.map(email => ({ email: email })),
      conferenceData: {
        createRequest: {
          requestId: uuidv4(),
          conferenceSolutionKey: { type: 'hangoutsMeet' }
        }
      }
    };
    const { data } = await this.http.post(this.getEventsUrl(), body, {
      params: { conferenceDataVersion: 1, sendUpdates: 'none' },
      headers: { Authorization: `Bearer ${accessToken}` }
    });
    const event = eventResponseSchema.validateSync(data);
    const videoEntryPoint = event.conferenceData?.entryPoints?.find(entryPoint => entryPoint.entryPointType == 'video');
    const meetingUrl = event.hangoutLink || videoEntryPoint?.uri;
    if (!meetingUrl) {
      throw new Error('Calendar event was created without a meeting link');
    }
    return {
      eventId: event.id,
      meetingUrl: meetingUrl
    };
  }

  async deleteMeetingEvent(eventId: string): Promise<void> {
    const accessToken = await this.getAccessToken();
    await this.http.delete(`${this.getEventsUrl()}/${encodeURIComponent(eventId)}`, {
      params: { sendUpdates: 'none' },
      headers: { Authorization: `Bearer ${accessToken}` }
    });
  }
}
