import moment from 'moment';
import 'moment-timezone';
import { CalendarEvents } from '../../src/db_queries/calendar_events';
import { SessionCreator } from '../../src/db_queries/session_creator';
import { Users } from '../../src/db_queries/users';
import { UsersSendEmails } from '../../src/db_queries/users_send_emails';
import { constants } from '../../src/utils/constants';
import { FakeDBClient } from '../utils/fake_db_client';
import { FakeHttpClient, FakeMailTransporter } from '../utils/fakes';
import { MENTEE_ID, MENTOR_ID, REQUEST_ID, SESSION_ID, getUserRow } from '../utils/test_data';

const start = moment.utc('2024-06-01T12:05:00Z').tz(constants.TIME_ZONE);
const end = start.clone().add(30, 'minutes');
let client: FakeDBClient;
let transporter: FakeMailTransporter;

beforeAll(() => {
  process.env.GOOGLE_CLIENT_ID = 'test-client-id';
  process.env.GOOGLE_CLIENT_SECRET = 'test-secret';
  process.env.GOOGLE_REFRESH_TOKEN = 'test-refresh-token';
  delete process.env.GOOGLE_CALENDAR_ID;
});

beforeEach(() => {
  transporter = new FakeMailTransporter();
  client = new FakeDBClient()
    .on(/FROM users u/, values => [
      values[0] == MENTOR_ID
        ? getUserRow(MENTOR_ID, 'mentor@example.com', 'Mentor', 'Grace Hopper')
        : getUserRow(MENTEE_ID, 'mentee@example.com', 'Mentee', 'Alan Turing')
    ])
    .on(/INSERT INTO session/, values => [
      {
        sessionid: SESSION_ID,
        mentorid: values[0],
        menteeid: values[1],
        mentorshiprequestid: values[2],
        start: values[3],
        end: values[4],
        meet_link: values[5],
        calendar_event_id: values[6],
        reminder_sent: false
      }
    ]);
});

function getSessionCreator(http: FakeHttpClient): SessionCreator {
  return new SessionCreator(new CalendarEvents(http), new UsersSendEmails(transporter), new Users());
}

describe('Create session functionality', () => {
  test('createSessionWithMeeting books a Meet event and stores the session', async () => {
    const http = new FakeHttpClient({ id: 'event-1', hangoutLink: 'https://meet.google.com/abc-defg-hij' });
    const sessionCreator = getSessionCreator(http);

    const result = await sessionCreator.createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(result.success).toBeTruthy();
    expect(result.message).toEqual('Session booked');
    expect(client.findQueries(/INSERT INTO session/)[0].values).toEqual([
      MENTOR_ID,
      MENTEE_ID,
      REQUEST_ID,
      '2024-06-01T12:05:00.000Z',
      '2024-06-01T12:35:00.000Z',
      'https://meet.google.com/abc-defg-hij',
      'event-1'
    ]);
    expect(result.session?.meetingUrl).toEqual('https://meet.google.com/abc-defg-hij');
    expect(result.session?.startFormatted).toEqual('Sat, Jun 1 2024 1:05 PM WAT');
    expect(result.session?.endFormatted).toEqual('Sat, Jun 1 2024 1:35 PM WAT');
  });

  test('createSessionWithMeeting sends the event to the calendar with both participants', async () => {
    const http = new FakeHttpClient({ id: 'event-1', hangoutLink: 'https://meet.google.com/abc-defg-hij' });
    const sessionCreator = getSessionCreator(http);

    await sessionCreator.createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(http.posts.length).toEqual(2);
    expect(http.posts[0].url).toEqual('https://oauth2.googleapis.com/token');
    const eventPost = http.posts[1];
    expect(eventPost.url).toEqual('https://www.googleapis.com/calendar/v3/calendars/primary/events');
    expect(eventPost.config?.headers).toEqual({ Authorization: 'Bearer test-token' });
    expect(eventPost.config?.params).toEqual({ conferenceDataVersion: 1, sendUpdates: 'none' });
    expect(eventPost.data).toEqual(expect.objectContaining({
      start: { dateTime: '2024-06-01T12:05:00.000Z', timeZone: 'Africa/Lagos' },
      end: { dateTime: '2024-06-01T12:35:00.000Z', timeZone: 'Africa/Lagos' },
      attendees: [{ email: 'mentor@example.com' }, { email: 'mentee@example.com' }]
    }));
  });

  test('createSessionWithMeeting falls back to the video entry point when there is no hangout link', async () => {
    const http = new FakeHttpClient({
      id: 'event-2',
      conferenceData: {
        entryPoints: [
          { entryPointType: 'phone', uri: 'tel:+1-555-0100' },
          { entryPointType: 'video', uri: 'https://meet.google.com/xyz-abcd-efg' }
        ]
      }
    });

    const result = await getSessionCreator(http).createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end);

    expect(result.session?.meetingUrl).toEqual('https://meet.google.com/xyz-abcd-efg');
    expect(client.findQueries(/INSERT INTO session/)[0].values[2]).toBeNull();
  });

  test('createSessionWithMeeting reports a calendar failure without storing anything', async () => {
    const http = new FakeHttpClient(undefined, new Error('calendar unavailable'));

    const result = await getSessionCreator(http).createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(result).toEqual({ success: false, message: 'Failed to create session: calendar unavailable' });
    expect(client.findQueries(/INSERT/).length).toEqual(0);
  });

  test('createSessionWithMeeting reports an event created without a meeting link', async () => {
    const http = new FakeHttpClient({ id: 'event-3' });

    const result = await getSessionCreator(http).createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(result.success).toBeFalsy();
    expect(result.message).toEqual('Failed to create session: Calendar event was created without a meeting link');
    expect(client.findQueries(/INSERT/).length).toEqual(0);
  });

  test('createSessionWithMeeting cancels the calendar event when the session cannot be stored', async () => {
    client = new FakeDBClient()
      .on(/FROM users u/, [getUserRow(MENTOR_ID, 'mentor@example.com', 'Mentor')])
      .on(/INSERT INTO session/, () => {
        throw new Error('duplicate key value violates unique constraint');
      });
    const http = new FakeHttpClient({ id: 'event-1', hangoutLink: 'https://meet.google.com/abc-defg-hij' });

    const result = await getSessionCreator(http).createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(result).toEqual({ success: false, message: 'Failed to create session: duplicate key value violates unique constraint' });
    expect(http.deletes.length).toEqual(1);
    expect(http.deletes[0].url).toEqual('https://www.googleapis.com/calendar/v3/calendars/primary/events/event-1');
    expect(http.deletes[0].config?.params).toEqual({ sendUpdates: 'none' });
    expect(http.deletes[0].config?.headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  test('createSessionWithMeeting has nothing to cancel when the calendar call fails', async () => {
    const http = new FakeHttpClient(undefined, new Error('calendar unavailable'));

    await getSessionCreator(http).createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    expect(http.deletes.length).toEqual(0);
  });

  test('cancelMeetingEvent logs a failed cancellation instead of throwing', async () => {
    const http = new FakeHttpClient(undefined, new Error('calendar unavailable'));

    await expect(getSessionCreator(http).cancelMeetingEvent('event-1')).resolves.toBeUndefined();
    expect(http.deletes.length).toEqual(0);
  });

  test('sendSessionScheduledEmails emails the mentor and then the mentee', async () => {
    const http = new FakeHttpClient({ id: 'event-1', hangoutLink: 'https://meet.google.com/abc-defg-hij' });
    const sessionCreator = getSessionCreator(http);
    const result = await sessionCreator.createSessionWithMeeting(client, MENTOR_ID, MENTEE_ID, start, end, REQUEST_ID);

    if (result.session) {
      await sessionCreator.sendSessionScheduledEmails(result.session);
    }

    expect(transporter.sentEmails.map(email => email.to)).toEqual(['mentor@example.com', 'mentee@example.com']);
    expect(transporter.sentEmails[0].subject).toEqual('📅 Mentorship Session Scheduled');
    expect(transporter.sentEmails[0].html).toEqual(
      'Hi Grace,<br><br>Your mentorship session with mentee@example.com has been scheduled.<br><br>' +
      '🕒 Start: Sat, Jun 1 2024 1:05 PM WAT<br>🕔 End: Sat, Jun 1 2024 1:35 PM WAT<br><br>' +
      'Join via Meet: <a href="https://meet.google.com/abc-defg-hij">https://meet.google.com/abc-defg-hij</a>' +
      '<br><br>Regards,<br>MentorLink Team'
    );
  });
});
