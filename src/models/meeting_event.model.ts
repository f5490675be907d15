export default interface MeetingEvent {
  eventId: string;
  meetingUrl: string;
}
