export type SessionStatusLabel = 'Invalid' | 'Past' | 'Ongoing' | 'Upcoming';

export default interface SessionStatus {
  status: SessionStatusLabel;
  icon: string;
}
