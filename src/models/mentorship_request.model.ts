import User from './user.model';

export type MentorshipRequestStatus = 'PENDING' | 'ACCEPTED' | 'REJECTED';

export const MENTORSHIP_REQUEST_STATUSES: ReadonlyArray<MentorshipRequestStatus> = ['PENDING', 'ACCEPTED', 'REJECTED'];

export function isMentorshipRequestStatus(value: unknown): value is MentorshipRequestStatus {
  return MENTORSHIP_REQUEST_STATUSES.some(status => status === value);
}

export default interface MentorshipRequest {
  id?: string;
  mentor?: User;
  mentee?: User;
  status?: MentorshipRequestStatus;
  createdAt?: string;
}
