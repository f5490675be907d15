import { MentorshipRequestStatus } from './mentorship_request.model';
import { UserRole } from './user.model';

export interface MentorDashboardStats {
  role: 'Mentor';
  incomingRequests: number;
  pendingRequests: number;
  totalSessions: number;
  upcomingSessions: number;
  availabilitySlots: number;
}

export interface MenteeDashboardStats {
  role: 'Mentee';
  requests: Record<MentorshipRequestStatus, number>;
  totalSessions: number;
  upcomingSessions: number;
}

export interface AdminDashboardStats {
  role: 'Admin';
  users: Record<UserRole, number>;
  requests: Record<MentorshipRequestStatus, number>;
  totalSessions: number;
}

type DashboardStats = MentorDashboardStats | MenteeDashboardStats | AdminDashboardStats;

export default DashboardStats;
