import Profile from './profile.model';

export type UserRole = 'Admin' | 'Mentor' | 'Mentee';

export const USER_ROLES: ReadonlyArray<UserRole> = ['Admin', 'Mentor', 'Mentee'];

export function isUserRole(value: unknown): value is UserRole {
  return USER_ROLES.some(role => role === value);
}

export default interface User {
  id?: string;
  email?: string;
  password?: string;
  role?: UserRole;
  mustChangePassword?: boolean;
  profileCompleted?: boolean;
  createdAt?: string;
  profile?: Profile;
}

export type RequestUser = Required<Pick<User, 'id' | 'role' | 'mustChangePassword' | 'profileCompleted'>>;
