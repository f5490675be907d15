import { UserRole } from './user.model';

export default interface Tokens {
  userId: string;
  role: UserRole;
  accessToken: string;
}
