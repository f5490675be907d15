import Session from './session.model';

export default interface SessionCreationResult {
  success: boolean;
  message: string;
  session?: Session;
}
