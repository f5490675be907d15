export default interface Profile {
  userId?: string;
  name?: string;
  bio?: string;
  skills?: string;
  goals?: string;
  profileImageUrl?: string | null;
}
