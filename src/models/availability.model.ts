export default interface Availability {
  id?: string;
  mentorId?: string;
  start?: string;
  end?: string;
  startFormatted?: string;
  endFormatted?: string;
}
