export default interface Email {
  subject: string;
  body: string;
}
