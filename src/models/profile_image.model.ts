export default interface ProfileImage {
  buffer: Buffer;
  mimetype: string;
}
