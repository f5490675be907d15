export const constants = {
  TIME_ZONE: 'Africa/Lagos',
  DATE_TIME_FORMAT: 'yyyy-MM-DD HH:mm:ssZ',
  DISPLAY_DATE_TIME_FORMAT: 'ddd, MMM D YYYY h:mm A',
  READ_ONLY_TRANSACTION: 'SET TRANSACTION READ ONLY',
  SESSION_START_DELAY_MINUTES: 5,
  SESSION_DURATION_MINUTES: 30,
  REQUEST_EXPIRY_DAYS: 7,
  SESSION_REMINDER_MINUTES: 15,
  PROFILE_IMAGES_BUCKET: 'profilepics',
  PROFILE_IMAGE_TYPES: ['image/jpg', 'image/jpeg', 'image/png'],
  PROFILE_IMAGE_MAX_BYTES: 5 * 1024 * 1024,
  ACCESS_TOKEN_EXPIRY_SECONDS: 60 * 60 * 24 * 7,
  PASSWORD_SALT_ROUNDS: 8
};
