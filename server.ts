import express from 'express';
import cron from 'node-cron';
import dotenv from 'dotenv';
import cors from 'cors';
import multer from 'multer';
import { Auth } from './src/db_queries/auth';
import { Users } from './src/db_queries/users';
import { Profiles } from './src/db_queries/profiles';
import { Availabilities } from './src/db_queries/availabilities';
import { MentorshipRequests } from './src/db_queries/mentorship_requests';
import { Sessions } from './src/db_queries/sessions';
import { DashboardStats } from './src/db_queries/dashboard_stats';
import { AdminUsers } from './src/db_queries/admin_users';
import { BackgroundProcesses } from './src/db_queries/background_processes';
import { reqValidator } from './src/middelwares/req_validator';
import { errorHandler } from './src/middelwares/error_handler';
import { constants } from './src/utils/constants';

dotenv.config();
const port = process.env.PORT || 3000;
const app = express();
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: constants.PROFILE_IMAGE_MAX_BYTES }
});
const auth = new Auth();
const users = new Users();
const profiles = new Profiles();
const availabilities = new Availabilities();
const mentorshipRequests = new MentorshipRequests();
const sessions = new Sessions();
const dashboardStats = new DashboardStats();
const adminUsers = new AdminUsers();
const backgroundProcesses = new BackgroundProcesses(sessions, mentorshipRequests);

app.use(express.urlencoded({ extended: true }));
app.use(express.json());
app.use(cors());

app.get("/", (request: express.Request, response: express.Response): void => {
  response.json({ info: "MentorLink API" });
});

app.use("/api/v1", auth.verifyAccessTokenFilter);

// Authentication
app.post(
  "/api/v1/signup",
  reqValidator(auth.signUpValidationSchema),
  auth.signUp
);
app.post(
  "/api/v1/login",
  reqValidator(auth.loginValidationSchema),
  auth.login
);
app.put(
  "/api/v1/change_password",
  reqValidator(auth.changePasswordValidationSchema),
  auth.changePassword
);

// Current user
app.get("/api/v1/user", users.getUser);

// Profile
app.get("/api/v1/profile", profiles.getProfile);
app.put(
  "/api/v1/profile",
  auth.requireRole("Mentor", "Mentee"),
  upload.single("profileImage"),
  reqValidator(profiles.updateProfileValidationSchema),
  profiles.updateProfile
);

// Everything below needs a changed password and, for mentors and mentees, a completed profile
app.use("/api/v1", auth.requireOnboarded);

// Dashboard
app.get("/api/v1/dashboard", dashboardStats.getDashboardStats);

// Mentors
app.get(
  "/api/v1/mentors",
  auth.requireRole("Mentee", "Admin"),
  users.getMentors
);
app.get(
  "/api/v1/mentors/:mentor_id/availability",
  auth.requireRole("Mentee", "Admin"),
  availabilities.getAvailabilities
);

// Mentor availability
app.get(
  "/api/v1/availability",
  auth.requireRole("Mentor"),
  availabilities.getAvailabilities
);
app.post(
  "/api/v1/availability",
  auth.requireRole("Mentor"),
  reqValidator(availabilities.addAvailabilityValidationSchema),
  availabilities.addAvailability
);
app.delete(
  "/api/v1/availability/:id",
  auth.requireRole("Mentor"),
  availabilities.deleteAvailability
);

// Mentorship requests
app.get(
  "/api/v1/mentorship_requests",
  auth.requireRole("Mentor", "Mentee"),
  mentorshipRequests.getMentorshipRequests
);
app.post(
  "/api/v1/mentorship_requests",
  auth.requireRole("Mentee"),
  reqValidator(mentorshipRequests.sendMentorshipRequestValidationSchema),
  mentorshipRequests.sendMentorshipRequest
);
app.put(
  "/api/v1/mentorship_requests/:id/accept",
  auth.requireRole("Mentor"),
  mentorshipRequests.acceptMentorshipRequest
);
app.put(
  "/api/v1/mentorship_requests/:id/reject",
  auth.requireRole("Mentor"),
  mentorshipRequests.rejectMentorshipRequest
);

// Sessions
app.get(
  "/api/v1/sessions",
  auth.requireRole("Mentor", "Mentee"),
  sessions.getSessions
);
app.post(
  "/api/v1/sessions/:id/reminder",
  auth.requireRole("Mentor"),
  sessions.sendSessionReminder
);

// Admin users
app.get(
  "/api/v1/admin/users",
  auth.requireRole("Admin"),
  adminUsers.getUsers
);
app.post(
  "/api/v1/admin/users",
  auth.requireRole("Admin"),
  reqValidator(adminUsers.addUserValidationSchema),
  adminUsers.addUser
);
app.put(
  "/api/v1/admin/users/:id/role",
  auth.requireRole("Admin"),
  reqValidator(adminUsers.updateRoleValidationSchema),
  adminUsers.updateUserRole
);
app.put(
  "/api/v1/admin/users/:id/reset_password",
  auth.requireRole("Admin"),
  adminUsers.resetUserPassword
);
app.delete(
  "/api/v1/admin/users/:id",
  auth.requireRole("Admin"),
  adminUsers.deleteUser
);

// Background processes
app.post(
  "/api/v1/send_session_reminders",
  auth.requireRole("Admin"),
  backgroundProcesses.sendSessionReminders
);
app.post(
  "/api/v1/expire_mentorship_requests",
  auth.requireRole("Admin"),
  backgroundProcesses.expireMentorshipRequests
);

app.use(errorHandler);

cron.schedule("* * * * *", async () => {
  await backgroundProcesses.runScheduledJobs();
});

auth.setupAdminAccount().catch((error: unknown) => {
  console.error("[auth] Admin account setup failed", error);
});

app.listen(port, () => {
  console.log(`App running on port ${port}.`);
});
