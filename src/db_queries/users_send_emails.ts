import nodemailer, { SendMailOptions } from 'nodemailer';
import autoBind from 'auto-bind';
import dotenv from 'dotenv';
import { formatDateTimeSafe } from '../utils/datetime';
import { helpers } from '../utils/helpers';
import User from '../models/user.model';
import Email from '../models/email.model';
import Session from '../models/session.model';

dotenv.config();

export interface MailTransporter {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export class UsersSendEmails {
  private transporter: MailTransporter;

  constructor(transporter?: MailTransporter) {
    this.transporter = transporter ?? nodemailer.createTransport({
      host: process.env.SMTP_SERVER,
      port: helpers.getEnvNumber('SMTP_PORT', 587),
      auth: {
        user: process.env.SMTP_USERNAME,
        pass: process.env.SMTP_PASSWORD
      }
    });
    autoBind(this);
  }

  async sendEmail(recipientEmailAddress: string, email: Email): Promise<boolean> {
    if (!recipientEmailAddress) {
      return false;
    }
    try {
      await this.transporter.sendMail({
        to: recipientEmailAddress,
        from: process.env.SMTP_SENDER,
        subject: email.subject,
        html: email.body
      });
      console.log(`Email successfully sent: ${recipientEmailAddress}`);
      return true;
    } catch (error) {
      console.error(`[email] Email hasn't been sent successfully: ${recipientEmailAddress}`, error);
      return false;
    }
  }

  setEmailBody(firstName: string, text: string): string {
    return `Hi ${firstName},<br><br>${text}<br><br>Regards,<br>MentorLink Team`;
  }

  async sendEmailSessionScheduled(session: Session): Promise<boolean[]> {
    const start = formatDateTimeSafe(session.start);
    const end = formatDateTimeSafe(session.end);
    const results: boolean[] = [];
    const participants = [
      { recipient: session.mentor, counterpart: session.mentee },
      { recipient: session.mentee, counterpart: session.mentor }
    ];
    for (const { recipient, counterpart } of participants) {
      let body = `Your mentorship session with ${counterpart?.email} has been scheduled.<br><br>`;
      body += `🕒 Start: ${start}<br>🕔 End: ${end}<br><br>`;
      body += `Join via Meet: <a href="${session.meetingUrl}">${session.meetingUrl}</a>`;
      const email: Email = {
        subject: '📅 Mentorship Session Scheduled',
        body: this.setEmailBody(helpers.getUserDisplayName(recipient), body)
      };
      results.push(await this.sendEmail(recipient?.email ?? '', email));
    }
    return results;
  }

  async sendEmailSessionReminder(session: Session): Promise<boolean> {
    const start = formatDateTimeSafe(session.start);
    const email: Email = {
      subject: '📅 Mentorship Session Reminder',
      body: `This is a reminder for your session scheduled on ${start}.<br><br>Join via Meet: ${session.meetingUrl}`
    };
    return this.sendEmail(session.mentee?.email ?? '', email);
  }

  async sendEmailMentorshipRequest(mentor: User, mentee: User): Promise<boolean> {
    const body = `${mentee.email} has sent you a mentorship request. You can review it in your MentorLink dashboard.`;
    const email: Email = {
      subject: 'New mentorship request',
      body: this.setEmailBody(helpers.getUserDisplayName(mentor), body)
    };
    return this.sendEmail(mentor.email ?? '', email);
  }
}
