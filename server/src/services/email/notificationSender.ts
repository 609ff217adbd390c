/**
 * Notification Sender: verification emails for approved registrations.
 *
 * Transport:
 *   - RESEND_API_KEY set → Resend
 *   - otherwise → log-only transport (development)
 *
 * A failed send is a NotificationError; the caller decides what to do with it.
 */

import { Resend } from 'resend';
import type { Registration } from '@regverify/shared';
import { emailLogger } from '../../utils/logger.js';
import { NotificationError, toError } from '../../utils/errors.js';
import {
  renderVerificationEmail,
  renderVerificationSubject,
  renderVerificationText,
} from './templates/index.js';

// ============================================
// TYPES
// ============================================

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  html: string;
  text: string;
}

export interface EmailTransport {
  readonly name: string;
  /** Resolves with the provider's message id */
  send(message: EmailMessage): Promise<string | null>;
}

export interface NotificationSender {
  sendVerificationEmail(registration: Registration, verificationUrl: string): Promise<void>;
}

export interface VerificationEmailOptions {
  from: string;
  portalName: string;
  tokenTtlDays: number;
}

// ============================================
// TRANSPORTS
// ============================================

export class ResendTransport implements EmailTransport {
  readonly name = 'resend';
  private readonly resend: Resend;

  constructor(apiKey: string) {
    this.resend = new Resend(apiKey);
  }

  async send(message: EmailMessage): Promise<string | null> {
    const { data, error } = await this.resend.emails.send({
      from: message.from,
      to: [message.to],
      subject: message.subject,
      html: message.html,
      text: message.text,
    });

    if (error) {
      throw new Error(error.message);
    }
    return data?.id ?? null;
  }
}

/** Writes the message to the log instead of sending it */
export class LogOnlyTransport implements EmailTransport {
  readonly name = 'log';

  async send(message: EmailMessage): Promise<string | null> {
    emailLogger.info({ to: message.to, subject: message.subject, text: message.text }, 'Email not sent (no RESEND_API_KEY), logged instead');
    return null;
  }
}

export function createEmailTransport(resendApiKey: string | null): EmailTransport {
  return resendApiKey ? new ResendTransport(resendApiKey) : new LogOnlyTransport();
}

// ============================================
// SENDER
// ============================================

export class EmailNotificationSender implements NotificationSender {
  private readonly transport: EmailTransport;
  private readonly options: VerificationEmailOptions;

  constructor(transport: EmailTransport, options: VerificationEmailOptions) {
    this.transport = transport;
    this.options = options;
  }

  async sendVerificationEmail(registration: Registration, verificationUrl: string): Promise<void> {
    const data = {
      fullName: registration.fullName,
      staffNumber: registration.staffNumber,
      department: registration.erpDepartment,
      verificationUrl,
      expiresInDays: this.options.tokenTtlDays,
      portalName: this.options.portalName,
    };

    try {
      const emailId = await this.transport.send({
        from: this.options.from,
        to: registration.email,
        subject: renderVerificationSubject(data),
        html: renderVerificationEmail(data),
        text: renderVerificationText(data),
      });
      emailLogger.info(
        { registrationId: registration.id, emailId, transport: this.transport.name },
        'Verification email sent'
      );
    } catch (err) {
      throw new NotificationError(
        `Failed to send verification email for registration ${registration.id}`,
        registration.email,
        toError(err)
      );
    }
  }
}
