import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { SmtpConfig } from '../config/env';
import { moduleLogger } from '../utils/logger';

const log = moduleLogger('email');

export interface VerificationEmail {
  to: string;
  employeeName: string;
  verificationLink: string;
  expiresAt: Date;
}

/**
 * Transport used by verification campaigns. Resolves once the message is
 * accepted by the transport, rejects otherwise.
 */
export interface VerificationMailer {
  sendVerificationEmail(message: VerificationEmail): Promise<void>;
}

/**
 * SMTP delivery through nodemailer.
 */
export class SmtpVerificationMailer implements VerificationMailer {
  private transporter: Transporter;
  private readonly fromName = 'Company Number Verification';

  constructor(private readonly smtp: SmtpConfig) {
    this.transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure, // true for 465, false for other ports
      auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
    });

    log.info({ host: smtp.host, port: smtp.port, from: smtp.sender }, 'SMTP transport initialized');
  }

  async sendVerificationEmail(message: VerificationEmail): Promise<void> {
    const info = await this.transporter.sendMail({
      from: `"${this.fromName}" <${this.smtp.sender}>`,
      to: message.to,
      subject: 'Please confirm the company phone numbers assigned to you',
      text: buildVerificationText(message),
      html: buildVerificationHtml(message),
    });

    log.info({ to: message.to, messageId: info.messageId }, 'verification email sent');
  }

  async close(): Promise<void> {
    this.transporter.close();
  }
}

function formatExpiry(expiresAt: Date): string {
  return expiresAt.toISOString().replace('T', ' ').slice(0, 16) + ' UTC';
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildVerificationText(message: VerificationEmail): string {
  return `
Hello ${message.employeeName},

Please review the company phone numbers currently assigned to you and confirm
that you still use them, or report any number that is wrong or missing.

Open this link to respond:
${message.verificationLink}

The link stays valid until ${formatExpiry(message.expiresAt)}. You can come back
and change your answers until then.
  `.trim();
}

export function buildVerificationHtml(message: VerificationEmail): string {
  const name = escapeHtml(message.employeeName);
  const link = escapeHtml(message.verificationLink);

  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; }
    .button { display: inline-block; padding: 10px 18px; background: #1f6feb; color: #fff; text-decoration: none; border-radius: 4px; }
    .footer { margin-top: 24px; font-size: 12px; color: #777; }
  </style>
</head>
<body>
  <p>Hello ${name},</p>
  <p>Please review the company phone numbers currently assigned to you and confirm that you still use them, or report any number that is wrong or missing.</p>
  <p><a class="button" href="${link}">Review my numbers</a></p>
  <p class="footer">This link stays valid until ${formatExpiry(message.expiresAt)}. You can come back and change your answers until then.</p>
</body>
</html>
  `.trim();
}
