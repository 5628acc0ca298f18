/**
 * Report email rendering and delivery. Plain text is the primary body; the
 * HTML alternative is compiled from MJML.
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import mjml2html from 'mjml';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { escapeHtml } from '../shared/utils.js';

export type EmailConfig = Config['delivery']['email'];

/** The part of a nodemailer transporter the notifier uses. */
export interface MailSender {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

export interface EmailSection {
  heading?: string;
  lines: string[];
}

function renderSection(section: EmailSection): string {
  const heading = section.heading
    ? `<mj-text padding="0 0 6px" font-size="13px" font-weight="bold" color="#555555">${escapeHtml(section.heading)}</mj-text>`
    : '';
  const body = section.lines.map((line) => escapeHtml(line)).join('<br/>');
  return `
    <mj-section padding="8px 24px">
      <mj-column>
        ${heading}
        <mj-text padding="0" font-size="14px" line-height="1.6">${body}</mj-text>
      </mj-column>
    </mj-section>`;
}

export function buildMjml(title: string, accent: string, sections: EmailSection[]): string {
  return `
<mjml>
  <mj-head>
    <mj-title>${escapeHtml(title)}</mj-title>
    <mj-attributes>
      <mj-all font-family="-apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif" />
      <mj-text color="#1a1a1a" font-size="14px" line-height="1.6" />
    </mj-attributes>
  </mj-head>
  <mj-body background-color="#ffffff">
    <mj-section background-color="${accent}" padding="18px 24px">
      <mj-column>
        <mj-text color="#ffffff" font-size="20px" font-weight="bold">${escapeHtml(title)}</mj-text>
      </mj-column>
    </mj-section>
    ${sections.map(renderSection).join('\n')}
  </mj-body>
</mjml>`;
}

export function renderHtml(title: string, accent: string, sections: EmailSection[]): string {
  const { html, errors } = mjml2html(buildMjml(title, accent, sections), { validationLevel: 'soft' });
  if (errors.length > 0) {
    logger.warn({ errors: errors.map((e) => e.formattedMessage) }, 'MJML compilation warnings');
  }
  return html;
}

export function renderText(sections: EmailSection[]): string {
  return sections
    .map((s) => (s.heading ? [s.heading, ...s.lines] : s.lines).join('\n'))
    .join('\n\n');
}

export function createMailSender(emailConfig: EmailConfig): MailSender {
  return nodemailer.createTransport({
    host: emailConfig.smtp_host,
    port: emailConfig.smtp_port,
    secure: emailConfig.smtp_port === 465,
    auth: emailConfig.smtp_user
      ? { user: emailConfig.smtp_user, pass: emailConfig.smtp_pass }
      : undefined,
    connectionTimeout: emailConfig.timeout_ms,
    greetingTimeout: emailConfig.timeout_ms,
    socketTimeout: emailConfig.timeout_ms,
  });
}

export function senderAddress(emailConfig: EmailConfig): string {
  return emailConfig.from || emailConfig.smtp_user;
}

export async function sendEmail(
  sender: MailSender,
  emailConfig: EmailConfig,
  email: RenderedEmail,
): Promise<void> {
  await sender.sendMail({
    from: senderAddress(emailConfig),
    to: emailConfig.to.join(', '),
    subject: email.subject,
    text: email.text,
    html: email.html,
  });
  logger.info({ to: emailConfig.to, subject: email.subject }, 'Email sent');
}

/**
 * Send a fixed message to verify SMTP settings end to end.
 */
export async function sendTestEmail(
  emailConfig: EmailConfig,
  sender: MailSender = createMailSender(emailConfig),
  now: Date = new Date(),
): Promise<void> {
  const stamp = now.toISOString().replace('T', ' ').slice(0, 19);
  const sections: EmailSection[] = [
    { lines: [`This is a test email sent at ${stamp} UTC.`, 'If you received this, email is configured correctly.'] },
  ];
  await sendEmail(sender, emailConfig, {
    subject: `[TEST] Daily reports email test - ${stamp}`,
    text: renderText(sections),
    html: renderHtml('Email test', '#1a1a1a', sections),
  });
}
