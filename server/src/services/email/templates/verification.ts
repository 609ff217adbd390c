/**
 * Verification email, sent when the ERP check approves a registration.
 * The link carries the signed token that activates the account.
 */

import { wrapInLayout, heading, paragraph, detailTable, detailRow, button, divider, escapeHtml } from './layout.js';

export interface VerificationEmailData {
  fullName: string;
  staffNumber: string | null;
  department: string | null;
  verificationUrl: string;
  expiresInDays: number;
  portalName: string;
}

export function renderVerificationSubject(data: Pick<VerificationEmailData, 'portalName'>): string {
  return `Confirm your email for ${data.portalName}`;
}

/** Plain-text alternative for clients that block HTML */
export function renderVerificationText(data: VerificationEmailData): string {
  return [
    `Hi ${data.fullName},`,
    '',
    `Your registration with ${data.portalName} has been approved.`,
    'Confirm your email address to activate your account:',
    data.verificationUrl,
    '',
    `This link expires in ${data.expiresInDays} days.`,
  ].join('\n');
}

export function renderVerificationEmail(data: VerificationEmailData): string {
  const rows =
    (data.staffNumber ? detailRow('Staff number', escapeHtml(data.staffNumber)) : '') +
    (data.department ? detailRow('Department', escapeHtml(data.department)) : '');

  const content = `
    ${heading('Your registration is approved')}
    ${paragraph(`Hi ${escapeHtml(data.fullName)}, we matched your details against our employee records.`)}
    ${rows ? detailTable(rows) : ''}
    ${paragraph('Confirm your email address to activate your account.')}
    ${button('Confirm email', data.verificationUrl)}
    ${divider()}
    ${paragraph(`<span style="font-size:13px;color:#888;">This link expires in ${data.expiresInDays} days. If you did not register, you can ignore this email.</span>`)}
  `;

  return wrapInLayout(content, {
    preheader: 'Confirm your email to activate your account',
    portalName: data.portalName,
  });
}
