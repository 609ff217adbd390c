/**
 * Shared email layout for registrant-facing emails.
 * Inline styles only (email clients don't support external CSS).
 */

const BRAND_COLOR = '#1a1a1a';
const ACCENT_COLOR = '#0b5394';
const BG_COLOR = '#f4f6f8';
const FONT_STACK = "'Helvetica Neue', Helvetica, Arial, sans-serif";

export interface LayoutOptions {
  /** Inbox preview text */
  preheader?: string;
  /** Name shown in the header and footer */
  portalName: string;
}

/** Escape text interpolated into HTML */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function wrapInLayout(content: string, options: LayoutOptions): string {
  const preheader = options.preheader ?? '';
  const portalName = escapeHtml(options.portalName);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${portalName}</title>
</head>
<body style="margin:0;padding:0;background-color:${BG_COLOR};font-family:${FONT_STACK};color:${BRAND_COLOR};line-height:1.6;">
  ${preheader ? `<div style="display:none;max-height:0;overflow:hidden;">${escapeHtml(preheader)}</div>` : ''}

  <!-- Container -->
  <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background-color:${BG_COLOR};">
    <tr>
      <td align="center" style="padding:32px 16px;">
        <table role="presentation" width="600" cellpadding="0" cellspacing="0" style="background-color:#ffffff;border-radius:8px;overflow:hidden;max-width:600px;width:100%;">

          <!-- Header -->
          <tr>
            <td style="padding:32px 40px 24px;text-align:center;border-bottom:1px solid #eee;">
              <h1 style="margin:0;font-size:20px;font-weight:600;letter-spacing:1px;color:${ACCENT_COLOR};">
                ${portalName}
              </h1>
            </td>
          </tr>

          <!-- Body -->
          <tr>
            <td style="padding:32px 40px;">
              ${content}
            </td>
          </tr>

          <!-- Footer -->
          <tr>
            <td style="padding:24px 40px 32px;border-top:1px solid #eee;text-align:center;">
              <p style="margin:0;font-size:12px;color:#888;">
                You are receiving this email because you registered with ${portalName}.
              </p>
            </td>
          </tr>

        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

/** Render a simple heading */
export function heading(text: string): string {
  return `<h2 style="margin:0 0 16px;font-size:22px;font-weight:600;color:${BRAND_COLOR};">${text}</h2>`;
}

/** Render a paragraph */
export function paragraph(text: string): string {
  return `<p style="margin:0 0 16px;font-size:15px;color:#333;">${text}</p>`;
}

/** Render a key-value detail row */
export function detailRow(label: string, value: string): string {
  return `<tr>
    <td style="padding:8px 0;font-size:14px;color:#666;width:140px;vertical-align:top;">${label}</td>
    <td style="padding:8px 0;font-size:14px;color:${BRAND_COLOR};font-weight:500;">${value}</td>
  </tr>`;
}

/** Wrap detail rows in a table */
export function detailTable(rows: string): string {
  return `<table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="margin:0 0 24px;">
    ${rows}
  </table>`;
}

/** Render a styled button */
export function button(text: string, url: string): string {
  return `<table role="presentation" cellpadding="0" cellspacing="0" style="margin:24px 0;">
    <tr>
      <td style="background-color:${ACCENT_COLOR};border-radius:6px;">
        <a href="${escapeHtml(url)}" style="display:inline-block;padding:12px 32px;font-size:14px;font-weight:600;color:#ffffff;text-decoration:none;letter-spacing:0.5px;">
          ${text}
        </a>
      </td>
    </tr>
  </table>`;
}

/** Render a divider */
export function divider(): string {
  return `<hr style="border:none;border-top:1px solid #eee;margin:24px 0;">`;
}
