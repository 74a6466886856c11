import { escapeAttr, escapeHtml } from '../../common/utils/html.util';

const PAGE_STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 600px; margin: 100px auto; padding: 20px; background: #f5f5f5; }
  .container { background: white; padding: 40px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); text-align: center; }
  h1 { color: #333; margin-bottom: 20px; }
  h1.success { color: #28a745; }
  h1.error { color: #dc3545; }
  p { color: #666; line-height: 1.6; }
  .button { display: inline-block; padding: 12px 24px; background: #dc3545; color: white; text-decoration: none; border: none; border-radius: 4px; margin: 20px 8px; font-size: 16px; cursor: pointer; }
  .secondary { background: #6c757d; }
`;

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${PAGE_STYLE}</style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>`;
}

export function renderSuccessPage(
  title: string,
  message: string,
  extra = '',
): string {
  return page(
    title,
    `    <h1 class="success">${escapeHtml(title)}</h1>
    <p>${escapeHtml(message)}</p>${extra}`,
  );
}

export function renderErrorPage(message: string): string {
  return page(
    'Something went wrong',
    `    <h1 class="error">Something went wrong</h1>
    <p>${escapeHtml(message)}</p>
    <p>If you keep seeing this, reply to any of our emails and we will sort it out.</p>`,
  );
}

export interface UnsubscribePageContext {
  subscriberName: string | null;
  newsletterName: string;
  confirmUrl: string;
  frontendUrl: string;
}

export function renderUnsubscribeConfirmPage(
  ctx: UnsubscribePageContext,
): string {
  return page(
    'Unsubscribe',
    `    <h1>Confirm Unsubscribe</h1>
    <p>Hello ${escapeHtml(ctx.subscriberName || 'there')},</p>
    <p>Are you sure you want to unsubscribe from ${escapeHtml(ctx.newsletterName)}?</p>
    <form method="post" action="${escapeAttr(ctx.confirmUrl)}">
      <button type="submit" class="button">Yes, Unsubscribe</button>
      <a href="${escapeAttr(ctx.frontendUrl)}" class="button secondary">Keep Me Subscribed</a>
    </form>`,
  );
}

export function resubscribeLink(url: string): string {
  return `
    <p>Changed your mind? <a href="${escapeAttr(url)}">Resubscribe</a></p>`;
}

export interface VerificationEmail {
  subject: string;
  html: string;
  text: string;
}

export function renderVerificationEmail(
  name: string | null,
  verificationUrl: string,
  appName: string,
): VerificationEmail {
  const greeting = name || 'there';
  const html = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; }
    h1 { color: #007bff; border-bottom: 2px solid #007bff; padding-bottom: 10px; }
    .button { display: inline-block; padding: 12px 30px; background: #007bff; color: white; text-decoration: none; border-radius: 4px; margin: 20px 0; }
    .footer { margin-top: 40px; padding-top: 20px; border-top: 1px solid #eee; font-size: 14px; color: #666; }
  </style>
</head>
<body>
  <h1>Verify Your Email Address</h1>
  <p>Hi ${escapeHtml(greeting)},</p>
  <p>Welcome to ${escapeHtml(appName)}! Please verify your email address to start receiving our content.</p>
  <p style="text-align: center;"><a href="${escapeAttr(verificationUrl)}" class="button">Verify Email Address</a></p>
  <p>Or copy and paste this link into your browser:</p>
  <p style="word-break: break-all;">${escapeHtml(verificationUrl)}</p>
  <p>This link will expire in 48 hours.</p>
  <div class="footer">
    <p>If you didn't sign up, you can safely ignore this email.</p>
  </div>
</body>
</html>`;

  const text = [
    'Verify Your Email Address',
    '',
    `Hi ${greeting},`,
    '',
    `Welcome to ${appName}! Please verify your email address to start ` +
      `receiving our content.`,
    '',
    'Click this link to verify your email:',
    verificationUrl,
    '',
    'This link will expire in 48 hours.',
    '',
    "If you didn't sign up, you can safely ignore this email.",
  ].join('\n');

  return { subject: 'Verify Your Email Address', html, text };
}
