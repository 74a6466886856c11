import { escapeAttr, escapeHtml } from '../../common/utils/html.util';
import { TemplateContext } from '../types/newsletter.types';
import { articleLink, articleMeta, truncateSummary } from './shared';

// Table layout with inline styles for clients that strip <style>.
export function renderResponsiveHtml(
  ctx: TemplateContext,
  appName: string,
): string {
  const rows = ctx.sections
    .map((section) => {
      const articles = section.articles
        .map(
          (article) => `
          <tr>
            <td style="padding:12px 0;border-bottom:1px solid #eeeeee;">
              <div style="font-size:16px;font-weight:bold;">${articleLink(article, 'color:#1a73e8;text-decoration:none;')}</div>
              <div style="font-size:12px;color:#888888;">${articleMeta(article)}</div>
              <div style="font-size:14px;color:#333333;margin-top:6px;">${escapeHtml(truncateSummary(article.summary, 200))}</div>
            </td>
          </tr>`,
        )
        .join('');
      return `
          <tr><td style="padding-top:24px;font-size:18px;font-weight:bold;color:#202124;">${escapeHtml(section.name)}</td></tr>${articles}`;
    })
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(ctx.subject)}</title>
</head>
<body style="margin:0;padding:0;background:#f4f4f4;">
  <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background:#f4f4f4;">
    <tr>
      <td align="center" style="padding:16px;">
        <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="max-width:600px;background:#ffffff;padding:24px;font-family:Arial,Helvetica,sans-serif;">
          <tr><td style="font-size:24px;font-weight:bold;color:#202124;">${escapeHtml(ctx.newsletter.name)}</td></tr>
          <tr><td style="font-size:12px;color:#888888;">Edition #${ctx.editionNumber}</td></tr>${rows}
          <tr>
            <td style="padding-top:32px;font-size:12px;color:#888888;text-align:center;">
              &copy; ${ctx.generatedAt.getUTCFullYear()} ${escapeHtml(appName)}<br>
              <a href="${escapeAttr(ctx.unsubscribeUrl)}" style="color:#888888;">Unsubscribe</a> |
              <a href="${escapeAttr(ctx.preferencesUrl)}" style="color:#888888;">Update Preferences</a>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}
