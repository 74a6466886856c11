import { escapeAttr, escapeHtml } from '../../common/utils/html.util';
import { TemplateContext } from '../types/newsletter.types';
import { articleLink, articleMeta, truncateSummary } from './shared';

const STYLE = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Helvetica, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; }
  h1 { color: #2c3e50; border-bottom: 2px solid #3498db; padding-bottom: 10px; }
  h2 { color: #34495e; margin-top: 30px; }
  .article { background: #f9f9f9; border-left: 3px solid #3498db; padding: 15px; margin: 20px 0; }
  .article-title { font-weight: bold; color: #2c3e50; }
  .article-meta { font-size: 0.9em; color: #7f8c8d; }
  .article-summary { margin-top: 10px; }
  .footer { margin-top: 40px; padding-top: 20px; border-top: 1px solid #ddd; text-align: center; color: #7f8c8d; font-size: 0.9em; }
  a { color: #3498db; text-decoration: none; }
`;

export function renderDefaultHtml(
  ctx: TemplateContext,
  appName: string,
): string {
  const greeting =
    ctx.subscriberName ? `<p>Hi ${escapeHtml(ctx.subscriberName)},</p>` : '';
  const description = ctx.newsletter.description
    ? `<p>${escapeHtml(ctx.newsletter.description)}</p>`
    : '';

  const sections = ctx.sections
    .map((section) => {
      const articles = section.articles
        .map(
          (article) => `
    <div class="article">
      <div class="article-title">${articleLink(article)}</div>
      <div class="article-meta">${articleMeta(article)}</div>
      <div class="article-summary">${escapeHtml(truncateSummary(article.summary, 250))}</div>
    </div>`,
        )
        .join('');
      return `
    <h2>${escapeHtml(section.name)}</h2>${articles}`;
    })
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(ctx.subject)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <h1>${escapeHtml(ctx.newsletter.name)}</h1>
  ${description}
  ${greeting}${sections}
  <div class="footer">
    <p>&copy; ${ctx.generatedAt.getUTCFullYear()} ${escapeHtml(appName)}. Edition #${ctx.editionNumber}.</p>
    <p>
      <a href="${escapeAttr(ctx.unsubscribeUrl)}">Unsubscribe</a> |
      <a href="${escapeAttr(ctx.preferencesUrl)}">Update Preferences</a>
    </p>
  </div>
</body>
</html>`;
}
