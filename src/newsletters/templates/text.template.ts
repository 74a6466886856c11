import { formatLongDate } from '../../common/utils/date.util';
import { TemplateContext } from '../types/newsletter.types';
import { truncateSummary } from './shared';

export function renderText(ctx: TemplateContext, appName: string): string {
  const lines: string[] = [
    ctx.newsletter.name,
    '='.repeat(ctx.newsletter.name.length),
    '',
  ];
  if (ctx.newsletter.description) {
    lines.push(ctx.newsletter.description, '');
  }
  if (ctx.subscriberName) {
    lines.push(`Hi ${ctx.subscriberName},`, '');
  }

  for (const section of ctx.sections) {
    lines.push(section.name, '-'.repeat(section.name.length), '');
    for (const article of section.articles) {
      const meta = [
        article.author ? `By ${article.author}` : '',
        formatLongDate(article.published_at),
      ]
        .filter(Boolean)
        .join(' | ');
      lines.push(`* ${article.title}`);
      if (meta) {
        lines.push(`  ${meta}`);
      }
      lines.push(`  ${article.url}`);
      if (article.summary) {
        lines.push(`  ${truncateSummary(article.summary, 200)}`);
      }
      lines.push('');
    }
  }

  lines.push(
    '---',
    `(c) ${ctx.generatedAt.getUTCFullYear()} ${appName}`,
    `Unsubscribe: ${ctx.unsubscribeUrl}`,
    `Preferences: ${ctx.preferencesUrl}`,
  );
  return `${lines.join('\n')}\n`;
}
