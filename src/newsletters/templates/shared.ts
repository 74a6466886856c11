import { EditionArticle } from '../../database/schema';
import { escapeAttr, escapeHtml } from '../../common/utils/html.util';
import { formatLongDate } from '../../common/utils/date.util';
import { truncateWords } from '../../common/utils/text.util';

export function truncateSummary(text: string, length = 200): string {
  return truncateWords(text, length, '...');
}

export function articleMeta(article: EditionArticle): string {
  const parts: string[] = [];
  if (article.author) {
    parts.push(`By ${escapeHtml(article.author)}`);
  }
  const date = formatLongDate(article.published_at);
  if (date) {
    parts.push(escapeHtml(date));
  }
  return parts.join(' | ');
}

export function articleLink(article: EditionArticle, style = ''): string {
  const styleAttr = style ? ` style="${style}"` : '';
  return `<a href="${escapeAttr(article.url)}"${styleAttr}>${escapeHtml(article.title)}</a>`;
}
