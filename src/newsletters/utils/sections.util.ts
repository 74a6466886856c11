import { EditionArticle, EditionSection } from '../../database/schema';

export const PRIORITY_SECTIONS = ['Breaking', 'Featured', 'Trending'];

/** Priority sections first, the rest by name; article order is preserved. */
export function groupIntoSections(
  entries: Array<{ article: EditionArticle; category: string }>,
): EditionSection[] {
  const grouped = new Map<string, EditionArticle[]>();
  for (const { article, category } of entries) {
    const bucket = grouped.get(category) ?? [];
    bucket.push(article);
    grouped.set(category, bucket);
  }

  const sections: EditionSection[] = [];
  for (const name of PRIORITY_SECTIONS) {
    const articles = grouped.get(name);
    if (articles) {
      sections.push({ name, articles });
      grouped.delete(name);
    }
  }
  for (const name of [...grouped.keys()].sort()) {
    sections.push({ name, articles: grouped.get(name) ?? [] });
  }
  return sections;
}
