import { z } from 'zod';
import rawNiches from './niches.json';

const ratioSchema = z.object({
  original: z.number().min(0),
  curated: z.number().min(0),
  syndicated: z.number().min(0),
});

const nicheSchema = z.object({
  name: z.string(),
  category: z.string(),
  description: z.string(),
  keywords: z.array(z.string()),
  exclude_keywords: z.array(z.string()).default([]),
  content_ratio: ratioSchema,
  frequency: z.enum(['daily', 'weekly', 'monthly']),
  template: z.enum(['default', 'responsive']),
  categories: z.array(z.string()).min(1),
  sources: z.array(
    z.object({
      name: z.string(),
      url: z.string().url(),
      type: z.enum(['rss', 'hackernews', 'reddit']).default('rss'),
      content_type: z.enum(['original', 'curated', 'syndicated']),
    }),
  ),
});

export type NicheConfig = z.infer<typeof nicheSchema>;

export const NICHES: Readonly<Record<string, NicheConfig>> = Object.freeze(
  z.record(nicheSchema).parse(rawNiches),
);

export function listNiches(): string[] {
  return Object.keys(NICHES);
}

export function getNiche(key: string): NicheConfig | null {
  return NICHES[key] ?? null;
}

/**
 * Niche whose keywords appear most often in the text, or null when none match.
 */
export function matchNiche(
  text: string,
  candidates: string[] = listNiches(),
): string | null {
  const lowered = text.toLowerCase();
  let best: string | null = null;
  let bestHits = 0;
  for (const key of candidates) {
    const niche = NICHES[key];
    if (!niche) {
      continue;
    }
    if (
      niche.exclude_keywords.some((kw) => lowered.includes(kw.toLowerCase()))
    ) {
      continue;
    }
    const hits = niche.keywords
      .filter((kw) => lowered.includes(kw.toLowerCase()))
      .length;
    if (hits > bestHits) {
      best = key;
      bestHits = hits;
    }
  }
  return best;
}
