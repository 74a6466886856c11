import { createHash } from 'node:crypto';

const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .replace(
      /&(amp|lt|gt|quot|#39|apos|nbsp);/g,
      (match) => ENTITY_MAP[match] ?? match,
    )
    .replace(/&#(\d+);/g, (_, code: string) =>
      String.fromCodePoint(Number(code)),
    )
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) =>
      String.fromCodePoint(parseInt(code, 16)),
    );
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/i, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  const decoded = decodeHtmlEntities(stripCdata(value));
  return decoded.replace(TAG_RE, ' ').replace(WS_RE, ' ').trim();
}

export function splitSentences(text: string): string[] {
  const cleaned = cleanText(text);
  if (!cleaned) {
    return [];
  }
  return cleaned
    .split(/(?<=[.!?])\s+/g)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Non-LLM fallback summary: leading sentences up to `maxChars`.
 * A first sentence longer than the limit is cut on a word boundary.
 */
export function extractiveSummary(text: string, maxChars = 300): string {
  const sentences = splitSentences(text);
  if (sentences.length === 0) {
    return '';
  }

  let out = '';
  for (const sentence of sentences) {
    const next = out ? `${out} ${sentence}` : sentence;
    if (next.length > maxChars) {
      break;
    }
    out = next;
  }
  return out || truncateWords(sentences[0] ?? '', maxChars);
}

export function truncateWords(
  text: string,
  length: number,
  suffix = '...',
): string {
  const cleaned = (text || '').trim();
  if (cleaned.length <= length) {
    return cleaned;
  }
  const cut = cleaned.slice(0, length);
  const lastSpace = cut.lastIndexOf(' ');
  const base = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  return `${base.replace(/[\s,;:.-]+$/, '')}${suffix}`;
}

export function tokenize(value: string): string[] {
  const cleaned = cleanText(value)
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(WS_RE, ' ')
    .trim();

  return cleaned ? cleaned.split(' ') : [];
}

export function estimateReadTimeMinutes(text: string): number {
  const words = tokenize(text).length;
  if (words === 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(words / 220));
}

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf-8').digest('hex');
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function containsAny(
  text: string,
  keywords: readonly string[],
): boolean {
  const lowered = text.toLowerCase();
  return keywords.some(
    (keyword) => keyword && lowered.includes(keyword.toLowerCase()),
  );
}
