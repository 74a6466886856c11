import { ContentType } from '../../database/schema';

export const CONTENT_TYPES: readonly ContentType[] = [
  'original',
  'curated',
  'syndicated',
];

export interface FeedEntry {
  title: string;
  link: string;
  content: string;
  author: string;
  publishedAt: string;
  categories: string[];
  /** Points or upvotes weighted with comments, where the source has them. */
  engagement?: number;
  comments?: number;
}

export interface FeedResult {
  entries: FeedEntry[];
  error?: string;
}

export interface ParsedItem {
  title: string;
  url: string;
  content: string;
  author: string;
  publishedAt: string;
  tags: string[];
  engagement?: number;
  comments?: number;
}

export interface AggregationResult {
  sources: number;
  items: number;
  errors: string[];
  details: Record<number, number>;
}

export interface RecentContentQuery {
  hours?: number;
  minScore?: number;
  limit?: number;
  newsletterId?: number;
}

/** Item shape the ratio manager works on. `score` is on a 0..1 scale. */
export interface RatioItem {
  id: number | string;
  title: string;
  summary: string;
  contentType: ContentType;
  score: number;
  publishedAt: string | null;
  tags: string[];
  readTime?: number;
  hasCode?: boolean;
  hasVisuals?: boolean;
}

export type TypeCounts = Record<ContentType, number>;
export type TypeRatios = Record<ContentType, number>;

export interface SelectionMetrics {
  total_selected: number;
  total_qualified: number;
  target_counts: TypeCounts;
  actual_counts: TypeCounts;
  target_ratios: TypeRatios;
  actual_ratios: TypeRatios;
  deviation_from_target: number;
  average_quality_score: number;
  total_read_time: number;
  has_code_examples: boolean;
  has_visuals: boolean;
}

export interface EmptySelectionMetrics {
  total_selected: 0;
  ratios: Record<string, never>;
  deviation: 1;
  quality: 0;
}

export type SelectionOutcome =
  | { error: string }
  | SelectionMetrics
  | EmptySelectionMetrics;
