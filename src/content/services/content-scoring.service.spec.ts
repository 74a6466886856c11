import { ParsedItem } from '../types/content.types';
import { ContentScoringService } from './content-scoring.service';

const NOW = new Date('2026-02-01T12:00:00.000Z');

function parsed(extra: Partial<ParsedItem> = {}): ParsedItem {
  return {
    title: 'Scaling Kubernetes clusters',
    url: 'https://blog.example.com/k8s',
    content: 'Notes on terraform and observability.',
    author: '',
    publishedAt: '',
    tags: [],
    ...extra,
  };
}

describe('ContentScoringService', () => {
  const service = new ContentScoringService();

  it('starts from the base score', () => {
    expect(service.scoreItem(parsed(), {}, NOW)).toBe(40);
  });

  it('adds author, trusted author and recency bonuses', () => {
    const score = service.scoreItem(
      parsed({ author: 'Dana', publishedAt: '2026-02-01T08:00:00.000Z' }),
      { trusted_authors: ['Dana'] },
      NOW,
    );
    expect(score).toBe(40 + 5 + 10 + 25);
  });

  it('steps recency by age', () => {
    const at = (hours: number) => new Date(
      NOW.getTime() - hours * 3600 * 1000,
    ).toISOString();
    expect(service.scoreItem(parsed({ publishedAt: at(12) }), {}, NOW)).toBe(
      60,
    );
    expect(service.scoreItem(parsed({ publishedAt: at(48) }), {}, NOW)).toBe(
      50,
    );
    expect(service.scoreItem(parsed({ publishedAt: at(100) }), {}, NOW)).toBe(
      45,
    );
    expect(service.scoreItem(parsed({ publishedAt: at(200) }), {}, NOW)).toBe(
      40,
    );
  });

  it('caps keyword matches at 25 and the total at 100', () => {
    const keywords = [
      'kubernetes',
      'terraform',
      'observability',
      'clusters',
      'notes',
      'scaling',
    ];
    expect(service.scoreItem(parsed(), { keywords }, NOW)).toBe(65);

    const max = service.scoreItem(
      parsed({
        author: 'Dana',
        publishedAt: '2026-02-01T11:00:00.000Z',
        engagement: 5000,
        comments: 500,
      }),
      { keywords, trusted_authors: ['Dana'] },
      NOW,
    );
    expect(max).toBe(100);
  });

  it('filters by keywords, exclusions, min score and limit', () => {
    const items = [
      { ...parsed({ title: 'Kubernetes 2.0' }), score: 70 },
      { ...parsed({ title: 'Kubernetes webinar', content: '' }), score: 90 },
      { ...parsed({ title: 'Gardening', content: '' }), score: 95 },
      { ...parsed({ title: 'Kubernetes tips' }), score: 40 },
      { ...parsed({ title: 'Kubernetes news' }), score: 80 },
    ];

    const out = service.filterByConfig(items, {
      keywords: ['kubernetes'],
      exclude_keywords: ['webinar'],
      min_score: 50,
      limit: 1,
    });

    expect(out.map((item) => item.title)).toEqual(['Kubernetes 2.0']);
  });
});
