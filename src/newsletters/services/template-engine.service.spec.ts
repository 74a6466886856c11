import { testSettings } from '../../database/testing';
import { makeArticle } from '../testing';
import { TemplateContext } from '../types/newsletter.types';
import { TemplateEngineService } from './template-engine.service';

describe('TemplateEngineService', () => {
  const engine = new TemplateEngineService(testSettings());
  const ctx: TemplateContext = {
    newsletter: { id: 1, name: 'Ops & Infra', description: 'Weekly ops' },
    subject: 'Queues <and> more',
    editionNumber: 3,
    sections: [
      {
        name: 'General',
        articles: [
          makeArticle({
            author: 'Dana',
            published_at: '2026-03-01T08:00:00.000Z',
            summary: 'Short summary.',
          }),
        ],
      },
    ],
    unsubscribeUrl: 'https://example.com/unsubscribe?token=a&b=c',
    preferencesUrl: 'https://example.com/preferences',
    subscriberName: 'Sam',
    generatedAt: new Date('2026-03-02T12:00:00.000Z'),
  };

  it('renders the plain text part', () => {
    expect(engine.render('default', ctx).text).toBe(
      [
        'Ops & Infra',
        '===========',
        '',
        'Weekly ops',
        '',
        'Hi Sam,',
        '',
        'General',
        '-------',
        '',
        '* Scaling queues',
        '  By Dana | March 01, 2026',
        '  https://example.com/queues',
        '  Short summary.',
        '',
        '---',
        '(c) 2026 Newsletter Engine',
        'Unsubscribe: https://example.com/unsubscribe?token=a&b=c',
        'Preferences: https://example.com/preferences',
        '',
      ].join('\n'),
    );
  });

  it('escapes values in the default html', () => {
    const { html } = engine.render('default', ctx);

    expect(html).toContain('<title>Queues &lt;and&gt; more</title>');
    expect(html).toContain('<h1>Ops &amp; Infra</h1>');
    expect(html).toContain('<p>Hi Sam,</p>');
    expect(html).toContain(
      '<div class="article-meta">By Dana | March 01, 2026</div>',
    );
    expect(html).toContain(
      '<a href="https://example.com/unsubscribe?token=a&amp;b=c">Unsubscribe</a>',
    );
  });

  it('uses the table layout for the responsive template', () => {
    const { html } = engine.render('responsive', ctx);

    expect(html).toContain('<table role="presentation"');
    expect(html).toContain('Edition #3</td>');
    expect(html).toContain(
      '<a href="https://example.com/queues" style="color:#1a73e8;text-decoration:none;">Scaling queues</a>',
    );
  });
});
