import { randomBytes } from 'node:crypto';
import { escapeAttr } from '../../common/utils/html.util';
import { decodeHtmlEntities, sha256Hex } from '../../common/utils/text.util';

const ANCHOR_HREF_RE = /(<a\b[^>]*?\bhref=)(["'])(.*?)\2/gi;

export function createTrackingId(
  editionId: number,
  subscriberId: number,
): string {
  return sha256Hex(
    `${editionId}:${subscriberId}:${randomBytes(8).toString('hex')}`,
  ).slice(0, 16);
}

export function addTrackingPixel(
  html: string,
  trackingId: string,
  trackingBaseUrl: string,
): string {
  const src = escapeAttr(`${trackingBaseUrl}/open/${trackingId}`);
  const pixel = `<img src="${src}" width="1" height="1" alt="" />`;
  const index = html.lastIndexOf('</body>');
  if (index === -1) {
    return html + pixel;
  }
  return `${html.slice(0, index)}${pixel}${html.slice(index)}`;
}

/**
 * Rewrites anchor targets to the click redirect; mailto, fragments and tracked
 * links stay.
 */
export function addClickTracking(
  html: string,
  trackingId: string,
  trackingBaseUrl: string,
): string {
  return html.replace(
    ANCHOR_HREF_RE,
    (match, prefix: string, quote: string, href: string) => {
      const target = decodeHtmlEntities(href.trim());
      if (
        !target ||
        target.startsWith('mailto:') ||
        target.startsWith('#') ||
        target.startsWith(trackingBaseUrl)
      ) {
        return match;
      }
      const url = encodeURIComponent(target);
      const tracked = `${trackingBaseUrl}/click/${trackingId}?url=${url}`;
      return `${prefix}${quote}${escapeAttr(tracked)}${quote}`;
    },
  );
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
