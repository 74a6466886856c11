const ESCAPE_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string | number | null | undefined): string {
  if (value == null) {
    return '';
  }
  return String(value).replace(/[&<>"']/g, (ch) => ESCAPE_MAP[ch] ?? ch);
}

export function escapeAttr(value: string | null | undefined): string {
  return escapeHtml(value);
}
