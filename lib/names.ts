const CONNECTORS = new Set(['de', 'del', 'la', 'van', 'von', 'der', 'da', 'di', 'le', 'bin', 'al']);

export function stripEmoji(s = '') {
  return s.replace(/(\p{Extended_Pictographic}|[\uFE00-\uFE0F]|\u200D)/gu, '');
}

export function titleCaseName(raw?: string | null) {
  if (!raw) return null;
  const s = stripEmoji(String(raw)).replace(/\s+/g, ' ').trim().toLowerCase();
  if (!s) return null;
  return s
    .split(' ')
    .map((word, index) => (CONNECTORS.has(word) && index > 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join(' ');
}

function looksLikeName(s: string | null): s is string {
  if (!s) return false;
  if (/@/.test(s)) return false;
  if (/\d{3,}/.test(s)) return false;
  const letters = (s.match(/\p{L}/gu) || []).length;
  return letters >= 2;
}

export type NameSource = 'instagram_name' | 'instagram_username' | 'email_local' | 'unknown';

/** Picks a display name for a lead from whatever the profile and captured email offer. */
export function bestName(opts: { fullName?: string | null; username?: string | null; email?: string | null }): {
  name: string | null;
  source: NameSource;
} {
  const full = titleCaseName(opts.fullName);
  if (looksLikeName(full)) return { name: full, source: 'instagram_name' };

  const fromUser = titleCaseName(String(opts.username || '').replace(/[_.]+/g, ' '));
  if (looksLikeName(fromUser)) return { name: fromUser, source: 'instagram_username' };

  const local = titleCaseName((opts.email || '').split('@')[0].replace(/[._+-]+/g, ' '));
  if (looksLikeName(local)) return { name: local, source: 'email_local' };

  return { name: null, source: 'unknown' };
}
