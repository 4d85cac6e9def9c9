import { readFileSync } from 'node:fs';

let blocklist: Set<string> | null = null;

function loadBlocklist(): Set<string> {
  if (blocklist) return blocklist;
  const domains = new Set<string>();
  const raw = readFileSync(new URL('../data/disposable-domains.txt', import.meta.url), 'utf8');
  for (const line of raw.split(/\r?\n/)) {
    const domain = line.trim().toLowerCase();
    if (domain && !domain.startsWith('#')) domains.add(domain);
  }
  blocklist = domains;
  return domains;
}

export function isDisposableEmail(email?: string | null): boolean {
  if (!email || !email.includes('@')) return false;
  const domain = email.trim().toLowerCase().split('@').pop() ?? '';
  const list = loadBlocklist();
  const labels = domain.split('.');
  for (let i = 0; i < labels.length - 1; i += 1) {
    if (list.has(labels.slice(i).join('.'))) return true;
  }
  return false;
}
