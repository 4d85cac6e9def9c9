import { findPhoneNumbersInText, type CountryCode } from 'libphonenumber-js';

export type EmailGuess = { email: string; confidence: number };

const EMAIL_IN_TEXT = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;
const EMAIL_EXACT = /^[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}$/i;
const PHONE_NOISE = /[\s\-()+.]/g;

export function extractEmail(raw?: string | null): EmailGuess | null {
  if (!raw) return null;
  const text = String(raw).replace(/\s+/g, ' ').trim();
  if (!text) return null;
  const match = text.match(EMAIL_IN_TEXT);
  if (!match) return null;
  const found = match[0];
  const [localPart, domain = ''] = found.split('@');
  const email = `${localPart}@${domain.toLowerCase()}`;
  const confidence = text.replace(found, '').trim() === '' ? 0.9 : 0.7;
  return { email, confidence };
}

export function isValidEmail(value?: string | null): boolean {
  return Boolean(value && EMAIL_EXACT.test(value.trim()));
}

/**
 * Finds a phone number in free text and returns it as E.164.
 * Numbers without a country prefix only parse when `defaultCountry` is given;
 * otherwise a bare run of 10-15 digits is accepted as-is.
 */
export function extractPhone(raw?: string | null, defaultCountry?: CountryCode): string | null {
  if (!raw) return null;
  const text = String(raw).trim();
  if (!text || EMAIL_IN_TEXT.test(text)) return null;

  const found = findPhoneNumbersInText(text, defaultCountry);
  for (const candidate of found) {
    if (candidate.number.isValid()) return candidate.number.number;
  }

  const digits = text.replace(PHONE_NOISE, '');
  if (/^\d{10,15}$/.test(digits)) return `+${digits}`;
  return null;
}
