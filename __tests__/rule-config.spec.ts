import { describe, expect, test } from 'vitest';
import {
  DEFAULT_MESSAGES,
  defaultRuleConfig,
  parseRuleConfig,
  phoneCountry,
  renderTemplate,
} from '../lib/flow/config.js';

describe('parseRuleConfig', () => {
  test('fills defaults for an empty config', () => {
    const config = defaultRuleConfig();
    expect(config).toMatchObject({
      flow_mode: 'standard',
      ask_to_follow: false,
      verify_follow: true,
      skip_known_steps: true,
      block_disposable_emails: true,
      max_retries: 3,
      opening_button_text: 'Send me the link',
      buttons: [],
      message_template: DEFAULT_MESSAGES.message_template,
    });
    expect(config.opening_message).toBeUndefined();
  });

  test('coerces legacy string booleans and blank texts', () => {
    const parsed = parseRuleConfig({ ask_for_email: 'true', verify_follow: 'false', ask_for_email_message: '   ' });
    if (!parsed.ok) throw new Error('expected a valid config');
    expect(parsed.config.ask_for_email).toBe(true);
    expect(parsed.config.verify_follow).toBe(false);
    expect(parsed.config.ask_for_email_message).toBe(DEFAULT_MESSAGES.ask_for_email_message);
  });

  test('normalizes the default phone country', () => {
    const parsed = parseRuleConfig({ phone_default_country: 'us' });
    if (!parsed.ok) throw new Error('expected a valid config');
    expect(phoneCountry(parsed.config)).toBe('US');
    expect(parseRuleConfig({ phone_default_country: 'ZZ' }).ok).toBe(false);
  });

  test('enforces Instagram length and count limits', () => {
    const tooLong = parseRuleConfig({ message_template: 'x'.repeat(1001) });
    expect(tooLong.ok).toBe(false);

    const buttons = Array.from({ length: 4 }, (_, index) => ({ text: `B${index}`, url: 'https://example.com' }));
    const tooMany = parseRuleConfig({ buttons });
    expect(tooMany.ok ? [] : tooMany.issues.map((issue) => issue.path.join('.'))).toEqual(['buttons']);

    const longLabel = parseRuleConfig({ buttons: [{ text: 'x'.repeat(21), url: 'https://example.com' }] });
    expect(longLabel.ok).toBe(false);
  });

  test('caps the reward text at the button template limit when buttons are set', () => {
    const parsed = parseRuleConfig({
      message_template: 'x'.repeat(700),
      buttons: [{ text: 'Open', url: 'https://example.com' }],
    });
    expect(parsed.ok ? [] : parsed.issues.map((issue) => issue.path.join('.'))).toEqual(['message_template']);
    expect(parseRuleConfig({ message_template: 'x'.repeat(700) }).ok).toBe(true);
  });
});

describe('renderTemplate', () => {
  test('fills known placeholders and leaves unknown ones', () => {
    expect(renderTemplate('Hi {username}! {email} / {unknown}', { username: 'ana', email: 'a@example.com' })).toBe(
      'Hi ana! a@example.com / {unknown}',
    );
  });

  test('never leaks a known placeholder without a value', () => {
    expect(renderTemplate('Hi {name}! [{phone}] [{keyword}]', { username: 'ana', phone: null })).toBe('Hi ana! [] []');
    expect(renderTemplate('Hi {name}!', { name: 'Ana Sofia', username: 'ana' })).toBe('Hi Ana Sofia!');
    expect(renderTemplate('Hi {name}!', {})).toBe('Hi !');
  });
});
