import { isSupportedCountry, type CountryCode } from 'libphonenumber-js';
import { z } from 'zod';

// Instagram Messaging limits.
export const DM_TEXT_MAX = 1000;
export const BUTTON_TEMPLATE_TEXT_MAX = 640;
export const COMMENT_TEXT_MAX = 2200;
export const KEYWORDS_MAX = 50;
export const KEYWORD_LENGTH_MAX = 100;
export const BUTTON_TEXT_MAX = 20;
export const BUTTONS_MAX = 3;

export const DEFAULT_MESSAGES = {
  message_template: "Here's the link you asked for! 🎉",
  ask_to_follow_message: 'Hey! Would you mind following me? I share great content! 🙌',
  follow_recheck_message: "Hmm, I can't see your follow yet 👀 Follow the account, then tap the button again!",
  follow_no_exit_message: 'Almost there! Follow the account and tap the button below to unlock the link 🙌',
  ask_for_email_message: "Quick question - what's your email? I'd love to send you something special! 📧",
  email_success_message: 'Got it, thanks! ✅',
  email_retry_message:
    "Hmm, that doesn't look like a valid email address. 🤔\n\nPlease type it again so I can send you the guide! 📧",
  email_friendly_reminder:
    'I see you confirmed following! 👋\n\nNow I just need your email address so I can send you the guide! 📧',
  email_disposable_message: 'That looks like a temporary inbox 🙈 Could you share an email you actually check?',
  ask_for_phone_message: "Last step! What's the best phone number to reach you? 📱",
  phone_invalid_retry_message:
    "That doesn't look like a valid phone number 🤔 Please include your country code, e.g. +1 202 456 1111.",
  phone_got_email_message: 'Thanks, I have your email! Now I just need your phone number 📱',
  simple_flow_message: "Hey! Reply with your email and I'll send it right over 📧",
  simple_flow_email_question: "What's your email address? 📧",
  simple_flow_phone_message: "Hey! Reply with your phone number and I'll send it right over 📱",
  simple_flow_phone_question: "What's your phone number? 📱",
} as const;

export type MessageKey = keyof typeof DEFAULT_MESSAGES;

function coerceBoolean(value: unknown) {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function blankToUndefined(value: unknown) {
  if (value === null) return undefined;
  if (typeof value === 'string' && !value.trim()) return undefined;
  return value;
}

const flag = (fallback: boolean) => z.preprocess(coerceBoolean, z.boolean().default(fallback));

const dmText = (key: MessageKey) =>
  z.preprocess(blankToUndefined, z.string().trim().max(DM_TEXT_MAX).default(DEFAULT_MESSAGES[key]));

const optionalDmText = z.preprocess(blankToUndefined, z.string().trim().max(DM_TEXT_MAX).optional());

const buttonLabel = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().max(BUTTON_TEXT_MAX).default(fallback));

export const linkButtonSchema = z.object({
  text: z.string().trim().min(1).max(BUTTON_TEXT_MAX),
  url: z.string().trim().url(),
});

export const ruleConfigSchema = z
  .object({
    flow_mode: z.enum(['standard', 'simple']).default('standard'),
    ask_to_follow: flag(false),
    verify_follow: flag(true),
    follow_no_exit: flag(false),
    ask_for_email: flag(false),
    ask_for_phone: flag(false),
    skip_known_steps: flag(true),
    auto_reply_to_comments: flag(false),
    block_disposable_emails: flag(true),
    send_email_success: flag(true),
    max_retries: z.coerce.number().int().min(1).max(10).default(3),
    phone_default_country: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .toUpperCase()
        .refine((value) => isSupportedCountry(value), { message: 'Unsupported country code' })
        .optional(),
    ),
    opening_message: optionalDmText,
    opening_button_text: buttonLabel('Send me the link'),
    follow_button_text: buttonLabel("I'm following"),
    message_variations: z.array(z.string().trim().min(1).max(DM_TEXT_MAX)).max(10).default([]),
    comment_replies: z.array(z.string().trim().min(1).max(COMMENT_TEXT_MAX)).max(10).default([]),
    buttons: z.array(linkButtonSchema).max(BUTTONS_MAX).default([]),
    message_template: dmText('message_template'),
    ask_to_follow_message: dmText('ask_to_follow_message'),
    follow_recheck_message: dmText('follow_recheck_message'),
    follow_no_exit_message: dmText('follow_no_exit_message'),
    ask_for_email_message: dmText('ask_for_email_message'),
    email_success_message: dmText('email_success_message'),
    email_retry_message: dmText('email_retry_message'),
    email_friendly_reminder: dmText('email_friendly_reminder'),
    email_disposable_message: dmText('email_disposable_message'),
    ask_for_phone_message: dmText('ask_for_phone_message'),
    phone_invalid_retry_message: dmText('phone_invalid_retry_message'),
    phone_got_email_message: dmText('phone_got_email_message'),
    simple_flow_message: dmText('simple_flow_message'),
    simple_flow_email_question: dmText('simple_flow_email_question'),
    simple_flow_phone_message: dmText('simple_flow_phone_message'),
    simple_flow_phone_question: dmText('simple_flow_phone_question'),
  })
  .superRefine((config, ctx) => {
    if (!config.buttons.length) return;
    // Rewards with buttons go out as a button template, which has a shorter text limit.
    const texts = [config.message_template, ...config.message_variations];
    texts.forEach((text, index) => {
      if (text.length > BUTTON_TEMPLATE_TEXT_MAX) {
        ctx.addIssue({
          code: z.ZodIssueCode.too_big,
          maximum: BUTTON_TEMPLATE_TEXT_MAX,
          inclusive: true,
          type: 'string',
          path: index === 0 ? ['message_template'] : ['message_variations', index - 1],
          message: `Must be at most ${BUTTON_TEMPLATE_TEXT_MAX} characters when buttons are set`,
        });
      }
    });
  });

export type RuleConfig = z.output<typeof ruleConfigSchema>;

export type ConfigParseResult = { ok: true; config: RuleConfig } | { ok: false; issues: z.ZodIssue[] };

export function parseRuleConfig(raw: unknown): ConfigParseResult {
  const parsed = ruleConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) return { ok: false, issues: parsed.error.issues };
  return { ok: true, config: parsed.data };
}

export function defaultRuleConfig(): RuleConfig {
  return ruleConfigSchema.parse({});
}

export function phoneCountry(config: RuleConfig): CountryCode | undefined {
  const country = config.phone_default_country;
  return country && isSupportedCountry(country) ? country : undefined;
}

export type TemplateVars = Partial<Record<'username' | 'name' | 'email' | 'phone' | 'keyword', string | null>>;

/** Known placeholders always render; `{name}` falls back to the username, the rest to empty. */
export function renderTemplate(text: string, vars: TemplateVars): string {
  return text.replace(/\{(username|name|email|phone|keyword)\}/g, (_match, key: keyof TemplateVars) => {
    const value = key === 'name' ? vars.name || vars.username : vars[key];
    return value ?? '';
  });
}
