import type { OutgoingMessage } from './types.js';

/** Folds link buttons into the text, one `label: url` line each, for channels that only carry text. */
export function inlineButtons(message: OutgoingMessage): OutgoingMessage {
  const buttons = message.buttons ?? [];
  if (!buttons.length) return { text: message.text, quickReplies: message.quickReplies };
  const lines = buttons.map((button) => `${button.text}: ${button.url}`);
  return {
    text: [message.text, lines.join('\n')].filter(Boolean).join('\n\n'),
    quickReplies: message.quickReplies,
  };
}

/** A private reply carries exactly one message, so multi-part replies are merged. */
export function mergeForPrivateReply(messages: OutgoingMessage[]): OutgoingMessage[] {
  if (!messages.length) return [];
  const inlined = messages.map(inlineButtons);
  const last = inlined[inlined.length - 1];
  const merged: OutgoingMessage = { text: inlined.map((message) => message.text).join('\n\n') };
  if (last.quickReplies?.length) merged.quickReplies = last.quickReplies;
  return [merged];
}
