import { describe, expect, test } from 'vitest';
import { isFollowConfirmation } from '../lib/flow/confirmations.js';

describe('isFollowConfirmation', () => {
  test.each(['done', 'Yes!!', '👍', "I'm following", 'i am following you now', 'Just followed ✨', 'follow'])(
    'accepts %s',
    (text) => {
      expect(isFollowConfirmation(text)).toBe(true);
    },
  );

  test.each(['hello', 'unfollowed', 'what is this?', '', null])('rejects %s', (text) => {
    expect(isFollowConfirmation(text)).toBe(false);
  });
});
