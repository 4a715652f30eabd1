import { describe, it, expect } from 'vitest';
import {
  Intents,
  PRIVILEGED_INTENTS,
  UNPRIVILEGED_INTENTS,
  describeIntents,
  isIntentName,
  resolveIntents,
} from '../intents.js';

describe('intents', () => {
  it('should combine names into a bitmask', () => {
    expect(resolveIntents(['GUILDS', 'GUILD_MESSAGES'])).toBe(513);
    expect(resolveIntents([])).toBe(0);
  });

  it('should describe a bitmask in declaration order', () => {
    expect(describeIntents(513)).toEqual(['GUILDS', 'GUILD_MESSAGES']);
    expect(describeIntents(PRIVILEGED_INTENTS)).toEqual([
      'GUILD_MEMBERS',
      'GUILD_PRESENCES',
      'MESSAGE_CONTENT',
    ]);
  });

  it('should keep privileged intents out of the unprivileged set', () => {
    expect(UNPRIVILEGED_INTENTS & PRIVILEGED_INTENTS).toBe(0);
    expect(UNPRIVILEGED_INTENTS & Intents.GUILDS).toBe(Intents.GUILDS);
    expect(UNPRIVILEGED_INTENTS | PRIVILEGED_INTENTS).toBe((1 << 17) - 1);
  });

  it('should recognise intent names', () => {
    expect(isIntentName('GUILD_WEBHOOKS')).toBe(true);
    expect(isIntentName('GUILD_WEBHOOK')).toBe(false);
    expect(isIntentName('toString')).toBe(false);
  });
});
