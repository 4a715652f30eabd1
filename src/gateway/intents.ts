/**
 * Gateway intent bits.
 */

export const Intents = {
  GUILDS: 1 << 0,
  GUILD_MEMBERS: 1 << 1,
  GUILD_MODERATION: 1 << 2,
  GUILD_EXPRESSIONS: 1 << 3,
  GUILD_INTEGRATIONS: 1 << 4,
  GUILD_WEBHOOKS: 1 << 5,
  GUILD_INVITES: 1 << 6,
  GUILD_VOICE_STATES: 1 << 7,
  GUILD_PRESENCES: 1 << 8,
  GUILD_MESSAGES: 1 << 9,
  GUILD_MESSAGE_REACTIONS: 1 << 10,
  GUILD_MESSAGE_TYPING: 1 << 11,
  DIRECT_MESSAGES: 1 << 12,
  DIRECT_MESSAGE_REACTIONS: 1 << 13,
  DIRECT_MESSAGE_TYPING: 1 << 14,
  MESSAGE_CONTENT: 1 << 15,
  GUILD_SCHEDULED_EVENTS: 1 << 16,
} as const;

export type IntentName = keyof typeof Intents;

/** Intents that need to be switched on for the application before use. */
export const PRIVILEGED_INTENTS: number =
  Intents.GUILD_MEMBERS | Intents.GUILD_PRESENCES | Intents.MESSAGE_CONTENT;

/** Every unprivileged intent. */
export const UNPRIVILEGED_INTENTS: number = Object.values(Intents).reduce(
  (all, bit) => all | bit,
  0,
) & ~PRIVILEGED_INTENTS;

/** Combine intent names (as written in config) into a bitmask. */
export function resolveIntents(names: readonly IntentName[]): number {
  return names.reduce((mask, name) => mask | Intents[name], 0);
}

/** Names of the bits set in `mask`, in declaration order. */
export function describeIntents(mask: number): IntentName[] {
  const names: IntentName[] = [];
  for (const [name, bit] of Object.entries(Intents)) {
    if ((mask & bit) === bit && isIntentName(name)) {
      names.push(name);
    }
  }
  return names;
}

export function isIntentName(name: string): name is IntentName {
  return Object.prototype.hasOwnProperty.call(Intents, name);
}
