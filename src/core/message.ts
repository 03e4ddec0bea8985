/**
 * Platform-neutral message model.
 *
 * Adapters map native payloads into these shapes. The edit tracker owns
 * copies of trigger messages and patches them from partial update events,
 * so every field that an update may carry is listed in `MessageUpdate`.
 */

export interface User {
  id: string;
  username: string;
  bot: boolean;
}

export interface Attachment {
  id: string;
  filename: string;
  url: string;
  size: number;
  contentType?: string;
}

export interface Embed {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
  footer?: { text: string };
}

export interface Message {
  id: string;
  channelId: string;
  guildId?: string;
  /** Platform message type (0 = default). */
  kind: number;
  content: string;
  tts: boolean;
  pinned: boolean;
  /** Milliseconds since epoch. */
  timestamp: number;
  /** Milliseconds since epoch, null when never edited. */
  editedTimestamp: number | null;
  author: User;
  mentionEveryone: boolean;
  mentions: User[];
  mentionRoles: string[];
  attachments: Attachment[];
  embeds: Embed[];
}

/**
 * Partial message update. Identity fields are always present; everything
 * else is only set when the platform sent it.
 */
export interface MessageUpdate {
  id: string;
  channelId: string;
  guildId?: string;
  kind?: number;
  content?: string;
  tts?: boolean;
  pinned?: boolean;
  timestamp?: number;
  editedTimestamp?: number;
  author?: User;
  mentionEveryone?: boolean;
  mentions?: User[];
  mentionRoles?: string[];
  attachments?: Attachment[];
  embeds?: Embed[];
}

const UNKNOWN_USER: User = { id: '0', username: '', bot: false };

export function createEmptyMessage(id: string, channelId: string): Message {
  return {
    id,
    channelId,
    kind: 0,
    content: '',
    tts: false,
    pinned: false,
    timestamp: 0,
    editedTimestamp: null,
    author: { ...UNKNOWN_USER },
    mentionEveryone: false,
    mentions: [],
    mentionRoles: [],
    attachments: [],
    embeds: [],
  };
}

export function cloneMessage(message: Message): Message {
  return {
    ...message,
    author: { ...message.author },
    mentions: message.mentions.map((user) => ({ ...user })),
    mentionRoles: [...message.mentionRoles],
    attachments: message.attachments.map((attachment) => ({ ...attachment })),
    embeds: message.embeds.map((embed) => ({ ...embed })),
  };
}

/**
 * Apply the fields present on `update` to `message` in place.
 *
 * Embeds are never refreshed from updates; a trigger keeps the embeds it
 * was created with.
 */
export function mergeMessageUpdate(message: Message, update: MessageUpdate): void {
  message.id = update.id;
  message.channelId = update.channelId;
  message.guildId = update.guildId;

  if (update.kind !== undefined) message.kind = update.kind;
  if (update.content !== undefined) message.content = update.content;
  if (update.tts !== undefined) message.tts = update.tts;
  if (update.pinned !== undefined) message.pinned = update.pinned;
  if (update.timestamp !== undefined) message.timestamp = update.timestamp;
  if (update.editedTimestamp !== undefined) message.editedTimestamp = update.editedTimestamp;
  if (update.author !== undefined) message.author = { ...update.author };
  if (update.mentionEveryone !== undefined) message.mentionEveryone = update.mentionEveryone;
  if (update.mentions !== undefined) message.mentions = update.mentions.map((user) => ({ ...user }));
  if (update.mentionRoles !== undefined) message.mentionRoles = [...update.mentionRoles];
  if (update.attachments !== undefined) message.attachments = update.attachments.map((a) => ({ ...a }));
}

/** Timestamp of the last change to a message: edit time, or creation time if never edited. */
export function lastUpdatedAt(message: Message): number {
  return message.editedTimestamp ?? message.timestamp;
}
