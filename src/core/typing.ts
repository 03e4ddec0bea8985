import { logger } from '../middleware/logger.js';
import type { BroadcastTypingBehavior } from './commands.js';
import type { PlatformClient } from './platform.js';

/** Typing indicators expire after ~10s on the platform; refresh before that. */
export const TYPING_REFRESH_MS = 7000;

/**
 * Run `action` while broadcasting a typing indicator in `channelId`
 * according to `behavior`. The indicator stops when the action settles.
 */
export async function withTyping<T>(
  platform: PlatformClient,
  channelId: string,
  behavior: BroadcastTypingBehavior,
  action: () => Promise<T>,
): Promise<T> {
  if (behavior.kind === 'none') return action();

  let refreshTimer: ReturnType<typeof setInterval> | null = null;

  const sendTyping = async () => {
    try {
      await platform.broadcastTyping(channelId);
    } catch (err) {
      logger.warn({ err, channelId }, 'Typing broadcast failed');
    }
  };

  const delayTimer = setTimeout(() => {
    void sendTyping();
    refreshTimer = setInterval(() => {
      void sendTyping();
    }, TYPING_REFRESH_MS);
  }, behavior.delayMs);

  try {
    return await action();
  } finally {
    clearTimeout(delayTimer);
    if (refreshTimer) clearInterval(refreshTimer);
  }
}
