import { logger } from '../middleware/logger.js';
import { startPurgeTask, type PurgeTask } from './edit-tracker.js';
import { dispatchMessage, type DispatchFailure } from './dispatch.js';
import { describeErrorContext, type ErrorContext } from './errors.js';
import { dispatchInteraction } from './interaction.js';
import { OnceCell } from './once-cell.js';
import { createFrameworkOptions, type FrameworkOptions } from './options.js';
import type { FrameworkEvent, PlatformClient, ReadyPayload } from './platform.js';

/**
 * Builds the user data once the bot is logged in, so the bot identity and
 * connected guilds are available to it.
 */
export type SetupCallback<U> = (params: {
  platform: PlatformClient;
  ready: ReadyPayload;
  framework: Framework<U>;
}) => Promise<U>;

export interface FrameworkParams<U> {
  platform: PlatformClient;
  setup: SetupCallback<U>;
  options?: FrameworkOptions<U> | Partial<FrameworkOptions<U>>;
  /** Known ahead of the first ready event when configured. */
  applicationId?: string;
}

/**
 * Ties prefix resolution, routing, permission checks, edit tracking and
 * error routing together for every incoming platform event.
 */
export class Framework<U> {
  readonly options: FrameworkOptions<U>;
  readonly platform: PlatformClient;

  private setup: SetupCallback<U> | null;
  private readonly userData = new OnceCell<U>();
  private currentBotId: string | null = null;
  private currentApplicationId: string | null;
  private purgeTask: PurgeTask | null = null;
  private running = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(params: FrameworkParams<U>) {
    this.platform = params.platform;
    this.setup = params.setup;
    this.options = createFrameworkOptions(params.options);
    this.currentApplicationId = params.applicationId ?? null;
  }

  /** The bot's own user id, known after the first ready event. */
  get botId(): string | null {
    return this.currentBotId;
  }

  get applicationId(): string | null {
    return this.currentApplicationId;
  }

  /**
   * Resolves with the user data, waiting for setup to finish when it
   * hasn't yet.
   */
  getUserData(): Promise<U> {
    return this.userData.wait();
  }

  /**
   * Consume platform events until the source ends or `shutdown()` is called.
   * Each event is handled as its own task; handling order between events
   * is not guaranteed.
   */
  async start(events: AsyncIterable<FrameworkEvent>): Promise<void> {
    if (this.running) throw new Error('Framework is already running');
    this.running = true;

    if (this.options.editTracker) {
      this.purgeTask = startPurgeTask(this.options.editTracker);
    }
    logger.info({
      commands: this.options.commands.length,
      editTracking: Boolean(this.options.editTracker),
    }, 'Framework started');

    try {
      for await (const event of events) {
        if (!this.running) break;
        this.spawn(event);
      }
    } finally {
      this.shutdown();
    }
  }

  /** Stop the purge task and stop consuming events. Running commands are not interrupted. */
  shutdown(): void {
    if (this.purgeTask) {
      this.purgeTask.stop();
      this.purgeTask = null;
    }
    if (this.running) {
      this.running = false;
      logger.info({ inFlight: this.inFlight.size }, 'Framework stopped');
    }
  }

  /** Wait for every event task spawned so far. */
  async idle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private spawn(event: FrameworkEvent): void {
    const task = this.handleEvent(event)
      .catch((err: unknown) => {
        logger.error({ err, event: event.type }, 'Event handling failed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  async handleEvent(event: FrameworkEvent): Promise<void> {
    switch (event.type) {
      case 'ready':
        await this.handleReady(event.ready);
        break;

      case 'messageCreate': {
        const failure = await dispatchMessage(this, this.platform, event.message, false);
        if (failure) await this.routeCommandError(failure);
        break;
      }

      case 'messageUpdate': {
        const tracker = this.options.editTracker;
        if (!tracker) break;
        const message = tracker.applyUpdate(event.update);
        const failure = await dispatchMessage(this, this.platform, message, true);
        if (failure) await this.routeCommandError(failure);
        break;
      }

      case 'messageDelete': {
        const response = this.options.editTracker?.takeResponse(event.messageId);
        if (!response) break;
        try {
          await this.platform.deleteMessage(response.channelId, response.id);
        } catch (err) {
          logger.warn(
            { err, triggerId: event.messageId, responseId: response.id },
            'Could not delete bot response after the trigger message was deleted',
          );
        }
        break;
      }

      case 'interactionCreate': {
        if (event.interaction.kind !== 'applicationCommand') break;
        const failure = await dispatchInteraction(this, this.platform, event.interaction);
        if (failure) await this.routeCommandError(failure);
        break;
      }

      case 'other':
        break;
    }

    // After ready handling, otherwise the first ready event would wait on its own setup
    const data = await this.getUserData();
    try {
      await this.options.listener(event, this, data);
    } catch (error) {
      await this.reportError(error, { type: 'listener', event });
    }
  }

  private async handleReady(ready: ReadyPayload): Promise<void> {
    this.currentBotId = ready.user.id;
    if (ready.applicationId) this.currentApplicationId = ready.applicationId;

    const setup = this.setup;
    this.setup = null;
    if (!setup) {
      // Reconnects deliver ready again
      logger.debug({ botId: ready.user.id }, 'Ignoring repeated ready event for setup');
      return;
    }

    logger.info({ botId: ready.user.id, username: ready.user.username, guilds: ready.guildIds.length }, 'Bot ready, running setup');
    try {
      const data = await setup({ platform: this.platform, ready, framework: this });
      this.userData.set(data);
    } catch (error) {
      await this.reportError(error, { type: 'setup' });
    }
  }

  private async routeCommandError(failure: DispatchFailure<U>): Promise<void> {
    const handler = failure.context.command.options.onError;
    if (!handler) {
      await this.reportError(failure.error, { type: 'command', context: failure.context });
      return;
    }

    try {
      await handler(failure.error, failure.context);
    } catch (err) {
      logger.error({ err, cause: failure.error, command: failure.context.command.name }, 'Command error handler failed');
    }
  }

  private async reportError(error: unknown, ctx: ErrorContext<U>): Promise<void> {
    try {
      await this.options.onError(error, ctx);
    } catch (err) {
      logger.error({ err, cause: error, ...describeErrorContext(ctx) }, 'Framework error handler failed');
    }
  }
}
