import type { AppServices } from './app';
import type { ChannelAdapter } from './channels/channel-adapter';
import { TelegramChannel } from './channels/telegram.channel';
import { config } from './config';
import { ProjectCatalogue } from './config/projects';
import { AIService } from './services/ai.service';
import { MessageCoordinator } from './services/message-coordinator.service';
import { MirrorPublisher } from './services/mirror-publisher.service';
import { MirrorReconciler } from './services/mirror-reconciler.service';
import { SheetsMirrorGateway } from './services/sheets-mirror.service';
import { SlotAllocator } from './services/slot-allocator.service';
import { AssistantTurnProcessor } from './services/turn-processor.service';
import { TurnRunner } from './services/turn-runner.service';
import { PgBookingStore } from './stores/pg-booking.store';
import { PgDialogueStore } from './stores/pg-dialogue.store';
import { PgQueueStore } from './stores/pg-queue.store';
import { createAnthropicClient } from './utils/anthropic-client';
import { checkDatabaseHealth, pool } from './utils/database';
import { todayIn } from './utils/date-parser';
import { logger } from './utils/logger';
import { redis } from './utils/redis';
import { createRedisLocks } from './utils/redis-locks';

/**
 * Wire the production object graph from config. Everything below takes its
 * collaborators through constructors; this is the only place that picks the
 * Postgres, Sheets, Redis, Anthropic and Telegram implementations.
 */
export function createServices(): AppServices {
  const catalogue = ProjectCatalogue.fromFile(config.projectsFile);
  const today = () => todayIn(config.timezone);

  const queueStore = new PgQueueStore(pool);
  const bookingStore = new PgBookingStore(pool);
  const dialogues = new PgDialogueStore(pool);

  const mirror = new SheetsMirrorGateway({
    catalogue,
    defaultSheetId: config.googleSheetId,
    credentialsFile: config.googleCredentialsFile,
  });
  const publisher = new MirrorPublisher(bookingStore, mirror, catalogue);
  const allocator = new SlotAllocator({ store: bookingStore, catalogue, mirror, publisher, today });

  const reconciler = new MirrorReconciler({
    store: bookingStore,
    catalogue,
    mirror,
    publisher,
    locks: createRedisLocks(redis),
    settings: {
      enabled: config.mirror.reconcileEnabled,
      intervalMs: config.mirror.reconcileIntervalMs,
      days: config.mirror.reconcileDays,
    },
    today,
  });

  const completion = new AIService(createAnthropicClient(config.anthropicApiKey), {
    model: config.anthropicModel,
  });
  const processor = new AssistantTurnProcessor({ completion, allocator, dialogues, today });
  const coordinator = new MessageCoordinator(queueStore);
  const runner = new TurnRunner(coordinator, processor, catalogue, dialogues);

  let telegram: ChannelAdapter | null = null;
  if (config.telegramBotToken) {
    telegram = new TelegramChannel(config.telegramBotToken);
  } else {
    logger.info('TELEGRAM_BOT_TOKEN not set - Telegram webhook disabled');
  }

  logger.info(
    { projects: catalogue.list().map((project) => project.id), timezone: config.timezone },
    'Services wired'
  );

  return {
    coordinator,
    allocator,
    reconciler,
    runner,
    catalogue,
    dialogues,
    telegram,
    checkDatabase: checkDatabaseHealth,
    checkRedis: () => redis.checkHealth(),
  };
}
