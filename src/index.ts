import 'dotenv/config';
import TelegramBot from 'node-telegram-bot-api';
import { registerBotHandlers } from './bot/commands';
import { createPool, getDatabaseConfig } from './config/database';
import { AppConfig, loadConfig } from './config/env';
import type { SubscriberStore } from './models/Subscriber';
import { createPostgresSubscriberStore, initSchema } from './repositories/postgresSubscribersRepository';
import { openSqliteSubscriberStore } from './repositories/subscribersRepository';
import { ReminderScheduler, systemClock } from './scheduler/reminderScheduler';
import { NotificationDispatcher } from './services/notificationDispatcher';
import { SubscriptionService } from './services/subscriptionService';
import { ALLOWED_UPDATES, fromTelegramBot, TelegramGateway } from './services/telegramGateway';
import { errorMessage, log, logError, logWarn } from './utils/logger';
import { formatTimeOfDay } from './utils/time';

async function openStore(config: AppConfig): Promise<SubscriberStore> {
    if (config.store.driver === 'postgres') {
        const pool = createPool(getDatabaseConfig(config.store.postgres));
        await initSchema(pool);
        log('[DB] Using PostgreSQL subscriber store');
        return createPostgresSubscriberStore(pool);
    }

    log(`[DB] Using SQLite subscriber store at ${config.store.dbPath}`);
    return openSqliteSubscriberStore(config.store.dbPath);
}

async function start() {
    const config = loadConfig();
    const store = await openStore(config);

    const bot = new TelegramBot(config.telegramToken, {
        polling: {
            interval: 1000,
            autoStart: true,
            params: {
                timeout: 10,
                allowed_updates: ALLOWED_UPDATES
            }
        }
    });

    bot.on('polling_error', (error: Error) => {
        logError('[Telegram Polling Error]:', errorMessage(error));
    });

    const gateway = new TelegramGateway(fromTelegramBot(bot), config.sendTimeoutMs);
    const dispatcher = new NotificationDispatcher(gateway, config.adminChatId);
    const scheduler = new ReminderScheduler({ config, store, dispatcher });
    const subscriptions = new SubscriptionService(store, config, systemClock);

    registerBotHandlers({
        gateway,
        dispatcher,
        subscriptions,
        scheduler,
        reminderTimes: config.reminderTimes,
    });

    scheduler.start();
    log('✅ Telegram bot started');
    log(`✅ Reminders at ${config.reminderTimes.map(formatTimeOfDay).join(' and ')}, ` +
        `sweep at ${formatTimeOfDay(config.sweepTime)} (${config.timezone}), ` +
        `escalation after ${config.inactivityThresholdDays} silent days`);
    if (!dispatcher.hasAdmin) {
        logWarn('ADMIN_ID is not set, inactivity alerts go to subscribers only');
    }

    let stopping = false;
    const shutdown = async (signal: string) => {
        if (stopping) return;
        stopping = true;
        log(`Received ${signal}, shutting down...`);

        await scheduler.stop();
        await bot.stopPolling();
        await store.close();
        log('Bot stopped.');
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(error => {
                logError('Shutdown failed:', errorMessage(error));
                process.exitCode = 1;
            });
        });
    }
}

start().catch(error => {
    logError('Failed to start:', errorMessage(error));
    process.exitCode = 1;
});
