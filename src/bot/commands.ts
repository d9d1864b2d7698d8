import { messages } from '../messages';
import type { ReminderScheduler } from '../scheduler/reminderScheduler';
import type { CommandEvent, DeliveryGateway } from '../services/deliveryGateway';
import type { NotificationDispatcher } from '../services/notificationDispatcher';
import type { SubscriptionService } from '../services/subscriptionService';
import { errorMessage, log, logError } from '../utils/logger';
import type { TimeOfDay } from '../utils/time';

export interface BotHandlerDeps {
    gateway: DeliveryGateway;
    dispatcher: NotificationDispatcher;
    subscriptions: SubscriptionService;
    scheduler: ReminderScheduler;
    reminderTimes: readonly TimeOfDay[];
}

export function createCommandHandler({ dispatcher, subscriptions, reminderTimes }: BotHandlerDeps) {
    return async ({ chatId, command }: CommandEvent): Promise<void> => {
        try {
            switch (command) {
                case 'start': {
                    const outcome = await subscriptions.subscribe(chatId);
                    log(`[BOT] /start from ${chatId}: ${outcome}`);
                    await dispatcher.reply(
                        chatId,
                        outcome === 'already_subscribed' ? messages.alreadySubscribed() : messages.welcome(reminderTimes)
                    );
                    return;
                }
                case 'stop': {
                    const outcome = await subscriptions.unsubscribe(chatId);
                    log(`[BOT] /stop from ${chatId}: ${outcome}`);
                    await dispatcher.reply(
                        chatId,
                        outcome === 'unsubscribed' ? messages.goodbye() : messages.notSubscribed()
                    );
                    return;
                }
                case 'status': {
                    const subscriber = await subscriptions.status(chatId);
                    await dispatcher.reply(
                        chatId,
                        subscriber?.subscribed ? messages.status(subscriber) : messages.notSubscribed()
                    );
                    return;
                }
                default:
                    return;
            }
        } catch (error) {
            logError(`Error in /${command}:`, errorMessage(error));
            await dispatcher.reply(chatId, messages.requestFailed());
        }
    };
}

export function registerBotHandlers(deps: BotHandlerDeps): void {
    const { gateway, scheduler } = deps;

    gateway.onCommand(createCommandHandler(deps));
    gateway.onInteraction(async ({ chatId, timestamp, kind }) => {
        await scheduler.recordInteraction(chatId, timestamp, kind);
    });
}
