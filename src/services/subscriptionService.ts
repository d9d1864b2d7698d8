import { ChatId, newSubscriber, Subscriber, SubscriberStore } from '../models/Subscriber';
import type { Clock } from '../scheduler/reminderScheduler';
import { calendarDate } from '../utils/time';

export type SubscribeOutcome = 'created' | 'resubscribed' | 'already_subscribed';
export type UnsubscribeOutcome = 'unsubscribed' | 'not_subscribed';

export interface SubscriptionSettings {
    timezone: string;
    resetSilenceOnResubscribe: boolean;
}

export class SubscriptionService {
    constructor(
        private readonly store: SubscriberStore,
        private readonly settings: SubscriptionSettings,
        private readonly clock: Clock
    ) {}

    async subscribe(chatId: ChatId): Promise<SubscribeOutcome> {
        const now = this.clock.now();
        const today = calendarDate(now, this.settings.timezone);
        let outcome: SubscribeOutcome = 'already_subscribed';

        await this.store.modify(chatId, current => {
            if (!current) {
                outcome = 'created';
                return newSubscriber({ chat_id: chatId, subscribed_on: today, now });
            }
            if (current.subscribed) {
                outcome = 'already_subscribed';
                return null;
            }

            outcome = 'resubscribed';
            if (!this.settings.resetSilenceOnResubscribe) {
                return { ...current, subscribed: true, updated_at: now };
            }
            // the streak restarts; last_interaction_date is kept as history
            return {
                ...current,
                subscribed: true,
                subscribed_on: today,
                consecutive_silent_days: 0,
                escalated: false,
                updated_at: now,
            };
        });

        return outcome;
    }

    async unsubscribe(chatId: ChatId): Promise<UnsubscribeOutcome> {
        const updated = await this.store.modify(chatId, current =>
            current?.subscribed ? { ...current, subscribed: false, updated_at: this.clock.now() } : null
        );
        return updated ? 'unsubscribed' : 'not_subscribed';
    }

    async status(chatId: ChatId): Promise<Subscriber | null> {
        return this.store.get(chatId);
    }
}
