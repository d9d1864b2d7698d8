import type { CalendarDate } from '../utils/time';

export type ChatId = number;

export interface Subscriber {
    chat_id: ChatId;
    subscribed: boolean;
    subscribed_on: CalendarDate;
    last_interaction_date: CalendarDate | null;
    consecutive_silent_days: number;
    escalated: boolean;
    last_reminder_sent_at: Date | null;
    created_at: Date;
    updated_at: Date;
}

export interface CreateSubscriberDto {
    chat_id: ChatId;
    subscribed_on: CalendarDate;
    now: Date;
}

export function newSubscriber({ chat_id, subscribed_on, now }: CreateSubscriberDto): Subscriber {
    return {
        chat_id,
        subscribed: true,
        subscribed_on,
        last_interaction_date: null,
        consecutive_silent_days: 0,
        escalated: false,
        last_reminder_sent_at: null,
        created_at: now,
        updated_at: now,
    };
}

/**
 * Receives the stored row (null when there is none) and returns the row to
 * write, or null to leave the store untouched.
 */
export type SubscriberMutation = (current: Subscriber | null) => Subscriber | null;

export interface SubscriberStore {
    get(chatId: ChatId): Promise<Subscriber | null>;
    upsert(subscriber: Subscriber): Promise<void>;
    listSubscribed(): Promise<Subscriber[]>;
    /** Atomic read-modify-write of one row. Resolves to the written row, or null when nothing was written. */
    modify(chatId: ChatId, mutate: SubscriberMutation): Promise<Subscriber | null>;
    close(): Promise<void>;
}
