import type { ChatId, Subscriber, SubscriberMutation, SubscriberStore } from '../../src/models/Subscriber';
import type { Clock, CronRunner, ScheduledJob, SchedulerConfig } from '../../src/scheduler/reminderScheduler';
import {
    CommandEvent,
    DeliveryError,
    DeliveryGateway,
    DeliveryResult,
    EventHandler,
    InteractionEvent
} from '../../src/services/deliveryGateway';

export const ADMIN_CHAT_ID = 9999;

export const schedulerConfig: SchedulerConfig = {
    timezone: 'Asia/Tokyo',
    reminderTimes: [{ hour: 10, minute: 0 }, { hour: 22, minute: 0 }],
    sweepTime: { hour: 9, minute: 0 },
    inactivityThresholdDays: 3,
    resetSilenceOnResubscribe: true,
};

export function makeSubscriber(overrides: Partial<Subscriber> = {}): Subscriber {
    return {
        chat_id: 1001,
        subscribed: true,
        subscribed_on: '2025-03-01',
        last_interaction_date: null,
        consecutive_silent_days: 0,
        escalated: false,
        last_reminder_sent_at: null,
        created_at: new Date('2025-03-01T00:00:00.000Z'),
        updated_at: new Date('2025-03-01T00:00:00.000Z'),
        ...overrides,
    };
}

function copy(subscriber: Subscriber): Subscriber {
    return { ...subscriber };
}

export class InMemorySubscriberStore implements SubscriberStore {
    readonly rows = new Map<ChatId, Subscriber>();
    unavailable = false;

    constructor(subscribers: Subscriber[] = []) {
        for (const subscriber of subscribers) {
            this.rows.set(subscriber.chat_id, copy(subscriber));
        }
    }

    row(chatId: ChatId): Subscriber | undefined {
        return this.rows.get(chatId);
    }

    private ensureAvailable(): void {
        if (this.unavailable) {
            throw new Error('connect ECONNREFUSED');
        }
    }

    async get(chatId: ChatId): Promise<Subscriber | null> {
        this.ensureAvailable();
        const row = this.rows.get(chatId);
        return row ? copy(row) : null;
    }

    async upsert(subscriber: Subscriber): Promise<void> {
        this.ensureAvailable();
        this.rows.set(subscriber.chat_id, copy(subscriber));
    }

    async listSubscribed(): Promise<Subscriber[]> {
        this.ensureAvailable();
        return [...this.rows.values()]
            .filter(row => row.subscribed)
            .sort((a, b) => a.chat_id - b.chat_id)
            .map(copy);
    }

    async modify(chatId: ChatId, mutate: SubscriberMutation): Promise<Subscriber | null> {
        this.ensureAvailable();
        const row = this.rows.get(chatId);
        const next = mutate(row ? copy(row) : null);
        if (!next) return null;
        this.rows.set(chatId, copy(next));
        return next;
    }

    async close(): Promise<void> {}
}

export interface SentMessage {
    chatId: ChatId;
    text: string;
}

export class FakeGateway implements DeliveryGateway {
    readonly sent: SentMessage[] = [];
    readonly failing = new Set<ChatId>();
    private readonly interactionHandlers: EventHandler<InteractionEvent>[] = [];
    private readonly commandHandlers: EventHandler<CommandEvent>[] = [];
    private nextMessageId = 1;

    async sendMessage(chatId: ChatId, text: string): Promise<DeliveryResult> {
        if (this.failing.has(chatId)) {
            return { ok: false, error: new DeliveryError('blocked', 'Forbidden: bot was blocked by the user') };
        }
        this.sent.push({ chatId, text });
        return { ok: true, messageId: this.nextMessageId++ };
    }

    onInteraction(handler: EventHandler<InteractionEvent>): void {
        this.interactionHandlers.push(handler);
    }

    onCommand(handler: EventHandler<CommandEvent>): void {
        this.commandHandlers.push(handler);
    }

    async emitInteraction(event: InteractionEvent): Promise<void> {
        for (const handler of this.interactionHandlers) {
            await handler(event);
        }
    }

    async emitCommand(event: CommandEvent): Promise<void> {
        for (const handler of this.commandHandlers) {
            await handler(event);
        }
    }

    sentTo(chatId: ChatId): string[] {
        return this.sent.filter(message => message.chatId === chatId).map(message => message.text);
    }
}

export class FakeClock implements Clock {
    private current: Date;

    constructor(iso: string) {
        this.current = new Date(iso);
    }

    set(iso: string): void {
        this.current = new Date(iso);
    }

    now(): Date {
        return new Date(this.current.getTime());
    }
}

export interface RegisteredJob {
    expression: string;
    timezone: string;
    task: () => Promise<void>;
    stopped: boolean;
}

export class FakeCronRunner implements CronRunner {
    readonly jobs: RegisteredJob[] = [];

    schedule(expression: string, task: () => Promise<void>, timezone: string): ScheduledJob {
        const job: RegisteredJob = { expression, timezone, task, stopped: false };
        this.jobs.push(job);
        return {
            stop: () => {
                job.stopped = true;
            },
        };
    }

    async fire(expression: string): Promise<void> {
        for (const job of this.jobs.filter(candidate => candidate.expression === expression && !candidate.stopped)) {
            await job.task();
        }
    }
}
