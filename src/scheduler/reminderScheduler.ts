import cron from 'node-cron';
import type { ChatId, Subscriber, SubscriberStore } from '../models/Subscriber';
import type { InteractionKind } from '../services/deliveryGateway';
import type { NotificationDispatcher } from '../services/notificationDispatcher';
import { errorMessage, log, logError, logWarn } from '../utils/logger';
import { CalendarDate, calendarDate, formatTimeOfDay, TimeOfDay, toDailyCronExpression } from '../utils/time';
import {
    applyEscalation,
    applyInteraction,
    applySweep,
    evaluateSilence,
    SilenceEvaluation,
    SilencePolicy
} from './inactivity';

export interface SchedulerConfig {
    timezone: string;
    reminderTimes: readonly [TimeOfDay, TimeOfDay];
    sweepTime: TimeOfDay;
    inactivityThresholdDays: number;
    resetSilenceOnResubscribe: boolean;
}

export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};

export interface ScheduledJob {
    stop(): void;
}

export interface CronRunner {
    schedule(expression: string, task: () => Promise<void>, timezone: string): ScheduledJob;
}

export const nodeCronRunner: CronRunner = {
    schedule(expression, task, timezone) {
        return cron.schedule(expression, () => {
            task().catch(error => {
                logError(`[CRON] Job "${expression}" failed:`, errorMessage(error));
            });
        }, { timezone });
    },
};

export type ReminderOutcome = 'sent' | 'failed' | 'skipped';
export type InteractionOutcome = 'recorded' | 'stale' | 'unknown';

export interface ReminderReport {
    slot: string;
    sent: number;
    failed: number;
    skipped: number;
}

export interface SweepReport {
    date: CalendarDate;
    checked: number;
    escalated: number;
    failed: number;
}

export interface ReminderSchedulerDeps {
    config: SchedulerConfig;
    store: SubscriberStore;
    dispatcher: NotificationDispatcher;
    clock?: Clock;
    cronRunner?: CronRunner;
}

export class ReminderScheduler {
    private readonly config: SchedulerConfig;
    private readonly store: SubscriberStore;
    private readonly dispatcher: NotificationDispatcher;
    private readonly clock: Clock;
    private readonly cronRunner: CronRunner;
    private readonly policy: SilencePolicy;
    private jobs: ScheduledJob[] = [];
    // Reminder passes and sweeps run one at a time, in trigger order
    private queue: Promise<unknown> = Promise.resolve();

    constructor({ config, store, dispatcher, clock = systemClock, cronRunner = nodeCronRunner }: ReminderSchedulerDeps) {
        this.config = config;
        this.store = store;
        this.dispatcher = dispatcher;
        this.clock = clock;
        this.cronRunner = cronRunner;
        this.policy = {
            thresholdDays: config.inactivityThresholdDays,
            resetSilenceOnResubscribe: config.resetSilenceOnResubscribe,
        };
    }

    today(): CalendarDate {
        return calendarDate(this.clock.now(), this.config.timezone);
    }

    start(): void {
        if (this.jobs.length > 0) return;

        this.scheduleDailyReminders();
        this.scheduleInactivitySweep();
    }

    async stop(): Promise<void> {
        for (const job of this.jobs) {
            job.stop();
        }
        this.jobs = [];
        await this.queue;
    }

    scheduleDailyReminders(): void {
        for (const time of this.config.reminderTimes) {
            const slot = formatTimeOfDay(time);
            const expression = toDailyCronExpression(time);
            this.jobs.push(this.cronRunner.schedule(expression, async () => {
                await this.sendReminders(slot);
            }, this.config.timezone));
            log(`[REMINDER] Scheduled reminders at ${slot} ${this.config.timezone} (${expression})`);
        }
    }

    scheduleInactivitySweep(): void {
        const expression = toDailyCronExpression(this.config.sweepTime);
        this.jobs.push(this.cronRunner.schedule(expression, async () => {
            await this.runInactivitySweep();
        }, this.config.timezone));
        log(`[SWEEP] Scheduled inactivity sweep at ${formatTimeOfDay(this.config.sweepTime)} ${this.config.timezone}`);
    }

    /** One reminder pass over every subscribed subscriber. A store outage skips the whole pass. */
    sendReminders(slot: string): Promise<ReminderReport | null> {
        return this.exclusive(async () => {
            let subscribers: Subscriber[];
            try {
                subscribers = await this.store.listSubscribed();
            } catch (error) {
                logError(`[REMINDER] Skipping ${slot} reminders, subscriber store unavailable:`, errorMessage(error));
                return null;
            }

            const report: ReminderReport = { slot, sent: 0, failed: 0, skipped: 0 };
            for (const subscriber of subscribers) {
                const outcome = await this.sendReminder(subscriber, slot);
                report[outcome] += 1;
            }

            log(`[REMINDER] ${slot} pass done: ${report.sent} sent, ${report.failed} failed, ${report.skipped} skipped`);
            return report;
        });
    }

    /**
     * Delivers one reminder. A failed delivery leaves the row untouched; the
     * next slot is the retry.
     */
    async sendReminder(subscriber: Subscriber, slot: string): Promise<ReminderOutcome> {
        const chatId = subscriber.chat_id;
        try {
            const current = await this.store.get(chatId);
            if (!current?.subscribed) return 'skipped';

            const result = await this.dispatcher.sendReminder(chatId, slot);
            if (!result.ok) return 'failed';

            const sentAt = this.clock.now();
            await this.store.modify(chatId, row =>
                row ? { ...row, last_reminder_sent_at: sentAt, updated_at: sentAt } : null
            );
            return 'sent';
        } catch (error) {
            logError(`[REMINDER] Reminder ${slot} for ${chatId} failed:`, errorMessage(error));
            return 'failed';
        }
    }

    runInactivitySweep(): Promise<SweepReport | null> {
        return this.exclusive(async () => {
            const today = this.today();
            let subscribers: Subscriber[];
            try {
                subscribers = await this.store.listSubscribed();
            } catch (error) {
                logError('[SWEEP] Skipping inactivity sweep, subscriber store unavailable:', errorMessage(error));
                return null;
            }

            const report: SweepReport = { date: today, checked: 0, escalated: 0, failed: 0 };
            for (const subscriber of subscribers) {
                try {
                    const escalated = await this.sweepSubscriber(subscriber.chat_id, today);
                    report.checked += 1;
                    if (escalated) report.escalated += 1;
                } catch (error) {
                    report.failed += 1;
                    logError(`[SWEEP] Failed to check ${subscriber.chat_id}:`, errorMessage(error));
                }
            }

            log(`[SWEEP] ${today}: ${report.checked} checked, ${report.escalated} escalated, ${report.failed} failed`);
            return report;
        });
    }

    /** Resolves to true when this sweep escalated the subscriber. */
    private async sweepSubscriber(chatId: ChatId, today: CalendarDate): Promise<boolean> {
        const now = this.clock.now();
        const decision: { evaluation: SilenceEvaluation | null } = { evaluation: null };

        await this.store.modify(chatId, current => {
            if (!current?.subscribed) return null;

            const evaluation = evaluateSilence(current, today, this.policy);
            decision.evaluation = evaluation;
            if (evaluation.kind === 'invalid_date') {
                logWarn(`[SWEEP] Invalid last interaction date "${current.last_interaction_date}" for ${chatId}, resetting to ${today}`);
                return { ...current, last_interaction_date: today, consecutive_silent_days: 0, escalated: false, updated_at: now };
            }
            return applySweep(current, evaluation, now);
        });

        const evaluation = decision.evaluation;
        if (evaluation === null || evaluation.kind !== 'escalation_due') return false;

        return this.escalate(chatId, evaluation.days, evaluation.baseline);
    }

    private async escalate(chatId: ChatId, silentDays: number, baseline: CalendarDate): Promise<boolean> {
        log(`[SWEEP] ${chatId} silent for ${silentDays} days, escalating`);

        const checkIn = await this.dispatcher.sendCheckIn(chatId, silentDays);
        const adminAlert = await this.dispatcher.notifyAdmin(chatId, silentDays);
        if (!checkIn.ok && !adminAlert?.ok) {
            logWarn(`[SWEEP] Escalation for ${chatId} not delivered, retrying on the next sweep`);
            return false;
        }

        const marked = await this.store.modify(chatId, current =>
            current ? applyEscalation(current, baseline, this.policy, this.clock.now()) : null
        );
        return marked !== null;
    }

    /**
     * Buckets the interaction into the configured timezone's calendar day and
     * clears the silence streak. Older interactions leave the row as it is.
     */
    async recordInteraction(chatId: ChatId, timestamp: Date, kind: InteractionKind = 'message'): Promise<InteractionOutcome> {
        const date = calendarDate(timestamp, this.config.timezone);
        const lookup = { known: false };

        const updated = await this.store.modify(chatId, current => {
            if (!current) return null;
            lookup.known = true;
            return applyInteraction(current, date, this.clock.now());
        });

        if (updated) {
            log(`[INTERACTION] Recorded ${kind} from ${chatId} on ${date}`);
            return 'recorded';
        }
        if (!lookup.known) {
            log(`[INTERACTION] Ignoring ${kind} from unknown chat ${chatId}`);
            return 'unknown';
        }
        return 'stale';
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task, task);
        // the caller gets the failure through `run`; the queue only tracks completion
        this.queue = run.catch(() => undefined);
        return run;
    }
}
