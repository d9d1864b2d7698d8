import type { Subscriber } from '../models/Subscriber';
import { CalendarDate, daysBetween, isCalendarDate, laterDate } from '../utils/time';

export interface SilencePolicy {
    thresholdDays: number;
    resetSilenceOnResubscribe: boolean;
}

export type SilenceState =
    | { kind: 'active' }
    | { kind: 'silent'; days: number }
    | { kind: 'escalation_due'; days: number }
    | { kind: 'escalated'; days: number };

export type SilenceEvaluation =
    | { kind: 'invalid_date' }
    | (SilenceState & { baseline: CalendarDate });

export function silentDaysOf(state: SilenceState): number {
    return state.kind === 'active' ? 0 : state.days;
}

/**
 * Date the current silence streak is counted from: the last interaction,
 * or the (re)subscription day when there is none or when it is more recent
 * and re-subscribing resets the streak.
 */
export function silenceBaseline(subscriber: Subscriber, policy: SilencePolicy): CalendarDate | null {
    const last = subscriber.last_interaction_date;
    if (last !== null && !isCalendarDate(last)) return null;
    if (!isCalendarDate(subscriber.subscribed_on)) return last;

    if (last === null) return subscriber.subscribed_on;
    return policy.resetSilenceOnResubscribe ? laterDate(last, subscriber.subscribed_on) : last;
}

/** Re-derives the subscriber's state for `today` from the stored dates and escalation flag. */
export function evaluateSilence(subscriber: Subscriber, today: CalendarDate, policy: SilencePolicy): SilenceEvaluation {
    const baseline = silenceBaseline(subscriber, policy);
    const elapsed = baseline === null ? null : daysBetween(baseline, today);
    if (baseline === null || elapsed === null) return { kind: 'invalid_date' };

    const days = Math.max(0, elapsed);
    if (days === 0) return { kind: 'active', baseline };
    if (days < policy.thresholdDays) return { kind: 'silent', days, baseline };
    if (subscriber.escalated) return { kind: 'escalated', days, baseline };
    return { kind: 'escalation_due', days, baseline };
}

/** Null when the stored count already matches, so the row is not rewritten. */
export function applySweep(subscriber: Subscriber, state: SilenceState, now: Date): Subscriber | null {
    const days = silentDaysOf(state);
    if (subscriber.consecutive_silent_days === days) return null;
    return { ...subscriber, consecutive_silent_days: days, updated_at: now };
}

/**
 * Sets `escalated` unless the subscriber interacted (or re-subscribed) since
 * the streak was evaluated, or the flag is already set.
 */
export function applyEscalation(
    subscriber: Subscriber,
    evaluatedBaseline: CalendarDate,
    policy: SilencePolicy,
    now: Date
): Subscriber | null {
    if (subscriber.escalated || !subscriber.subscribed) return null;
    if (silenceBaseline(subscriber, policy) !== evaluatedBaseline) return null;
    return { ...subscriber, escalated: true, updated_at: now };
}

/**
 * Moves `last_interaction_date` forward to `date` and clears the streak.
 * Returns null for an interaction older than the stored one.
 */
export function applyInteraction(subscriber: Subscriber, date: CalendarDate, now: Date): Subscriber | null {
    const last = subscriber.last_interaction_date;
    if (last !== null && isCalendarDate(last) && date < last) return null;

    if (last === date && subscriber.consecutive_silent_days === 0 && !subscriber.escalated) {
        return subscriber;
    }
    return {
        ...subscriber,
        last_interaction_date: date,
        consecutive_silent_days: 0,
        escalated: false,
        updated_at: now,
    };
}
