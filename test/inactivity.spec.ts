import { describe, expect, it } from 'vitest';
import {
    applyEscalation,
    applyInteraction,
    applySweep,
    evaluateSilence,
    silenceBaseline,
    SilencePolicy
} from '../src/scheduler/inactivity';
import { makeSubscriber } from './fixtures';

const policy: SilencePolicy = { thresholdDays: 3, resetSilenceOnResubscribe: true };
const now = new Date('2025-03-05T00:00:00.000Z');

describe('evaluateSilence', () => {
    const subscriber = makeSubscriber({ subscribed_on: '2025-02-20', last_interaction_date: '2025-03-01' });

    it('is active on the day of the last interaction', () => {
        expect(evaluateSilence(subscriber, '2025-03-01', policy)).toEqual({ kind: 'active', baseline: '2025-03-01' });
    });

    it('counts silent days below the threshold', () => {
        expect(evaluateSilence(subscriber, '2025-03-03', policy)).toEqual({ kind: 'silent', days: 2, baseline: '2025-03-01' });
    });

    it('becomes due for escalation at the threshold', () => {
        expect(evaluateSilence(subscriber, '2025-03-04', policy))
            .toEqual({ kind: 'escalation_due', days: 3, baseline: '2025-03-01' });
    });

    it('stays escalated without re-notifying once the flag is set', () => {
        const escalated = { ...subscriber, escalated: true };
        expect(evaluateSilence(escalated, '2025-03-09', policy))
            .toEqual({ kind: 'escalated', days: 8, baseline: '2025-03-01' });
    });

    it('counts from the subscription day when there was never an interaction', () => {
        const fresh = makeSubscriber({ subscribed_on: '2025-03-01', last_interaction_date: null });
        expect(evaluateSilence(fresh, '2025-03-02', policy)).toEqual({ kind: 'silent', days: 1, baseline: '2025-03-01' });
    });

    it('never reports negative silence', () => {
        expect(evaluateSilence(subscriber, '2025-02-25', policy)).toEqual({ kind: 'active', baseline: '2025-03-01' });
    });

    it('flags an unreadable stored date', () => {
        const broken = makeSubscriber({ last_interaction_date: 'not-a-date' });
        expect(evaluateSilence(broken, '2025-03-04', policy)).toEqual({ kind: 'invalid_date' });
    });
});

describe('silenceBaseline after re-subscribing', () => {
    const returning = makeSubscriber({ subscribed_on: '2025-03-01', last_interaction_date: '2025-01-10' });

    it('restarts the streak on the re-subscription day', () => {
        expect(silenceBaseline(returning, policy)).toBe('2025-03-01');
        expect(evaluateSilence(returning, '2025-03-02', policy)).toEqual({ kind: 'silent', days: 1, baseline: '2025-03-01' });
    });

    it('keeps the stale history when resets are disabled', () => {
        const stale: SilencePolicy = { thresholdDays: 3, resetSilenceOnResubscribe: false };
        expect(silenceBaseline(returning, stale)).toBe('2025-01-10');
        expect(evaluateSilence(returning, '2025-03-02', stale))
            .toEqual({ kind: 'escalation_due', days: 51, baseline: '2025-01-10' });
    });
});

describe('applySweep', () => {
    it('writes the derived silent day count', () => {
        const subscriber = makeSubscriber({ consecutive_silent_days: 1 });
        const swept = applySweep(subscriber, { kind: 'silent', days: 2 }, now);
        expect(swept?.consecutive_silent_days).toBe(2);
        expect(swept?.updated_at).toEqual(now);
    });

    it('leaves the row alone when the count is unchanged', () => {
        const subscriber = makeSubscriber({ consecutive_silent_days: 2 });
        expect(applySweep(subscriber, { kind: 'silent', days: 2 }, now)).toBeNull();
    });
});

describe('applyInteraction', () => {
    const silent = makeSubscriber({ last_interaction_date: '2025-03-01', consecutive_silent_days: 3, escalated: true });

    it('advances the date and clears the streak', () => {
        expect(applyInteraction(silent, '2025-03-04', now)).toEqual({
            ...silent,
            last_interaction_date: '2025-03-04',
            consecutive_silent_days: 0,
            escalated: false,
            updated_at: now,
        });
    });

    it('ignores an interaction older than the stored one', () => {
        expect(applyInteraction(silent, '2025-02-27', now)).toBeNull();
    });

    it('is a no-op for a repeated same-day interaction', () => {
        const active = makeSubscriber({ last_interaction_date: '2025-03-04' });
        expect(applyInteraction(active, '2025-03-04', now)).toBe(active);
    });

    it('replaces an unreadable stored date', () => {
        const broken = makeSubscriber({ last_interaction_date: 'garbage' });
        expect(applyInteraction(broken, '2025-03-04', now)?.last_interaction_date).toBe('2025-03-04');
    });
});

describe('applyEscalation', () => {
    const due = makeSubscriber({ subscribed_on: '2025-02-20', last_interaction_date: '2025-03-01' });

    it('marks the streak as escalated', () => {
        expect(applyEscalation(due, '2025-03-01', policy, now)).toEqual({ ...due, escalated: true, updated_at: now });
    });

    it('does nothing when the subscriber interacted since the evaluation', () => {
        const replied = { ...due, last_interaction_date: '2025-03-04' };
        expect(applyEscalation(replied, '2025-03-01', policy, now)).toBeNull();
    });

    it('does nothing when already escalated or unsubscribed', () => {
        expect(applyEscalation({ ...due, escalated: true }, '2025-03-01', policy, now)).toBeNull();
        expect(applyEscalation({ ...due, subscribed: false }, '2025-03-01', policy, now)).toBeNull();
    });
});
