import type { Subscriber } from './models/Subscriber';
import { formatTimeOfDay, TimeOfDay } from './utils/time';

const COMMANDS_HELP =
    'Commands:\n' +
    '/status - Show your check-in streak\n' +
    '/stop - Unsubscribe from reminders';

export const messages = {
    welcome(times: readonly TimeOfDay[]): string {
        return '👋 Welcome! I will remind you to write your daily check-in at ' +
            `${times.map(formatTimeOfDay).join(' and ')} every day.\n\n` +
            'Reply to a reminder with a few words or just an emoji.\n\n' +
            COMMANDS_HELP;
    },

    alreadySubscribed(): string {
        return '✅ You are already subscribed to daily reminders.\n\n' + COMMANDS_HELP;
    },

    goodbye(): string {
        return '👋 You have been unsubscribed from reminders. Send /start to re-enable them.';
    },

    notSubscribed(): string {
        return '❌ You are not subscribed. Send /start to subscribe.';
    },

    status(subscriber: Subscriber): string {
        const lastSeen = subscriber.last_interaction_date ?? 'never';
        return '📊 Your check-in status\n\n' +
            `Subscribed: ${subscriber.subscribed ? 'yes' : 'no'}\n` +
            `Last check-in: ${lastSeen}\n` +
            `Days without a check-in: ${subscriber.consecutive_silent_days}`;
    },

    reminder(): string {
        return "📝 Don't forget to write your check-in today! " +
            'You can reply to this message with a few words or an emoji.';
    },

    checkIn(): string {
        return "Hey, I haven't seen your check-ins lately. Everything okay? " +
            'Writing things down helps you reflect and grow.';
    },

    adminAlert(chatId: number, silentDays: number): string {
        return `⚠️ User ${chatId} has been inactive for ${silentDays} days.`;
    },

    requestFailed(): string {
        return '❌ Something went wrong. Please try again.';
    },
};
