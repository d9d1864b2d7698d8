import { beforeEach, describe, expect, it } from 'vitest';
import { messages } from '../src/messages';
import { NotificationDispatcher } from '../src/services/notificationDispatcher';
import { ADMIN_CHAT_ID, FakeGateway } from './fixtures';

describe('NotificationDispatcher', () => {
    let gateway: FakeGateway;

    beforeEach(() => {
        gateway = new FakeGateway();
    });

    it('sends exactly one reminder message', async () => {
        const dispatcher = new NotificationDispatcher(gateway, ADMIN_CHAT_ID);

        const result = await dispatcher.sendReminder(1001, '10:00');

        expect(result).toEqual({ ok: true, messageId: 1 });
        expect(gateway.sent).toEqual([{ chatId: 1001, text: messages.reminder() }]);
    });

    it('sends the check-in to the subscriber', async () => {
        const dispatcher = new NotificationDispatcher(gateway, ADMIN_CHAT_ID);

        await dispatcher.sendCheckIn(1001, 3);

        expect(gateway.sent).toEqual([{ chatId: 1001, text: messages.checkIn() }]);
    });

    it('alerts the administrator about the silent subscriber', async () => {
        const dispatcher = new NotificationDispatcher(gateway, ADMIN_CHAT_ID);

        await dispatcher.notifyAdmin(1001, 3);

        expect(gateway.sent).toEqual([{ chatId: ADMIN_CHAT_ID, text: '⚠️ User 1001 has been inactive for 3 days.' }]);
    });

    it('does nothing for the administrator when none is configured', async () => {
        const dispatcher = new NotificationDispatcher(gateway, null);

        await expect(dispatcher.notifyAdmin(1001, 3)).resolves.toBeNull();
        expect(dispatcher.hasAdmin).toBe(false);
        expect(gateway.sent).toEqual([]);
    });

    it('reports a failed delivery without throwing', async () => {
        gateway.failing.add(1001);
        const dispatcher = new NotificationDispatcher(gateway, ADMIN_CHAT_ID);

        const result = await dispatcher.sendReminder(1001, '22:00');

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.reason).toBe('blocked');
        }
    });
});
