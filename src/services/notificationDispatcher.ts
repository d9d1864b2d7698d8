import type { ChatId } from '../models/Subscriber';
import { messages } from '../messages';
import { log, logWarn } from '../utils/logger';
import type { DeliveryGateway, DeliveryResult } from './deliveryGateway';

/**
 * Turns scheduler decisions into Telegram messages. Each call sends exactly
 * one message and reports the outcome instead of throwing, so callers only
 * touch the store after a confirmed delivery.
 */
export class NotificationDispatcher {
    constructor(
        private readonly gateway: DeliveryGateway,
        private readonly adminChatId: ChatId | null
    ) {}

    get hasAdmin(): boolean {
        return this.adminChatId !== null;
    }

    async sendReminder(chatId: ChatId, slot: string): Promise<DeliveryResult> {
        return this.deliver(chatId, messages.reminder(), `reminder ${slot}`);
    }

    async sendCheckIn(chatId: ChatId, silentDays: number): Promise<DeliveryResult> {
        return this.deliver(chatId, messages.checkIn(), `check-in after ${silentDays} silent days`);
    }

    /** Resolves to null when no administrator is configured. */
    async notifyAdmin(chatId: ChatId, silentDays: number): Promise<DeliveryResult | null> {
        if (this.adminChatId === null) return null;
        return this.deliver(this.adminChatId, messages.adminAlert(chatId, silentDays), `admin alert for ${chatId}`);
    }

    async reply(chatId: ChatId, text: string): Promise<DeliveryResult> {
        return this.deliver(chatId, text, 'reply');
    }

    private async deliver(chatId: ChatId, text: string, label: string): Promise<DeliveryResult> {
        const result = await this.gateway.sendMessage(chatId, text);
        if (result.ok) {
            log(`[SEND] ${label} delivered to ${chatId}`);
        } else {
            logWarn(`[SEND] Failed to deliver ${label} to ${chatId} (${result.error.reason}):`, result.error.message);
        }
        return result;
    }
}
