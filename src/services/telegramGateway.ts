import type TelegramBot from 'node-telegram-bot-api';
import type { ChatId } from '../models/Subscriber';
import { errorMessage, logError } from '../utils/logger';
import {
    CommandEvent,
    DeliveryError,
    DeliveryGateway,
    DeliveryResult,
    EventHandler,
    InteractionEvent,
    InteractionKind,
    withTimeout
} from './deliveryGateway';

/** `message_reaction` update payload, which @types/node-telegram-bot-api does not declare. */
export interface MessageReaction {
    chat: { id: ChatId };
    message_id: number;
    date: number;
    user?: { id: number };
    new_reaction: { type: string; emoji?: string }[];
}

/** The slice of the bot client the gateway talks to. */
export interface TelegramTransport {
    sendMessage(chatId: ChatId, text: string): Promise<TelegramBot.Message>;
    onMessage(listener: (message: TelegramBot.Message) => void): void;
    onReaction(listener: (reaction: MessageReaction) => void): void;
}

/** Update types the bot polls for; reactions are only delivered when asked for. */
export const ALLOWED_UPDATES = ['message', 'message_reaction'];

export function fromTelegramBot(bot: TelegramBot): TelegramTransport {
    return {
        sendMessage: (chatId, text) => bot.sendMessage(chatId, text),
        onMessage: listener => {
            bot.on('message', listener);
        },
        onReaction: listener => {
            bot.on('message_reaction', listener);
        },
    };
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;
const EMOJI_ONLY_PATTERN = /^[\p{Extended_Pictographic}\p{Emoji_Modifier}\p{Regional_Indicator}\u200d\ufe0f\u20e3\s]+$/u;
const PICTOGRAPH_PATTERN = /[\p{Extended_Pictographic}\p{Regional_Indicator}]/u;

export function parseCommand(text: string): { command: string; args: string } | null {
    const match = COMMAND_PATTERN.exec(text.trim());
    if (!match) return null;
    return { command: match[1].toLowerCase(), args: match[2]?.trim() ?? '' };
}

export function classifyInteraction(message: TelegramBot.Message): InteractionKind {
    if (message.sticker) return 'reaction';

    const text = message.text;
    if (text && EMOJI_ONLY_PATTERN.test(text) && PICTOGRAPH_PATTERN.test(text)) {
        return 'reaction';
    }
    return 'message';
}

function telegramStatusCode(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('response' in error)) return undefined;

    const response = error.response;
    if (typeof response === 'object' && response !== null && 'statusCode' in response &&
        typeof response.statusCode === 'number') {
        return response.statusCode;
    }
    return undefined;
}

export function toDeliveryError(error: unknown): DeliveryError {
    if (error instanceof DeliveryError) return error;

    const reason = telegramStatusCode(error) === 403 ? 'blocked' : 'transport';
    return new DeliveryError(reason, errorMessage(error), { cause: error });
}

export class TelegramGateway implements DeliveryGateway {
    private readonly interactionHandlers: EventHandler<InteractionEvent>[] = [];
    private readonly commandHandlers: EventHandler<CommandEvent>[] = [];

    constructor(private readonly transport: TelegramTransport, private readonly sendTimeoutMs: number) {
        transport.onMessage(message => this.dispatchInbound(message));
        transport.onReaction(reaction => this.dispatchReaction(reaction));
    }

    async sendMessage(chatId: ChatId, text: string): Promise<DeliveryResult> {
        try {
            const sent = await withTimeout(this.transport.sendMessage(chatId, text), this.sendTimeoutMs);
            return { ok: true, messageId: sent.message_id };
        } catch (error) {
            return { ok: false, error: toDeliveryError(error) };
        }
    }

    onInteraction(handler: EventHandler<InteractionEvent>): void {
        this.interactionHandlers.push(handler);
    }

    onCommand(handler: EventHandler<CommandEvent>): void {
        this.commandHandlers.push(handler);
    }

    private dispatchInbound(message: TelegramBot.Message): void {
        const chatId = message.chat.id;
        const timestamp = new Date(message.date * 1000);
        const command = message.text ? parseCommand(message.text) : null;

        if (command) {
            const event: CommandEvent = { chatId, timestamp, ...command };
            for (const handler of this.commandHandlers) {
                this.invoke(handler, event, `/${command.command}`);
            }
            return;
        }

        const event: InteractionEvent = { chatId, timestamp, kind: classifyInteraction(message) };
        for (const handler of this.interactionHandlers) {
            this.invoke(handler, event, 'interaction');
        }
    }

    private dispatchReaction(reaction: MessageReaction): void {
        // a removed reaction arrives with an empty new_reaction list
        if (reaction.new_reaction.length === 0) return;

        const event: InteractionEvent = {
            chatId: reaction.chat.id,
            timestamp: new Date(reaction.date * 1000),
            kind: 'reaction',
        };
        for (const handler of this.interactionHandlers) {
            this.invoke(handler, event, 'reaction');
        }
    }

    private invoke<E>(handler: EventHandler<E>, event: E, label: string): void {
        Promise.resolve()
            .then(() => handler(event))
            .catch(error => {
                logError(`[BOT] Handler for ${label} failed:`, errorMessage(error));
            });
    }
}
