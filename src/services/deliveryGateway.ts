import type { ChatId } from '../models/Subscriber';

export type DeliveryFailureReason = 'timeout' | 'blocked' | 'transport';

export class DeliveryError extends Error {
    constructor(readonly reason: DeliveryFailureReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DeliveryError';
    }
}

export type DeliveryResult =
    | { ok: true; messageId: number }
    | { ok: false; error: DeliveryError };

export type InteractionKind = 'message' | 'reaction';

export interface InteractionEvent {
    chatId: ChatId;
    timestamp: Date;
    kind: InteractionKind;
}

export interface CommandEvent {
    chatId: ChatId;
    command: string;
    args: string;
    timestamp: Date;
}

export type EventHandler<E> = (event: E) => void | Promise<void>;

export interface DeliveryGateway {
    sendMessage(chatId: ChatId, text: string): Promise<DeliveryResult>;
    onInteraction(handler: EventHandler<InteractionEvent>): void;
    onCommand(handler: EventHandler<CommandEvent>): void;
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new DeliveryError('timeout', `No response within ${timeoutMs} ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
