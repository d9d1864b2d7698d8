import type { Pool } from 'pg';
import { closePool, query, queryOne, withTransaction } from '../config/database';
import type { Subscriber, SubscriberStore } from '../models/Subscriber';

type SubscriberRow = {
    // BIGINT comes back from pg as a string
    chat_id: string;
    subscribed: boolean;
    subscribed_on: string;
    last_interaction_date: string | null;
    consecutive_silent_days: number;
    escalated: boolean;
    last_reminder_sent_at: Date | null;
    created_at: Date;
    updated_at: Date;
};

const SUBSCRIBER_COLUMNS = `chat_id, subscribed, subscribed_on, last_interaction_date, consecutive_silent_days,
    escalated, last_reminder_sent_at, created_at, updated_at`;

const UPSERT_SUBSCRIBER = `
    INSERT INTO subscribers (${SUBSCRIBER_COLUMNS})
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    ON CONFLICT (chat_id)
    DO UPDATE SET
      subscribed = $2,
      subscribed_on = $3,
      last_interaction_date = $4,
      consecutive_silent_days = $5,
      escalated = $6,
      last_reminder_sent_at = $7,
      updated_at = $9`;

function mapSubscriber(row: SubscriberRow): Subscriber {
    return {
        chat_id: Number(row.chat_id),
        subscribed: row.subscribed,
        subscribed_on: row.subscribed_on,
        last_interaction_date: row.last_interaction_date,
        consecutive_silent_days: row.consecutive_silent_days,
        escalated: row.escalated,
        last_reminder_sent_at: row.last_reminder_sent_at,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

function upsertParams(subscriber: Subscriber): unknown[] {
    return [
        subscriber.chat_id,
        subscriber.subscribed,
        subscriber.subscribed_on,
        subscriber.last_interaction_date,
        subscriber.consecutive_silent_days,
        subscriber.escalated,
        subscriber.last_reminder_sent_at,
        subscriber.created_at,
        subscriber.updated_at,
    ];
}

export async function initSchema(pool: Pool): Promise<void> {
    await query(pool, `
    CREATE TABLE IF NOT EXISTS subscribers (
      chat_id BIGINT PRIMARY KEY,
      subscribed BOOLEAN NOT NULL DEFAULT true,
      subscribed_on TEXT NOT NULL,
      last_interaction_date TEXT,
      consecutive_silent_days INTEGER NOT NULL DEFAULT 0,
      escalated BOOLEAN NOT NULL DEFAULT false,
      last_reminder_sent_at TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL
    )
  `);
}

export function createPostgresSubscriberStore(pool: Pool): SubscriberStore {
    return {
        async get(chatId) {
            const row = await queryOne<SubscriberRow>(
                pool,
                `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE chat_id = $1`,
                [chatId]
            );
            return row ? mapSubscriber(row) : null;
        },

        async upsert(subscriber) {
            await query(pool, UPSERT_SUBSCRIBER, upsertParams(subscriber));
        },

        async listSubscribed() {
            const rows = await query<SubscriberRow>(
                pool,
                `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE subscribed = true ORDER BY chat_id`
            );
            return rows.map(mapSubscriber);
        },

        async modify(chatId, mutate) {
            return withTransaction(pool, async client => {
                const result = await client.query<SubscriberRow>(
                    `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE chat_id = $1 FOR UPDATE`,
                    [chatId]
                );
                const current = result.rows.length > 0 ? mapSubscriber(result.rows[0]) : null;
                const next = mutate(current);
                if (!next) return null;

                await client.query(UPSERT_SUBSCRIBER, upsertParams(next));
                return next;
            });
        },

        async close() {
            await closePool(pool);
        },
    };
}
