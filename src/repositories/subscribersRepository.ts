import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { ChatId, Subscriber, SubscriberMutation, SubscriberStore } from '../models/Subscriber';

interface SubscriberRow {
    chat_id: number;
    subscribed: number;
    subscribed_on: string;
    last_interaction_date: string | null;
    consecutive_silent_days: number;
    escalated: number;
    last_reminder_sent_at: string | null;
    created_at: string;
    updated_at: string;
}

const SUBSCRIBER_COLUMNS = [
    'chat_id',
    'subscribed',
    'subscribed_on',
    'last_interaction_date',
    'consecutive_silent_days',
    'escalated',
    'last_reminder_sent_at',
    'created_at',
    'updated_at',
].join(', ');

function mapSubscriber(row: SubscriberRow): Subscriber {
    return {
        chat_id: row.chat_id,
        subscribed: row.subscribed === 1,
        subscribed_on: row.subscribed_on,
        last_interaction_date: row.last_interaction_date,
        consecutive_silent_days: row.consecutive_silent_days,
        escalated: row.escalated === 1,
        last_reminder_sent_at: row.last_reminder_sent_at === null ? null : new Date(row.last_reminder_sent_at),
        created_at: new Date(row.created_at),
        updated_at: new Date(row.updated_at),
    };
}

function toRow(subscriber: Subscriber): SubscriberRow {
    return {
        chat_id: subscriber.chat_id,
        subscribed: subscriber.subscribed ? 1 : 0,
        subscribed_on: subscriber.subscribed_on,
        last_interaction_date: subscriber.last_interaction_date,
        consecutive_silent_days: subscriber.consecutive_silent_days,
        escalated: subscriber.escalated ? 1 : 0,
        last_reminder_sent_at: subscriber.last_reminder_sent_at?.toISOString() ?? null,
        created_at: subscriber.created_at.toISOString(),
        updated_at: subscriber.updated_at.toISOString(),
    };
}

export function initDb(db: Database.Database): void {
    db.exec(`
    CREATE TABLE IF NOT EXISTS subscribers (
      chat_id INTEGER PRIMARY KEY,
      subscribed INTEGER NOT NULL DEFAULT 1,
      subscribed_on TEXT NOT NULL,
      last_interaction_date TEXT,
      consecutive_silent_days INTEGER NOT NULL DEFAULT 0,
      escalated INTEGER NOT NULL DEFAULT 0,
      last_reminder_sent_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
}

export function createSqliteSubscriberStore(db: Database.Database): SubscriberStore {
    initDb(db);

    const selectOne = db.prepare<[number], SubscriberRow>(
        `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE chat_id = ?`
    );
    const selectSubscribed = db.prepare<[], SubscriberRow>(
        `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE subscribed = 1 ORDER BY chat_id`
    );
    const upsertRow = db.prepare<SubscriberRow>(`
        INSERT INTO subscribers (${SUBSCRIBER_COLUMNS})
        VALUES (@chat_id, @subscribed, @subscribed_on, @last_interaction_date, @consecutive_silent_days,
                @escalated, @last_reminder_sent_at, @created_at, @updated_at)
        ON CONFLICT(chat_id) DO UPDATE SET
          subscribed = excluded.subscribed,
          subscribed_on = excluded.subscribed_on,
          last_interaction_date = excluded.last_interaction_date,
          consecutive_silent_days = excluded.consecutive_silent_days,
          escalated = excluded.escalated,
          last_reminder_sent_at = excluded.last_reminder_sent_at,
          updated_at = excluded.updated_at
    `);

    const modifyTransaction = db.transaction((chatId: ChatId, mutate: SubscriberMutation): Subscriber | null => {
        const row = selectOne.get(chatId);
        const next = mutate(row ? mapSubscriber(row) : null);
        if (!next) return null;

        upsertRow.run(toRow(next));
        return next;
    });

    return {
        async get(chatId) {
            const row = selectOne.get(chatId);
            return row ? mapSubscriber(row) : null;
        },

        async upsert(subscriber) {
            upsertRow.run(toRow(subscriber));
        },

        async listSubscribed() {
            return selectSubscribed.all().map(mapSubscriber);
        },

        async modify(chatId, mutate) {
            // IMMEDIATE takes the write lock up front so two processes cannot interleave on one row
            return modifyTransaction.immediate(chatId, mutate);
        },

        async close() {
            db.close();
        },
    };
}

export function openSqliteSubscriberStore(dbPath: string): SubscriberStore {
    if (dbPath !== ':memory:') {
        const dbDir = path.dirname(dbPath);
        if (!fs.existsSync(dbDir)) {
            fs.mkdirSync(dbDir, { recursive: true });
        }
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    return createSqliteSubscriberStore(db);
}
