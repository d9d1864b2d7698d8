import path from 'path';
import cron from 'node-cron';
import { z } from 'zod';
import type { PostgresSettings } from './database';
import { formatTimeOfDay, isValidTimeZone, parseTimeOfDay, toDailyCronExpression, TimeOfDay } from '../utils/time';
import { logWarn } from '../utils/logger';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export type StoreConfig =
    | { driver: 'sqlite'; dbPath: string }
    | { driver: 'postgres'; postgres: PostgresSettings };

export interface AppConfig {
    telegramToken: string;
    adminChatId: number | null;
    timezone: string;
    reminderTimes: readonly [TimeOfDay, TimeOfDay];
    sweepTime: TimeOfDay;
    inactivityThresholdDays: number;
    sendTimeoutMs: number;
    resetSilenceOnResubscribe: boolean;
    store: StoreConfig;
}

const DEFAULT_DB_PATH = path.join(__dirname, '../../dbs/subscribers.db');

// Blank values count as unset
function blankToUndefined(value: unknown): unknown {
    if (typeof value !== 'string') return value;
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
}

function parseSlot(raw: string): TimeOfDay | null {
    const time = parseTimeOfDay(raw);
    return time && cron.validate(toDailyCronExpression(time)) ? time : null;
}

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const stringWithDefault = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const positiveInt = (fallback: number) => z.preprocess(
    blankToUndefined,
    z.coerce.number({ invalid_type_error: 'must be a positive integer' })
        .int('must be a positive integer')
        .positive('must be a positive integer')
        .default(fallback)
);

const booleanFlag = (fallback: boolean) => z.preprocess(
    value => {
        const trimmed = blankToUndefined(value);
        return typeof trimmed === 'string' ? trimmed.toLowerCase() : trimmed;
    },
    z.enum(['true', '1', 'false', '0'], { errorMap: () => ({ message: 'must be true or false' }) })
        .default(fallback ? 'true' : 'false')
        .transform(value => value === 'true' || value === '1')
);

const timeOfDay = (fallback: string) => stringWithDefault(fallback).transform((raw, ctx) => {
    const time = parseSlot(raw);
    if (!time) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must use HH:MM, got "${raw}"` });
        return z.NEVER;
    }
    return time;
});

const reminderTimes = stringWithDefault('10:00,22:00').transform((raw, ctx): readonly [TimeOfDay, TimeOfDay] => {
    const parts = raw.split(',').map(part => part.trim());
    if (parts.length !== 2) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must list exactly two times, got "${raw}"` });
        return z.NEVER;
    }

    const first = parseSlot(parts[0]);
    const second = parseSlot(parts[1]);
    if (!first || !second) {
        const bad = first ? parts[1] : parts[0];
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must use HH:MM, got "${bad}"` });
        return z.NEVER;
    }
    if (formatTimeOfDay(first) === formatTimeOfDay(second)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must name two different times, got "${raw}"` });
        return z.NEVER;
    }
    return [first, second];
});

// A malformed id disables administrator alerts instead of failing start-up
const adminChatId = optionalString.transform(raw => {
    if (raw === undefined) return null;
    if (!/^-?\d+$/.test(raw)) {
        logWarn(`[CONFIG] ADMIN_ID "${raw}" is not a chat id, administrator alerts are disabled`);
        return null;
    }
    return Number(raw);
});

export const envSchema = z.object({
    TELEGRAM_TOKEN: z.preprocess(
        blankToUndefined,
        z.string({ required_error: 'is not set. Define it in a .env file or environment variables.' })
    ),
    ADMIN_ID: adminChatId,
    TIMEZONE: stringWithDefault('Africa/Cairo').refine(isValidTimeZone, value => ({
        message: `"${value}" is not a known IANA time zone`,
    })),
    REMINDER_TIMES: reminderTimes,
    SWEEP_TIME: timeOfDay('09:00'),
    INACTIVITY_THRESHOLD_DAYS: positiveInt(3),
    SEND_TIMEOUT_MS: positiveInt(10000),
    RESET_SILENCE_ON_RESUBSCRIBE: booleanFlag(true),

    // Storage
    STORE_DRIVER: z.preprocess(
        blankToUndefined,
        z.enum(['sqlite', 'postgres'], { errorMap: () => ({ message: 'must be "sqlite" or "postgres"' }) })
            .default('sqlite')
    ),
    DB_PATH: stringWithDefault(DEFAULT_DB_PATH),
    DATABASE_URL: optionalString,
    DB_HOST: stringWithDefault('localhost'),
    DB_PORT: positiveInt(5432),
    DB_NAME: stringWithDefault('checkin_bot'),
    DB_USER: stringWithDefault('postgres'),
    DB_PASSWORD: stringWithDefault('postgres'),
});

export type EnvConfig = z.infer<typeof envSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ');
}

function toStoreConfig(env: EnvConfig): StoreConfig {
    if (env.STORE_DRIVER === 'postgres') {
        return {
            driver: 'postgres',
            postgres: {
                databaseUrl: env.DATABASE_URL ?? null,
                host: env.DB_HOST,
                port: env.DB_PORT,
                database: env.DB_NAME,
                user: env.DB_USER,
                password: env.DB_PASSWORD,
            },
        };
    }
    return { driver: 'sqlite', dbPath: env.DB_PATH };
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
    }

    const env = parsed.data;
    return {
        telegramToken: env.TELEGRAM_TOKEN,
        adminChatId: env.ADMIN_ID,
        timezone: env.TIMEZONE,
        reminderTimes: env.REMINDER_TIMES,
        sweepTime: env.SWEEP_TIME,
        inactivityThresholdDays: env.INACTIVITY_THRESHOLD_DAYS,
        sendTimeoutMs: env.SEND_TIMEOUT_MS,
        resetSilenceOnResubscribe: env.RESET_SILENCE_ON_RESUBSCRIBE,
        store: toStoreConfig(env),
    };
}
