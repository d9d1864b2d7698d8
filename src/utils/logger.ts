function getUTCTimestamp(): string {
    return new Date().toISOString();
}

export function log(...args: unknown[]): void {
    console.log(`[${getUTCTimestamp()}]`, ...args);
}

export function logWarn(...args: unknown[]): void {
    console.warn(`[${getUTCTimestamp()}]`, ...args);
}

export function logError(...args: unknown[]): void {
    console.error(`[${getUTCTimestamp()}]`, ...args);
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    return typeof error === 'string' && error ? error : 'Unknown error';
}
