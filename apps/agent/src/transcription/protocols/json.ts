// JSON Narrowing Helpers
// Safe accessors over parsed provider payloads

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRecord(source: JsonRecord, key: string): JsonRecord | undefined {
    const value = source[key];
    return isRecord(value) ? value : undefined;
}

export function getString(source: JsonRecord, key: string): string | undefined {
    const value = source[key];
    return typeof value === 'string' ? value : undefined;
}

export function getArray(source: JsonRecord, key: string): unknown[] | undefined {
    const value = source[key];
    return Array.isArray(value) ? value : undefined;
}

export type ParseResult =
    | { ok: true; value: JsonRecord }
    | { ok: false; error: string };

/**
 * Parse a provider message that must be a JSON object
 */
export function parseJsonObject(raw: string): ParseResult {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch (error) {
        return { ok: false, error: error instanceof Error ? error.message : 'Invalid JSON' };
    }

    if (!isRecord(value)) {
        return { ok: false, error: 'Expected a JSON object' };
    }
    return { ok: true, value };
}

export function isBlank(text: string | undefined): boolean {
    return text === undefined || text.trim().length === 0;
}
