const SENSITIVE_FIELDS = [
    'email', 'password', 'token', 'secret', 'key',
    'auth', 'apikey', 'access_token', 'agentkey',
    'signature', 'seed', 'secretkey'
];

/**
 * Recursively scrubs sensitive data from an event payload.
 * Redacts credential-like fields and strips query parameters and hashes from URLs.
 */
export function scrub(data: unknown): unknown {
    if (typeof data !== 'object' || data === null) {
        return data;
    }

    if (Array.isArray(data)) {
        return data.map(scrub);
    }

    const scrubbed: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
        const lowerKey = key.toLowerCase();

        if (SENSITIVE_FIELDS.includes(lowerKey)) {
            scrubbed[key] = '[REDACTED]';
        } else if ((lowerKey === 'url' || lowerKey === 'endpoint') && typeof value === 'string') {
            scrubbed[key] = scrubUrl(value);
        } else {
            scrubbed[key] = scrub(value);
        }
    }

    return scrubbed;
}

function scrubUrl(value: string): string {
    try {
        const url = new URL(value);
        url.search = '';
        url.hash = '';
        return url.toString();
    } catch {
        // Not an absolute URL; anything carrying a query or hash is dropped
        return value.includes('?') || value.includes('#') ? '[SENSITIVE URL REDACTED]' : value;
    }
}
