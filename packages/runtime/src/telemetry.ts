import type { TelemetryEvent } from '@tilewalker/shared';

export const DEFAULT_TELEMETRY_ENDPOINT = 'http://localhost:4002/event';

export interface TelemetrySink {
    send(type: string, payload: Record<string, unknown>): void;
}

export class HttpTelemetrySink implements TelemetrySink {
    constructor(private endpoint: string = DEFAULT_TELEMETRY_ENDPOINT) {}

    send(type: string, payload: Record<string, unknown>) {
        void this.deliver({ type, payload, timestamp: Date.now() });
    }

    async deliver(event: TelemetryEvent): Promise<boolean> {
        try {
            const res = await fetch(this.endpoint, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(event)
            });
            if (!res.ok) console.warn(`Tilewalker: telemetry rejected ${event.type} (${res.status})`);
            return res.ok;
        } catch (e) {
            console.warn('Tilewalker: telemetry delivery failed', e);
            return false;
        }
    }
}
