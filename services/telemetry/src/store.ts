import type { TelemetryEvent } from '@tilewalker/shared';
import { scrub } from './utils';

export const DEFAULT_LIST_LIMIT = 200;

export interface StoredEvent {
    type: string;
    payload: unknown;
    timestamp: number | null;
    receivedAt: number;
}

// Engine context carried by the runtime's nav.* events
export interface EngineStatus {
    engineState: string;
    focus: number | null;
    failures: number | null;
    position: string | null;
    receivedAt: number;
}

export interface StoreStats {
    retained: number;
    maxEvents: number;
    counts: Record<string, number>;
    engine: EngineStatus | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ParsedEvent {
    type: TelemetryEvent['type'];
    payload: TelemetryEvent['payload'];
    timestamp: number | null;
}

/** Narrows an incoming body to an event; anything else yields null. */
export function parseEvent(body: unknown): ParsedEvent | null {
    if (!isRecord(body) || typeof body.type !== 'string' || body.type.length === 0) return null;
    const payload = isRecord(body.payload) ? body.payload : {};
    const timestamp = typeof body.timestamp === 'number' && Number.isFinite(body.timestamp) ? body.timestamp : null;
    return { type: body.type, payload, timestamp };
}

function numberOrNull(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function readEngineStatus(event: StoredEvent): EngineStatus | null {
    if (!event.type.startsWith('nav.') || !isRecord(event.payload)) return null;
    const { engineState, focus, failures, x, y, z } = event.payload;
    if (typeof engineState !== 'string') return null;
    const [px, py, pz] = [numberOrNull(x), numberOrNull(y), numberOrNull(z)];
    return {
        engineState,
        focus: numberOrNull(focus),
        failures: numberOrNull(failures),
        position: px === null || py === null || pz === null ? null : `${px},${py},${pz}`,
        receivedAt: event.receivedAt
    };
}

export class EventStore {
    events: StoredEvent[] = [];

    constructor(public maxEvents: number) {}

    ingest(body: unknown, receivedAt: number): StoredEvent | null {
        const parsed = parseEvent(body);
        if (!parsed) return null;

        const event: StoredEvent = {
            type: parsed.type,
            payload: scrub(parsed.payload),
            timestamp: parsed.timestamp,
            receivedAt
        };
        this.events.push(event);
        if (this.events.length > this.maxEvents) {
            this.events.splice(0, this.events.length - this.maxEvents);
        }
        return event;
    }

    recent(requested: unknown): StoredEvent[] {
        const value = Number(requested);
        const limit = Number.isFinite(value) && value > 0
            ? Math.min(Math.floor(value), this.maxEvents)
            : DEFAULT_LIST_LIMIT;
        return this.events.slice(-limit);
    }

    stats(): StoreStats {
        const counts: Record<string, number> = {};
        for (const e of this.events) {
            counts[e.type] = (counts[e.type] || 0) + 1;
        }
        return { retained: this.events.length, maxEvents: this.maxEvents, counts, engine: this.engineStatus() };
    }

    /** Context of the newest nav.* event, or null before the engine reported anything. */
    engineStatus(): EngineStatus | null {
        for (let i = this.events.length - 1; i >= 0; i--) {
            const status = readEngineStatus(this.events[i]);
            if (status) return status;
        }
        return null;
    }
}
