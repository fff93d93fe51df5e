import type { Position } from '@tilewalker/shared';

const MAX_LOG_ENTRIES = 260;

export interface NavLogContext {
    engineState: string;
    focus: number;
    failures: number;
}

export interface NavLogEntry {
    time: string;
    event: string;
    x: number | null;
    y: number | null;
    z: number | null;
    engineState: string;
    focus: number;
    failures: number;
    detail: string;
}

export type NavLogListener = (entry: NavLogEntry) => void;

const EMPTY_CONTEXT: NavLogContext = { engineState: 'normal', focus: -1, failures: 0 };

export class NavLog {
    entries: NavLogEntry[] = [];
    private listeners: NavLogListener[] = [];
    private contextProvider: () => NavLogContext = () => EMPTY_CONTEXT;

    setContextProvider(provider: () => NavLogContext) {
        this.contextProvider = provider;
    }

    subscribe(listener: NavLogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }

    recordLog(event: string, pos: Position | null, detail: string = '') {
        const context = this.contextProvider();
        const entry: NavLogEntry = {
            time: new Date().toISOString().slice(11, 23),
            event,
            x: pos?.x ?? null,
            y: pos?.y ?? null,
            z: pos?.z ?? null,
            engineState: context.engineState,
            focus: context.focus,
            failures: context.failures,
            detail
        };
        this.entries.push(entry);
        if (this.entries.length > MAX_LOG_ENTRIES) this.entries.shift();
        for (const listener of this.listeners) listener(entry);
    }

    recent(event?: string): NavLogEntry[] {
        return event === undefined ? [...this.entries] : this.entries.filter((e) => e.event === event);
    }

    clear() {
        this.entries = [];
    }
}
