import type { Position } from '@tilewalker/shared';
import { manhattan } from './position';

export interface ProgressSample {
    timestamp: number;
    position: Position;
    waypointId: number | null;
}

export interface ProgressTuning {
    capacity: number;
    sampleIntervalMs: number;
    windowMs: number;
    movementThreshold: number;
}

// Fixed-capacity ring; `head` is the next slot to overwrite
export class ProgressTracker {
    private buffer: (ProgressSample | null)[];
    private head = 0;
    private size = 0;
    private lastSampleAt = -Infinity;

    constructor(private tuning: ProgressTuning) {
        this.buffer = new Array<ProgressSample | null>(tuning.capacity).fill(null);
    }

    sample(now: number, position: Position, waypointId: number | null): boolean {
        if (now - this.lastSampleAt < this.tuning.sampleIntervalMs) return false;
        this.buffer[this.head] = { timestamp: now, position, waypointId };
        this.head = (this.head + 1) % this.tuning.capacity;
        this.size = Math.min(this.size + 1, this.tuning.capacity);
        this.lastSampleAt = now;
        return true;
    }

    /** Samples inside the trailing window, oldest first. */
    window(now: number): ProgressSample[] {
        const samples: ProgressSample[] = [];
        for (let i = 0; i < this.size; i++) {
            const index = (this.head - this.size + i + this.tuning.capacity) % this.tuning.capacity;
            const entry = this.buffer[index];
            if (entry && now - entry.timestamp <= this.tuning.windowMs) samples.push(entry);
        }
        return samples;
    }

    /** Net displacement between the oldest and newest samples of the window. */
    displacement(now: number): number {
        const samples = this.window(now);
        if (samples.length < 2) return 0;
        const first = samples[0].position;
        const last = samples[samples.length - 1].position;
        if (first.z !== last.z) return Infinity;
        return manhattan(first, last);
    }

    hasRecentProgress(now: number): boolean {
        return this.displacement(now) >= this.tuning.movementThreshold;
    }

    get length(): number {
        return this.size;
    }

    reset() {
        this.buffer.fill(null);
        this.head = 0;
        this.size = 0;
        this.lastSampleAt = -Infinity;
    }
}
