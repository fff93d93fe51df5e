import type { Tuning, TuningOverrides } from '@tilewalker/shared';

export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

export const DEFAULT_TUNING: Tuning = {
    classifier: {
        cacheTtlMs: 2000,
        cleanupIntervalMs: 5000
    },
    pathCache: {
        ttlMs: 800,
        maxEntries: 64,
        driftTolerance: 2
    },
    planner: {
        nodeBudget: 500,
        timeBudgetMs: 8,
        allowDiagonal: true,
        shortcutDistance: 5
    },
    navigation: {
        maxPathDistance: 50,
        maxChunkSteps: 40,
        validateSteps: 40,
        cursorTtlMs: 800,
        defaultPrecision: 1
    },
    floorGuard: {
        intentTimeoutMs: 10000,
        stepBackCooldownMs: 2000,
        maxStepBackAttempts: 3,
        stepBackMaxDistance: 10,
        loopWindowMs: 5000,
        historyCapacity: 8,
        intentDirectionTolerance: true
    },
    engine: {
        tickIntervalMs: 150,
        minTickIntervalMs: 120,
        stuckFailureThreshold: 8,
        noProgressFailureThreshold: 3,
        stuckGraceMs: 3000,
        stuckTimeoutMs: 5000,
        recoveryTimeoutMs: 25000,
        progressCapacity: 16,
        sampleIntervalMs: 1000,
        progressWindowMs: 15000,
        movementThreshold: 3,
        maxActionRetries: 20,
        gotoMaxRetries: 50,
        waypointSearchDistance: 50,
        reachabilityCheckBudget: 150,
        maxReachabilityChecks: 5
    }
};

export function mergeTuning(overrides?: TuningOverrides): Tuning {
    return {
        classifier: { ...DEFAULT_TUNING.classifier, ...overrides?.classifier },
        pathCache: { ...DEFAULT_TUNING.pathCache, ...overrides?.pathCache },
        planner: { ...DEFAULT_TUNING.planner, ...overrides?.planner },
        navigation: { ...DEFAULT_TUNING.navigation, ...overrides?.navigation },
        floorGuard: { ...DEFAULT_TUNING.floorGuard, ...overrides?.floorGuard },
        engine: { ...DEFAULT_TUNING.engine, ...overrides?.engine }
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts only known sections and fields whose type matches the default. */
export function isTuningOverrides(value: unknown): value is TuningOverrides {
    if (!isRecord(value)) return false;
    const sections = new Map<string, object>(Object.entries(DEFAULT_TUNING));
    for (const [name, section] of Object.entries(value)) {
        const defaults = sections.get(name);
        if (!defaults || !isRecord(section)) return false;
        const fields = new Map<string, unknown>(Object.entries(defaults));
        for (const [field, fieldValue] of Object.entries(section)) {
            if (!fields.has(field) || typeof fieldValue !== typeof fields.get(field)) return false;
        }
    }
    return true;
}

/** Section-wise merge; fields in `override` win. */
export function combineOverrides(base: TuningOverrides = {}, override: TuningOverrides = {}): TuningOverrides {
    return {
        classifier: { ...base.classifier, ...override.classifier },
        pathCache: { ...base.pathCache, ...override.pathCache },
        planner: { ...base.planner, ...override.planner },
        navigation: { ...base.navigation, ...override.navigation },
        floorGuard: { ...base.floorGuard, ...override.floorGuard },
        engine: { ...base.engine, ...override.engine }
    };
}
