import catalogData from './hazard-catalog.json';

export type TransitionKind = keyof typeof catalogData.levelTransitions;
export type FieldKind = keyof typeof catalogData.fields;

export interface HazardCatalogSource {
    levelTransitions: Partial<Record<TransitionKind, number[]>>;
    fields: Partial<Record<FieldKind, number[]>>;
}

function indexById<K extends string>(groups: Partial<Record<K, number[]>>): Map<number, K> {
    const index = new Map<number, K>();
    for (const kind in groups) {
        for (const id of groups[kind] ?? []) {
            if (!index.has(id)) index.set(id, kind);
        }
    }
    return index;
}

/**
 * Item identifiers known to move the agent between levels (stairs, ramps,
 * ladders, holes, portals) and identifiers of damaging field items.
 */
export class HazardCatalog {
    private transitions: Map<number, TransitionKind>;
    private fields: Map<number, FieldKind>;

    constructor(source: HazardCatalogSource = catalogData) {
        this.transitions = indexById(source.levelTransitions);
        this.fields = indexById(source.fields);
    }

    transitionKind(id: number): TransitionKind | null {
        return this.transitions.get(id) ?? null;
    }

    isTransition(id: number): boolean {
        return this.transitions.has(id);
    }

    fieldKind(id: number): FieldKind | null {
        return this.fields.get(id) ?? null;
    }

    isField(id: number): boolean {
        return this.fields.has(id);
    }

    get transitionCount(): number {
        return this.transitions.size;
    }
}
