import type { IFeatureLayer } from '../map/IMapInterfaces';
import type { GeoUnit } from './geounit';

/**
 * `default` outlines pending units; `select` fills them once the server accepted the assignment.
 */
export type SelectionStyle = 'default' | 'select';

export interface SelectionSnapshot {
    ids: string[];
    style: SelectionStyle;
}

type SelectionListener = (snapshot: SelectionSnapshot) => void;

/**
 * The set of highlighted geounits pending assignment.
 *
 * Unique by id, insertion ordered. Every mutation re-renders the highlight layer
 * (remove all, then add all) and notifies subscribers. Calls that change nothing
 * render nothing.
 */
export class SelectionBuffer {
    private readonly units = new Map<string, GeoUnit>();
    private style: SelectionStyle = 'default';
    private listeners: SelectionListener[] = [];

    constructor(private readonly layer: IFeatureLayer | null = null) {}

    get size(): number {
        return this.units.size;
    }

    get ids(): readonly string[] {
        return Array.from(this.units.keys());
    }

    get items(): readonly GeoUnit[] {
        return Array.from(this.units.values());
    }

    get highlightStyle(): SelectionStyle {
        return this.style;
    }

    /** Geolevel of the first selected unit; the assign request is made at that level. */
    get geolevelId(): string | null {
        const [first] = this.units.values();
        return first ? first.geolevelId : null;
    }

    has(id: string): boolean {
        return this.units.has(id);
    }

    /**
     * Appends the unit unless one with the same id is present.
     * @returns true if the buffer changed
     */
    add(unit: GeoUnit): boolean {
        if (this.units.has(unit.id)) {
            return false;
        }
        this.units.set(unit.id, unit);
        this.contentsChanged();
        return true;
    }

    addAll(units: readonly GeoUnit[]): number {
        let added = 0;
        for (const unit of units) {
            if (!this.units.has(unit.id)) {
                this.units.set(unit.id, unit);
                added++;
            }
        }
        if (added > 0) {
            this.contentsChanged();
        }
        return added;
    }

    /**
     * Removes by id; no-op when absent.
     * @returns true if the buffer changed
     */
    remove(unit: GeoUnit | string): boolean {
        const id = typeof unit === 'string' ? unit : unit.id;
        if (!this.units.delete(id)) {
            return false;
        }
        this.contentsChanged();
        return true;
    }

    /** Removes the unit when selected, adds it otherwise. */
    toggle(unit: GeoUnit): boolean {
        if (this.units.has(unit.id)) {
            this.units.delete(unit.id);
        } else {
            this.units.set(unit.id, unit);
        }
        this.contentsChanged();
        return this.units.has(unit.id);
    }

    /** Empties the buffer, then adds the given units. */
    replace(units: readonly GeoUnit[]): void {
        const before = this.ids;
        this.units.clear();
        for (const unit of units) {
            this.units.set(unit.id, unit);
        }
        const after = this.ids;
        const same = before.length === after.length && before.every((id, i) => id === after[i]);
        if (!same) {
            this.contentsChanged();
        }
    }

    /** Empties the buffer and resets the highlight to the `default` style. */
    clear(): void {
        if (this.units.size === 0 && this.style === 'default') {
            return;
        }
        this.units.clear();
        this.style = 'default';
        this.changed();
    }

    setStyle(style: SelectionStyle): void {
        if (this.style === style) {
            return;
        }
        this.style = style;
        this.changed();
    }

    snapshot(): SelectionSnapshot {
        return { ids: [...this.ids], style: this.style };
    }

    subscribe(listener: SelectionListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /** New contents are not the ones being committed: drop the `select` style. */
    private contentsChanged(): void {
        this.style = 'default';
        this.changed();
    }

    private changed(): void {
        this.render();
        const snapshot = this.snapshot();
        this.listeners.forEach(listener => listener(snapshot));
    }

    private render(): void {
        if (!this.layer) {
            return;
        }
        this.layer.removeAllFeatures();
        if (this.units.size > 0) {
            this.layer.addFeatures(this.items.map(unit => unit.feature), this.style);
        }
    }
}
