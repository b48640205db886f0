// src/services/district-layer.ts
// Live view of the committed districts of one plan.

import type { WfsClient } from './wfs-client';
import type { IFeatureLayer } from '../map/IMapInterfaces';

export interface District {
    id: string;
    name: string;
    /** Bumped by the server on each committed assignment; null when the feature type has no version */
    version: number | null;
    feature: GeoJSON.Feature;
}

export interface DistrictLayerLoadEndDetail {
    districts: readonly District[];
    /** Set when the reload failed; the previous districts are kept */
    error: unknown;
    /** True when a newer reload started before this one finished */
    stale: boolean;
}

export const DISTRICT_LOADSTART_EVENT = 'loadstart';
export const DISTRICT_LOADEND_EVENT = 'loadend';

export interface DistrictLayerOptions {
    wfs: WfsClient;
    featureType: string;
    planId: string;
    /** Attribute holding the plan id on district features */
    planProperty?: string;
    layer?: IFeatureLayer | null;
}

/**
 * District id of a feature's attributes: `district_id`, falling back to `id`.
 */
export function readDistrictId(properties: Record<string, unknown> | null | undefined): string | null {
    const candidate = properties?.district_id ?? properties?.id;
    if (typeof candidate === 'string' && candidate.length > 0) return candidate;
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return String(candidate);
    return null;
}

export function toDistrict(feature: GeoJSON.Feature): District | null {
    const properties = feature.properties ?? {};
    const id = readDistrictId(properties);
    if (id === null) {
        return null;
    }
    const name = typeof properties.name === 'string' && properties.name.trim() !== ''
        ? properties.name
        : `District ${id}`;
    const version = typeof properties.version === 'number' ? properties.version : null;
    return { id, name, version, feature };
}

/** Sorts by name, comparing digit runs as numbers ("District 2" before "District 10"). */
export function sortDistricts(districts: readonly District[]): District[] {
    return [...districts].sort((a, b) => a.name.localeCompare(b.name, undefined, { numeric: true }));
}

/**
 * Fetches the plan's districts from WFS and draws them.
 *
 * Every reload fires `loadstart` and, whatever happens, a matching `loadend`
 * (CustomEvent<DistrictLayerLoadEndDetail>).
 */
export class DistrictLayer extends EventTarget {
    private _districts: District[] = [];
    private generation = 0;

    constructor(private readonly options: DistrictLayerOptions) {
        super();
    }

    /** Districts sorted by name. */
    get districts(): readonly District[] {
        return this._districts;
    }

    get featureType(): string {
        return this.options.featureType;
    }

    /**
     * @returns true when the districts were replaced by this reload
     */
    async reload(): Promise<boolean> {
        const generation = ++this.generation;
        this.dispatchEvent(new CustomEvent(DISTRICT_LOADSTART_EVENT));

        let features: GeoJSON.Feature[];
        try {
            features = await this.options.wfs.getWhereEqual(
                this.options.featureType,
                this.options.planProperty ?? 'plan_id',
                this.options.planId
            );
        } catch (error) {
            console.error('[district-layer] Reload failed:', error);
            this.dispatchLoadEnd(error, generation !== this.generation);
            return false;
        }

        if (generation !== this.generation) {
            this.dispatchLoadEnd(null, true);
            return false;
        }

        const districts: District[] = [];
        for (const feature of features) {
            const district = toDistrict(feature);
            if (district) {
                districts.push(district);
            } else {
                console.warn('[district-layer] Ignoring feature without district id', feature.id);
            }
        }
        this._districts = sortDistricts(districts);
        this.render();
        this.dispatchLoadEnd(null, false);
        return true;
    }

    private render(): void {
        const layer = this.options.layer;
        if (!layer) return;
        layer.removeAllFeatures();
        layer.addFeatures(this._districts.map(d => d.feature));
    }

    private dispatchLoadEnd(error: unknown, stale: boolean): void {
        this.dispatchEvent(new CustomEvent<DistrictLayerLoadEndDetail>(DISTRICT_LOADEND_EVENT, {
            detail: { districts: this._districts, error, stale }
        }));
    }
}
