import type { WfsClient } from '../services/wfs-client';
import type { Extent } from '../store/map-events';
import { extentToPolygon } from '../utils/extent';
import { toGeoUnits, type GeoUnit } from './geounit';

/**
 * Spatial "intersects" queries against the current snap layer.
 *
 * Every query takes a generation number. An answer that arrives after a newer query,
 * a tool switch or a snap-layer change resolves to null and must be ignored.
 */
export class SelectionQuery {
    private generation = 0;

    constructor(
        private readonly wfs: WfsClient,
        private featureType: string
    ) {}

    get snapLayer(): string {
        return this.featureType;
    }

    /** Changes the feature type queried by the selection tools. */
    setSnapLayer(featureType: string): void {
        this.featureType = featureType;
        this.invalidate();
    }

    /** Makes every query still in flight resolve to null. */
    invalidate(): void {
        this.generation++;
    }

    async intersecting(polygon: GeoJSON.Polygon): Promise<GeoUnit[] | null> {
        const generation = ++this.generation;
        const features = await this.wfs.getIntersecting(this.featureType, polygon);
        if (generation !== this.generation) {
            console.log(`[selection-query] Discarding stale response #${generation}`);
            return null;
        }
        return toGeoUnits(features);
    }

    intersectingExtent(extent: Extent): Promise<GeoUnit[] | null> {
        return this.intersecting(extentToPolygon(extent));
    }
}
