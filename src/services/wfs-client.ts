// src/services/wfs-client.ts
// Reads vector features from the spatial feature store over WFS.

import WFS from 'ol/format/WFS';
import GeoJSON from 'ol/format/GeoJSON';
import { equalTo, intersects } from 'ol/format/filter';
import type Filter from 'ol/format/filter/Filter';

export interface WfsClientOptions {
    /** GetFeature endpoint, e.g. "http://maps.example.org/geoserver/wfs" */
    url: string;
    featureNS: string;
    featurePrefix: string;
    /** Projection of the returned geometries and of filter geometries */
    srsName: string;
    /** Name of the geometry attribute used in spatial filters */
    geometryName: string;
}

/**
 * Issues WFS 1.1.0 GetFeature requests (XML written by OpenLayers) and reads the
 * GeoJSON answer. Errors are thrown; callers decide what to keep.
 */
export class WfsClient {
    private readonly format = new WFS();
    private readonly geojson = new GeoJSON();

    constructor(private readonly options: WfsClientOptions) {}

    get url(): string {
        return this.options.url;
    }

    /** Features of `featureType` whose geometry intersects `geometry`. */
    getIntersecting(featureType: string, geometry: GeoJSON.Polygon): Promise<GeoJSON.Feature[]> {
        const olGeometry = this.geojson.readGeometry(geometry);
        return this.getFeatures(featureType, intersects(this.options.geometryName, olGeometry, this.options.srsName));
    }

    /** Features of `featureType` whose `property` equals `value`. */
    getWhereEqual(featureType: string, property: string, value: string | number): Promise<GeoJSON.Feature[]> {
        return this.getFeatures(featureType, equalTo(property, value));
    }

    /**
     * Serializes the GetFeature request body.
     */
    buildGetFeatureBody(featureType: string, filter: Filter): string {
        const node = this.format.writeGetFeature({
            srsName: this.options.srsName,
            featureNS: this.options.featureNS,
            featurePrefix: this.options.featurePrefix,
            featureTypes: [featureType],
            geometryName: this.options.geometryName,
            outputFormat: 'application/json',
            filter
        });
        return new XMLSerializer().serializeToString(node);
    }

    async getFeatures(featureType: string, filter: Filter): Promise<GeoJSON.Feature[]> {
        const response = await fetch(this.options.url, {
            method: 'POST',
            headers: { 'Content-Type': 'text/xml' },
            body: this.buildGetFeatureBody(featureType, filter)
        });
        if (!response.ok) {
            throw new Error(`WFS GetFeature for "${featureType}" failed: ${response.status} ${response.statusText}`);
        }

        let payload: unknown;
        try {
            payload = await response.json();
        } catch (error) {
            throw new Error(`WFS GetFeature for "${featureType}" returned invalid JSON`, { cause: error });
        }

        if (!isFeatureCollection(payload)) {
            throw new Error(`WFS GetFeature for "${featureType}" did not return a FeatureCollection`);
        }
        return payload.features.filter(isFeature);
    }
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFeatureCollection(value: unknown): value is { type: 'FeatureCollection'; features: unknown[] } {
    return isObject(value) && value.type === 'FeatureCollection' && Array.isArray(value.features);
}

function isFeature(value: unknown): value is GeoJSON.Feature {
    return isObject(value) && value.type === 'Feature' && 'geometry' in value;
}
