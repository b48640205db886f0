// Shared test data and fetch helpers.

import type { AppConfig } from '../config/types';
import type { GeoUnit } from '../selection/geounit';

export function square(x: number, y: number, size = 10): GeoJSON.Polygon {
    return {
        type: 'Polygon',
        coordinates: [[[x, y], [x + size, y], [x + size, y + size], [x, y + size], [x, y]]]
    };
}

export function geounitFeature(id: string, geolevelId = '2'): GeoJSON.Feature {
    return {
        type: 'Feature',
        id: `simple_block.${id}`,
        geometry: square(Number(id) * 10, 0),
        properties: { id, geolevel_id: geolevelId, name: `Block ${id}` }
    };
}

export function geounit(id: string, geolevelId = '2'): GeoUnit {
    return { id, geolevelId, feature: geounitFeature(id, geolevelId) };
}

export function districtFeature(districtId: number, name: string, version = 1): GeoJSON.Feature {
    return {
        type: 'Feature',
        id: `simple_district.${districtId}`,
        geometry: square(districtId * 100, 100, 50),
        properties: { district_id: districtId, name, version, plan_id: 12 }
    };
}

export function featureCollection(features: GeoJSON.Feature[]): GeoJSON.FeatureCollection {
    return { type: 'FeatureCollection', features };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

/** Request body of a fetch mock call, as text. */
export function requestBody(init: RequestInit | undefined): string {
    const body = init?.body;
    return typeof body === 'string' ? body : '';
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        map: {
            type: 'openlayers',
            projection: 'EPSG:3857',
            extent: [0, 0, 1000, 1000]
        },
        services: {
            mapServer: 'maps.test',
            featureNS: 'http://example.org/redist',
            featurePrefix: 'redist',
            geometryName: 'geom'
        },
        layers: {
            base: [{ name: 'redist:roads' }],
            districtFeatureType: 'simple_district',
            snap: [
                { featureType: 'simple_block', label: 'Blocks' },
                { featureType: 'simple_county', label: 'Counties' }
            ]
        },
        ...overrides
    };
}
