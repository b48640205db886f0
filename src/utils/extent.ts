// src/utils/extent.ts

import type { Coordinate, Extent } from '../store/map-events';

/**
 * Closed polygon ring (counter-clockwise) covering the extent.
 */
export function extentToPolygon([minX, minY, maxX, maxY]: Extent): GeoJSON.Polygon {
    return {
        type: 'Polygon',
        coordinates: [[
            [minX, minY],
            [maxX, minY],
            [maxX, maxY],
            [minX, maxY],
            [minX, minY]
        ]]
    };
}

/**
 * Square extent `tolerancePx` pixels wide, centred on a clicked coordinate.
 * @param resolution Map units per pixel
 */
export function clickExtent([x, y]: Coordinate, resolution: number, tolerancePx: number): Extent {
    const half = tolerancePx * resolution / 2;
    return [x - half, y - half, x + half, y + half];
}

export function isExtent(value: unknown): value is Extent {
    return (
        Array.isArray(value) &&
        value.length === 4 &&
        value.every(v => typeof v === 'number' && Number.isFinite(v)) &&
        value[0] <= value[2] &&
        value[1] <= value[3]
    );
}
