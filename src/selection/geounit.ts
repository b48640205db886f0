import GeoJSON from 'ol/format/GeoJSON';
import type { Coordinate } from '../store/map-events';

/**
 * An atomic geographic sub-unit (census block, precinct...) that can be assigned to a district.
 * The geometry stays with the feature; the editor refers to units by id.
 */
export interface GeoUnit {
    id: string;
    geolevelId: string;
    feature: GeoJSON.Feature;
}

function readIdentifier(value: unknown): string | null {
    if (typeof value === 'string' && value.length > 0) {
        return value;
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
        return String(value);
    }
    return null;
}

/**
 * Reads a geounit from a WFS feature.
 * The unit id is the `id` attribute (the feature id is only a fallback, it carries the type name prefix).
 * Returns null when the feature has no usable id or geolevel.
 */
export function toGeoUnit(feature: GeoJSON.Feature): GeoUnit | null {
    const properties = feature.properties ?? {};
    const id = readIdentifier(properties.id) ?? readIdentifier(feature.id);
    const geolevelId = readIdentifier(properties.geolevel_id);
    if (id === null || geolevelId === null) {
        return null;
    }
    return { id, geolevelId, feature };
}

/**
 * Converts features to geounits, dropping (and reporting) the ones without ids.
 */
export function toGeoUnits(features: readonly GeoJSON.Feature[]): GeoUnit[] {
    const units: GeoUnit[] = [];
    for (const feature of features) {
        const unit = toGeoUnit(feature);
        if (unit) {
            units.push(unit);
        } else {
            console.warn('[selection] Ignoring feature without "id" or "geolevel_id" attribute', feature.id);
        }
    }
    return units;
}

const geojson = new GeoJSON();

/**
 * The unit whose geometry contains the coordinate, otherwise the one whose
 * geometry comes closest to it. Units without a geometry only win when no
 * unit has one.
 */
export function closestUnit(units: readonly GeoUnit[], coordinate: Coordinate): GeoUnit | null {
    let closest: GeoUnit | null = null;
    let closestDistance = Infinity;
    for (const unit of units) {
        if (!unit.feature.geometry) {
            continue;
        }
        const geometry = geojson.readGeometry(unit.feature.geometry);
        if (geometry.intersectsCoordinate(coordinate)) {
            return unit;
        }
        const [x, y] = geometry.getClosestPoint(coordinate);
        const distance = (x - coordinate[0]) ** 2 + (y - coordinate[1]) ** 2;
        if (distance < closestDistance) {
            closest = unit;
            closestDistance = distance;
        }
    }
    return closest ?? units[0] ?? null;
}
