import type { AppConfig, BaseLayerConfig } from '../config/types';

export const DEFAULT_THEMATIC_PATTERN = 'demo_{boundary}_{showBy}';

/**
 * WMS layer name of a thematic map, e.g. `gmu:demo_county_population`.
 * The prefix is added unless the pattern already carries one.
 */
export function thematicLayerName(
    featurePrefix: string,
    boundary: string,
    showBy: string,
    pattern: string = DEFAULT_THEMATIC_PATTERN
): string {
    const name = pattern.replace(/\{boundary\}/g, boundary).replace(/\{showBy\}/g, showBy);
    return name.includes(':') ? name : `${featurePrefix}:${name}`;
}

/**
 * Base layers the map starts with: the configured ones, followed by every
 * boundary/show-by combination of the thematic section not already listed.
 */
export function collectBaseLayers(config: AppConfig): BaseLayerConfig[] {
    const layers = [...config.layers.base];
    const thematic = config.thematic;
    if (!thematic) {
        return layers;
    }
    const known = new Set(layers.map(layer => layer.name));
    for (const boundary of thematic.boundaries) {
        for (const showBy of thematic.showBy) {
            const name = thematicLayerName(config.services.featurePrefix, boundary.value, showBy.value, thematic.pattern);
            if (!known.has(name)) {
                known.add(name);
                layers.push({ name, title: `${boundary.label} by ${showBy.label}` });
            }
        }
    }
    return layers;
}
