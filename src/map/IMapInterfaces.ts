// src/map/IMapInterfaces.ts

import type { Coordinate, Extent } from '../store/map-events';
import type { SelectionStyle } from '../selection/selection-buffer';

/**
 * A WMS layer served by the tile cache, one of which is shown as base layer.
 */
export interface BaseLayerSpec {
    /** Layer name on the WMS server, e.g. "gmu:demo_county_population" */
    name: string;
    title?: string;
}

/**
 * Options for initializing the map canvas.
 */
export interface MapInitOptions {
    /** Projection code of the view and of all vector data, e.g. "EPSG:3857" */
    projection: string;
    /** Extent of the cached tiles; also the tiles origin for the cache */
    extent: Extent;
    /** Extent shown on start; defaults to `extent` */
    initialExtent?: Extent;
    /** Resolutions matching the tile cache grid */
    resolutions?: number[];
    /** WMS endpoint of the tile cache */
    wmsUrl: string;
    baseLayers: BaseLayerSpec[];
    /** Name of the base layer shown first; defaults to the first one */
    initialBaseLayer?: string;
}

/**
 * Interface for core map capabilities.
 * Implemented by the concrete adapter services (OpenLayers, or a fake in tests).
 */
export interface IMapCore {
    /** Creates the map inside the container element. */
    initialize(container: HTMLElement, options: MapInitOptions): void;

    /** Shows or hides the busy-wait cursor on the map viewport. */
    setBusy(busy: boolean): void;

    /**
     * Shows the named base layer and hides the others.
     * @returns false when no base layer has that name
     */
    setBaseLayer(name: string): boolean;

    getBaseLayer(): string | null;

    fitExtent(extent: Extent): void;

    getCenter(): Coordinate | null;

    getZoom(): number | null;

    /** Detaches the map from the DOM and releases its resources. */
    destroy(): void;
}

/**
 * Which pointer interaction is live on the canvas.
 * - `navigate`: pan and zoom only
 * - `point`: clicks emit `unit-click`
 * - `box`: dragging a box emits `box-end`
 * - `polygon`: sketching a polygon emits `draw-end`
 * - `district-pick`: clicking a district emits `district-pick`
 */
export type InteractionMode = 'navigate' | 'point' | 'box' | 'polygon' | 'district-pick';

export interface IInteractionService {
    setMode(mode: InteractionMode): void;
    getMode(): InteractionMode;
}

/**
 * A vector layer whose feature set is replaced wholesale.
 * The toolkit re-renders instead of diffing, so callers remove all then add all.
 */
export interface IFeatureLayer {
    readonly id: string;

    removeAllFeatures(): void;

    /** Adds GeoJSON features (in the map projection) drawn with the given style. */
    addFeatures(features: readonly GeoJSON.Feature[], style?: SelectionStyle): void;

    getFeatureCount(): number;
}
