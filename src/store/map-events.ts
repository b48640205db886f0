// src/store/map-events.ts
// Normalized map events that are library-agnostic.
// The editor subscribes to these events without knowing which mapping library is underneath.

/** [x, y] in the map projection */
export type Coordinate = [number, number];
/** [x, y] screen coordinates */
export type Pixel = [number, number];
/** [minX, minY, maxX, maxY] in the map projection */
export type Extent = [number, number, number, number];

interface BaseMapEvent {
    /** Original event from the map library (for advanced use cases) */
    originalEvent?: unknown;
}

/**
 * Click while the point-select interaction is on.
 */
export interface UnitClickEvent extends BaseMapEvent {
    coordinate: Coordinate;
    pixel: Pixel;
    /** Map units per pixel at the time of the click */
    resolution: number;
    /** True when the multiple-selection key (shift) was held */
    additive: boolean;
}

/**
 * A rubber-band box was released while the box-select interaction is on.
 */
export interface BoxEndEvent extends BaseMapEvent {
    extent: Extent;
}

/**
 * A polygon sketch was finished while the polygon interaction is on.
 */
export interface DrawEndEvent extends BaseMapEvent {
    polygon: GeoJSON.Polygon;
}

/**
 * A district feature was clicked while the district-pick interaction is on.
 */
export interface DistrictPickEvent extends BaseMapEvent {
    districtId: string;
}

export interface ViewChangeEndEvent extends BaseMapEvent {
    center: Coordinate;
    zoom: number;
    extent: Extent;
}

/**
 * Map of event types to their payloads.
 */
export interface MapEventMap {
    'unit-click': UnitClickEvent;
    'box-end': BoxEndEvent;
    'draw-end': DrawEndEvent;
    'district-pick': DistrictPickEvent;
    'view-change-end': ViewChangeEndEvent;
}

export type MapEventType = keyof MapEventMap;

export type MapEventListener<T extends MapEventType> = (event: MapEventMap[T]) => void;

type ListenerTable = { readonly [K in MapEventType]: Set<MapEventListener<K>> };

/**
 * MapEventBus - A typed event emitter for normalized map events.
 *
 * Adapters emit here after translating library-specific events;
 * tools subscribe without any knowledge of the underlying map library.
 *
 * @example
 * const unsubscribe = eventBus.on('draw-end', (e) => {
 *     console.log(`Polygon with ${e.polygon.coordinates[0].length} vertices`);
 * });
 *
 * eventBus.emit('box-end', { extent: [0, 0, 10, 10] });
 */
export class MapEventBus {
    private readonly listeners: ListenerTable = {
        'unit-click': new Set(),
        'box-end': new Set(),
        'draw-end': new Set(),
        'district-pick': new Set(),
        'view-change-end': new Set()
    };

    /**
     * Subscribe to a specific event type.
     * @returns Unsubscribe function
     */
    on<T extends MapEventType>(eventType: T, listener: MapEventListener<T>): () => void {
        this.listeners[eventType].add(listener);

        return () => {
            this.off(eventType, listener);
        };
    }

    /**
     * Subscribe to an event type for a single occurrence.
     */
    once<T extends MapEventType>(eventType: T, listener: MapEventListener<T>): () => void {
        const wrappedListener: MapEventListener<T> = (event) => {
            this.off(eventType, wrappedListener);
            listener(event);
        };
        return this.on(eventType, wrappedListener);
    }

    off<T extends MapEventType>(eventType: T, listener: MapEventListener<T>): void {
        this.listeners[eventType].delete(listener);
    }

    /**
     * Emit an event to all subscribers.
     * A throwing listener is logged and does not stop the others.
     */
    emit<T extends MapEventType>(eventType: T, event: MapEventMap[T]): void {
        const listeners = this.listeners[eventType];
        // Copy so a listener may unsubscribe while we iterate
        [...listeners].forEach(listener => {
            try {
                listener(event);
            } catch (err) {
                console.error(`[MapEventBus] Error in listener for "${eventType}":`, err);
            }
        });
    }

    /**
     * Remove all listeners for a specific event type, or all listeners if no type specified.
     */
    clear(eventType?: MapEventType): void {
        if (eventType) {
            this.listeners[eventType].clear();
        } else {
            Object.values(this.listeners).forEach(listeners => listeners.clear());
        }
    }
}
