// src/map/openlayers-services/MapCoreService.ts

import OLMap from 'ol/Map';
import View from 'ol/View';
import TileLayer from 'ol/layer/Tile';
import TileWMS from 'ol/source/TileWMS';
import TileGrid from 'ol/tilegrid/TileGrid';
import 'ol/ol.css';
import type { IMapCore, MapInitOptions } from '../IMapInterfaces';
import type { MapStateStore } from '../../store/map-state-store';
import type { Coordinate, Extent, MapEventBus } from '../../store/map-events';

/** Class set on the map viewport while the editor waits for the server. */
export const BUSY_CLASS = 'redist-cursor-wait';

const TILE_SIZE = 256;

/**
 * Implements the core map contract (IMapCore) for OpenLayers.
 * Thin wrapper that translates OpenLayers events to generic events.
 */
export class MapCoreService implements IMapCore {
    private mapInstance: OLMap | null = null;
    private mapReadyCallbacks: Array<(map: OLMap) => void> = [];
    private baseLayers = new Map<string, TileLayer<TileWMS>>();
    private activeBaseLayer: string | null = null;
    private busy = false;

    constructor(
        private readonly store: MapStateStore,
        private readonly eventBus: MapEventBus
    ) {}

    public initialize(container: HTMLElement, options: MapInitOptions): void {
        if (this.mapInstance) {
            console.warn('[OL CORE] Map already initialized');
            return;
        }

        const tileGrid = options.resolutions
            ? new TileGrid({
                extent: options.extent,
                origin: [options.extent[0], options.extent[1]],
                resolutions: options.resolutions,
                tileSize: TILE_SIZE
            })
            : undefined;

        const layers = options.baseLayers.map(base => {
            const layer = new TileLayer({
                source: new TileWMS({
                    url: options.wmsUrl,
                    projection: options.projection,
                    tileGrid,
                    params: {
                        LAYERS: base.name,
                        FORMAT: 'image/png',
                        TILED: true,
                        TILESORIGIN: `${options.extent[0]},${options.extent[1]}`
                    }
                }),
                visible: false
            });
            layer.set('title', base.title ?? base.name);
            this.baseLayers.set(base.name, layer);
            return layer;
        });

        this.mapInstance = new OLMap({
            target: container,
            layers,
            view: new View({
                projection: options.projection,
                extent: options.extent,
                resolutions: options.resolutions
            })
        });

        const initialBase = options.initialBaseLayer ?? options.baseLayers[0]?.name;
        if (initialBase) {
            this.setBaseLayer(initialBase);
        }

        this.mapInstance.updateSize();
        this.fitExtent(options.initialExtent ?? options.extent);
        this.applyBusy();

        this.mapInstance.once('rendercomplete', () => {
            this.store.dispatch({ mapLoaded: true }, 'MAP');
        });

        this.mapInstance.on('moveend', () => {
            this.emitViewChangeEnd();
        });

        this.flushMapReadyCallbacks();
    }

    public setBusy(busy: boolean): void {
        this.busy = busy;
        this.applyBusy();
    }

    public setBaseLayer(name: string): boolean {
        const target = this.baseLayers.get(name);
        if (!target) {
            return false;
        }
        this.baseLayers.forEach((layer, layerName) => layer.setVisible(layerName === name));
        this.activeBaseLayer = name;
        return true;
    }

    public getBaseLayer(): string | null {
        return this.activeBaseLayer;
    }

    public fitExtent(extent: Extent): void {
        if (!this.mapInstance) return;
        this.mapInstance.getView().fit(extent, { size: this.mapInstance.getSize() });
    }

    public getCenter(): Coordinate | null {
        const center = this.mapInstance?.getView().getCenter();
        return center ? [center[0], center[1]] : null;
    }

    public getZoom(): number | null {
        return this.mapInstance?.getView().getZoom() ?? null;
    }

    public destroy(): void {
        this.mapInstance?.setTarget(undefined);
        this.mapInstance = null;
        this.baseLayers.clear();
        this.activeBaseLayer = null;
    }

    /**
     * Register a callback to be invoked when the map instance is ready.
     * If the map is already initialized, the callback is invoked immediately.
     */
    public onMapReady(callback: (map: OLMap) => void): void {
        if (this.mapInstance) {
            callback(this.mapInstance);
            return;
        }
        this.mapReadyCallbacks.push(callback);
    }

    private flushMapReadyCallbacks(): void {
        const map = this.mapInstance;
        if (!map) {
            return;
        }

        const pending = this.mapReadyCallbacks.splice(0);
        pending.forEach(callback => {
            try {
                callback(map);
            } catch (error) {
                console.error('[OL CORE] mapReady callback failed.', error);
            }
        });
    }

    private applyBusy(): void {
        this.mapInstance?.getViewport().classList.toggle(BUSY_CLASS, this.busy);
    }

    private emitViewChangeEnd(): void {
        if (!this.mapInstance) return;

        const view = this.mapInstance.getView();
        const center = view.getCenter() ?? [0, 0];
        const [minX, minY, maxX, maxY] = view.calculateExtent(this.mapInstance.getSize());

        this.eventBus.emit('view-change-end', {
            center: [center[0], center[1]],
            zoom: view.getZoom() ?? 0,
            extent: [minX, minY, maxX, maxY]
        });
    }
}
