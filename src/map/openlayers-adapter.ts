// src/map/openlayers-adapter.ts

import { MapStateStore } from '../store/map-state-store';
import { MapEventBus } from '../store/map-events';
import type { IMapAdapter } from './IMapAdapter';
import { MapCoreService } from './openlayers-services/MapCoreService';
import { InteractionService } from './openlayers-services/InteractionService';
import {
    DISTRICT_STYLES,
    OpenLayersFeatureLayer,
    SELECTION_STYLES
} from './openlayers-services/FeatureLayerService';

/**
 * The concrete Map Adapter implementation (OpenLayers).
 * Composes services into a single interface for the editor.
 */
export class OpenLayersAdapter implements IMapAdapter {
    public readonly store: MapStateStore;
    public readonly events: MapEventBus;
    public readonly core: MapCoreService;
    public readonly interactions: InteractionService;
    public readonly districtLayer: OpenLayersFeatureLayer;
    public readonly highlightLayer: OpenLayersFeatureLayer;

    constructor() {
        this.store = new MapStateStore();
        this.events = new MapEventBus();
        this.core = new MapCoreService(this.store, this.events);
        this.districtLayer = new OpenLayersFeatureLayer('districts', DISTRICT_STYLES, 10);
        this.highlightLayer = new OpenLayersFeatureLayer('selection', SELECTION_STYLES, 20);
        // Vector layers go on top of the base layers once the map exists
        this.core.onMapReady(map => {
            map.addLayer(this.districtLayer.olLayer);
            map.addLayer(this.highlightLayer.olLayer);
        });
        this.interactions = new InteractionService(this.core, this.events, this.districtLayer);
    }
}
