// src/map/openlayers-services/InteractionService.ts

import type OLMap from 'ol/Map';
import DragBox from 'ol/interaction/DragBox';
import Draw from 'ol/interaction/Draw';
import Polygon from 'ol/geom/Polygon';
import { shiftKeyOnly } from 'ol/events/condition';
import type { IInteractionService, InteractionMode } from '../IMapInterfaces';
import type { Coordinate, MapEventBus, Pixel } from '../../store/map-events';
import type { MapCoreService } from './MapCoreService';
import type { OpenLayersFeatureLayer } from './FeatureLayerService';
import { readDistrictId } from '../../services/district-layer';

/**
 * Translates OpenLayers pointer interactions into normalized map events,
 * one interaction mode at a time.
 */
export class InteractionService implements IInteractionService {
    private mode: InteractionMode = 'navigate';
    private readonly dragBox = new DragBox();
    private readonly draw = new Draw({ type: 'Polygon' });
    private map: OLMap | null = null;

    constructor(
        core: MapCoreService,
        private readonly eventBus: MapEventBus,
        private readonly districtLayer: OpenLayersFeatureLayer
    ) {
        this.dragBox.on('boxend', () => {
            const [minX, minY, maxX, maxY] = this.dragBox.getGeometry().getExtent();
            this.eventBus.emit('box-end', { extent: [minX, minY, maxX, maxY] });
        });

        this.draw.on('drawend', (event) => {
            const geometry = event.feature.getGeometry();
            if (!(geometry instanceof Polygon)) {
                return;
            }
            this.eventBus.emit('draw-end', {
                polygon: { type: 'Polygon', coordinates: geometry.getCoordinates() },
                originalEvent: event
            });
        });

        core.onMapReady(map => this.attach(map));
        this.applyMode();
    }

    setMode(mode: InteractionMode): void {
        if (this.mode === mode) return;
        this.mode = mode;
        this.applyMode();
    }

    getMode(): InteractionMode {
        return this.mode;
    }

    private attach(map: OLMap): void {
        this.map = map;
        map.addInteraction(this.dragBox);
        map.addInteraction(this.draw);
        map.on('click', (event) => this.handleClick(
            [event.coordinate[0], event.coordinate[1]],
            [event.pixel[0], event.pixel[1]],
            shiftKeyOnly(event),
            event.originalEvent
        ));
    }

    private applyMode(): void {
        this.dragBox.setActive(this.mode === 'box');
        if (this.mode !== 'polygon') {
            this.draw.abortDrawing();
        }
        this.draw.setActive(this.mode === 'polygon');
    }

    private handleClick(coordinate: Coordinate, pixel: Pixel, additive: boolean, originalEvent: unknown): void {
        if (this.mode === 'point') {
            const resolution = this.map?.getView().getResolution();
            if (resolution === undefined) return;
            this.eventBus.emit('unit-click', { coordinate, pixel, resolution, additive, originalEvent });
            return;
        }

        if (this.mode === 'district-pick' && this.map) {
            const districtId = this.map.forEachFeatureAtPixel(
                pixel,
                feature => readDistrictId(feature.getProperties()) ?? undefined,
                { layerFilter: layer => layer === this.districtLayer.olLayer }
            );
            if (districtId) {
                this.eventBus.emit('district-pick', { districtId, originalEvent });
            }
        }
    }
}
