// src/map/openlayers-services/FeatureLayerService.ts

import VectorLayer from 'ol/layer/Vector';
import VectorSource from 'ol/source/Vector';
import GeoJSON from 'ol/format/GeoJSON';
import { Fill, Stroke, Style } from 'ol/style';
import type { IFeatureLayer } from '../IMapInterfaces';
import type { SelectionStyle } from '../../selection/selection-buffer';

export type FeatureLayerStyles = Record<SelectionStyle, Style>;

/** Outline for pending units, solid fill once they are committed. */
export const SELECTION_STYLES: FeatureLayerStyles = {
    default: new Style({
        stroke: new Stroke({ color: '#ffff00', width: 3 })
    }),
    select: new Style({
        fill: new Fill({ color: 'rgba(238, 153, 0, 0.4)' }),
        stroke: new Stroke({ color: '#ee9900', width: 1 })
    })
};

// The near-transparent fill keeps district interiors clickable
const DISTRICT_STYLE = new Style({
    fill: new Fill({ color: 'rgba(238, 153, 0, 0.01)' }),
    stroke: new Stroke({ color: '#ee9900', width: 2 })
});

export const DISTRICT_STYLES: FeatureLayerStyles = {
    default: DISTRICT_STYLE,
    select: DISTRICT_STYLE
};

/**
 * OpenLayers vector layer behind IFeatureLayer.
 * Features arrive as GeoJSON already in the map projection.
 */
export class OpenLayersFeatureLayer implements IFeatureLayer {
    readonly source = new VectorSource();
    readonly olLayer = new VectorLayer({ source: this.source });
    private readonly format = new GeoJSON();

    constructor(
        readonly id: string,
        private readonly styles: FeatureLayerStyles,
        zIndex = 0
    ) {
        this.olLayer.set('id', id);
        this.olLayer.setZIndex(zIndex);
    }

    removeAllFeatures(): void {
        this.source.clear();
    }

    addFeatures(features: readonly GeoJSON.Feature[], style: SelectionStyle = 'default'): void {
        const olFeatures = this.format.readFeatures({ type: 'FeatureCollection', features: [...features] });
        const olStyle = this.styles[style];
        olFeatures.forEach(feature => feature.setStyle(olStyle));
        this.source.addFeatures(olFeatures);
    }

    getFeatureCount(): number {
        return this.source.getFeatures().length;
    }
}
