import { InteractionTool } from './interaction-tool';
import type { IInteractionService } from '../map/IMapInterfaces';
import type { MapEventBus, UnitClickEvent } from '../store/map-events';
import type { SelectionBuffer } from '../selection/selection-buffer';
import type { SelectionQuery } from '../selection/selection-query';
import { closestUnit } from '../selection/geounit';
import { clickExtent } from '../utils/extent';

export const DEFAULT_CLICK_TOLERANCE = 5;

/**
 * Selects the geounit under a click: the one containing the clicked point, or
 * the nearest of those within the tolerance square.
 * A plain click replaces the selection with it; shift-click adds it.
 */
export class PointSelectTool extends InteractionTool {
    constructor(
        interactions: IInteractionService,
        private readonly events: MapEventBus,
        private readonly query: SelectionQuery,
        private readonly selection: SelectionBuffer,
        private readonly clickTolerance = DEFAULT_CLICK_TOLERANCE
    ) {
        super('point-select', 'point', interactions);
    }

    protected onActivate(): () => void {
        return this.events.on('unit-click', (event) => this.handleClick(event));
    }

    private handleClick(event: UnitClickEvent): void {
        const extent = clickExtent(event.coordinate, event.resolution, this.clickTolerance);
        this.query.intersectingExtent(extent)
            .then(units => {
                if (!units) return;
                const unit = closestUnit(units, event.coordinate);
                if (!event.additive) {
                    this.selection.replace(unit ? [unit] : []);
                } else if (unit) {
                    this.selection.add(unit);
                }
            })
            .catch(error => {
                console.error('[point-select] Feature query failed:', error);
            });
    }
}
