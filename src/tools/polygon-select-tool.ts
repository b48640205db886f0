import { InteractionTool } from './interaction-tool';
import type { IInteractionService } from '../map/IMapInterfaces';
import type { DrawEndEvent, MapEventBus } from '../store/map-events';
import type { SelectionBuffer } from '../selection/selection-buffer';
import type { SelectionQuery } from '../selection/selection-query';

/** Replaces the selection with the geounits intersecting a sketched polygon. */
export class PolygonSelectTool extends InteractionTool {
    constructor(
        interactions: IInteractionService,
        private readonly events: MapEventBus,
        private readonly query: SelectionQuery,
        private readonly selection: SelectionBuffer
    ) {
        super('polygon-select', 'polygon', interactions);
    }

    protected onActivate(): () => void {
        return this.events.on('draw-end', (event) => this.handleDraw(event));
    }

    private handleDraw(event: DrawEndEvent): void {
        this.query.intersecting(event.polygon)
            .then(units => {
                if (units) {
                    this.selection.replace(units);
                }
            })
            .catch(error => {
                console.error('[polygon-select] Feature query failed:', error);
            });
    }
}
