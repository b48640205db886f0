import { InteractionTool } from './interaction-tool';
import type { IInteractionService } from '../map/IMapInterfaces';
import type { BoxEndEvent, MapEventBus } from '../store/map-events';
import type { SelectionBuffer } from '../selection/selection-buffer';
import type { SelectionQuery } from '../selection/selection-query';

/** Replaces the selection with the geounits intersecting a dragged box. */
export class BoxSelectTool extends InteractionTool {
    constructor(
        interactions: IInteractionService,
        private readonly events: MapEventBus,
        private readonly query: SelectionQuery,
        private readonly selection: SelectionBuffer
    ) {
        super('box-select', 'box', interactions);
    }

    protected onActivate(): () => void {
        return this.events.on('box-end', (event) => this.handleBox(event));
    }

    private handleBox(event: BoxEndEvent): void {
        this.query.intersectingExtent(event.extent)
            .then(units => {
                if (units) {
                    this.selection.replace(units);
                }
            })
            .catch(error => {
                console.error('[box-select] Feature query failed:', error);
            });
    }
}
