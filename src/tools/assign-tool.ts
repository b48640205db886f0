import { InteractionTool } from './interaction-tool';
import type { IInteractionService } from '../map/IMapInterfaces';
import type { MapEventBus } from '../store/map-events';

/**
 * Waits for a district to be clicked and hands its id to `onDistrictPicked`.
 * The selection is kept while this tool is active.
 */
export class AssignTool extends InteractionTool {
    constructor(
        interactions: IInteractionService,
        private readonly events: MapEventBus,
        private readonly onDistrictPicked: (districtId: string) => void
    ) {
        super('assign', 'district-pick', interactions);
    }

    protected onActivate(): () => void {
        return this.events.on('district-pick', (event) => this.onDistrictPicked(event.districtId));
    }
}
