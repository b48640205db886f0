import { InteractionTool } from './interaction-tool';
import type { IInteractionService } from '../map/IMapInterfaces';

/** Pan and zoom only. */
export class NavigateTool extends InteractionTool {
    constructor(interactions: IInteractionService) {
        super('navigate', 'navigate', interactions);
    }
}
