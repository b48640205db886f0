import type { IMapTool } from './IMapTool';
import type { ToolId } from './tool-ids';
import type { IInteractionService, InteractionMode } from '../map/IMapInterfaces';

/**
 * Base class for editor tools.
 *
 * Switches the canvas to the tool's interaction mode on activation.
 * Subclasses subscribe to map events in onActivate() and return their cleanup from it.
 */
export abstract class InteractionTool implements IMapTool {
    private _active = false;
    private cleanup: (() => void) | null = null;

    protected constructor(
        readonly toolId: ToolId,
        private readonly mode: InteractionMode,
        private readonly interactions: IInteractionService
    ) {}

    get active(): boolean {
        return this._active;
    }

    activate(): void {
        if (this._active) return;
        this._active = true;
        this.interactions.setMode(this.mode);
        this.cleanup = this.onActivate();
    }

    deactivate(): void {
        if (!this._active) return;
        this._active = false;
        this.cleanup?.();
        this.cleanup = null;
    }

    /**
     * Called when the tool is activated.
     * @returns a function undoing the subscriptions made here, or null
     */
    protected onActivate(): (() => void) | null {
        return null;
    }
}
