/**
 * ToolController - the single-active-tool state machine of the editor.
 *
 * Responsibilities:
 * - Register the tools of one editor
 * - Keep exactly one tool active (Navigate on start)
 * - Clear the selection whenever a tool other than Assign is chosen
 * - Remember the tool active before Assign, and bring it back once an assignment succeeds
 * - Dispatch activation/deactivation events and mirror the state into the store
 *
 * @example
 * ```typescript
 * controller.activate('polygon-select');
 * controller.addEventListener('redist-tool-activated', (e) => {
 *   if (e instanceof CustomEvent) console.log('Tool activated:', e.detail.toolId);
 * });
 * ```
 */

import type { IMapTool } from './IMapTool';
import { INITIAL_TOOL, type ToolId } from './tool-ids';
import type { MapStateStore } from '../store/map-state-store';
import type { SelectionBuffer } from '../selection/selection-buffer';

export interface ToolEventDetail {
    toolId: ToolId;
    tool: IMapTool;
}

export const TOOL_ACTIVATED_EVENT = 'redist-tool-activated';
export const TOOL_DEACTIVATED_EVENT = 'redist-tool-deactivated';

export class ToolController extends EventTarget {
    private tools: Map<ToolId, IMapTool> = new Map();
    private _activeToolId: ToolId = INITIAL_TOOL;
    private _previousToolId: ToolId | null = null;
    private store: MapStateStore | null = null;

    constructor(private readonly selection: SelectionBuffer) {
        super();
    }

    /**
     * Set the state store for syncing activeTool state.
     */
    setStore(store: MapStateStore): void {
        this.store = store;
        this.updateStore();
    }

    /**
     * Register a tool. Registering the initial tool activates it.
     */
    register(tool: IMapTool): void {
        if (this.tools.has(tool.toolId)) {
            console.warn(`[tool-controller] Tool "${tool.toolId}" is already registered`);
            return;
        }
        this.tools.set(tool.toolId, tool);

        if (tool.toolId === this._activeToolId && !tool.active) {
            tool.activate();
            this.dispatchToolEvent(TOOL_ACTIVATED_EVENT, tool);
        }
    }

    /**
     * Activate a tool by its ID.
     *
     * The active tool is deactivated first. Every tool except Assign clears the selection,
     * including a tool that was already active. Assign records the tool it replaces.
     *
     * @returns true if the tool is now active, false if it is not registered
     */
    activate(toolId: ToolId): boolean {
        const tool = this.tools.get(toolId);
        if (!tool) {
            console.warn(`[tool-controller] Tool "${toolId}" not found`);
            return false;
        }

        if (toolId === 'assign') {
            if (this._activeToolId !== 'assign') {
                this._previousToolId = this._activeToolId;
                this.switchTo(tool);
            }
            return true;
        }

        if (this._activeToolId !== toolId) {
            this._previousToolId = null;
            this.switchTo(tool);
        }
        this.selection.clear();
        return true;
    }

    /**
     * Leave Assign for the tool that was active before it (Navigate if none was recorded).
     * Does not touch the selection; the district reload that follows a commit clears it.
     *
     * @returns the tool that is active afterwards
     */
    restorePrevious(): ToolId {
        if (this._activeToolId !== 'assign') {
            return this._activeToolId;
        }

        const targetId = this._previousToolId ?? INITIAL_TOOL;
        const target = this.tools.get(targetId) ?? this.tools.get(INITIAL_TOOL);
        this._previousToolId = null;
        if (target) {
            this.switchTo(target);
        } else {
            console.warn(`[tool-controller] No tool to restore after assignment`);
            this.updateStore();
        }
        return this._activeToolId;
    }

    /**
     * Get the currently active tool, or null if it is not registered.
     */
    get activeTool(): IMapTool | null {
        return this.tools.get(this._activeToolId) ?? null;
    }

    get activeToolId(): ToolId {
        return this._activeToolId;
    }

    /** Tool that Assign will hand back to; null unless Assign is active. */
    get previousToolId(): ToolId | null {
        return this._previousToolId;
    }

    getTool(toolId: ToolId): IMapTool | undefined {
        return this.tools.get(toolId);
    }

    getToolIds(): ToolId[] {
        return Array.from(this.tools.keys());
    }

    // ─────────────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────────────

    private switchTo(tool: IMapTool): void {
        const current = this.tools.get(this._activeToolId);
        if (current?.active) {
            current.deactivate();
            this.dispatchToolEvent(TOOL_DEACTIVATED_EVENT, current);
        }

        this._activeToolId = tool.toolId;
        tool.activate();

        this.updateStore();
        this.dispatchToolEvent(TOOL_ACTIVATED_EVENT, tool);
    }

    private updateStore(): void {
        this.store?.dispatch({ activeTool: this._activeToolId, previousTool: this._previousToolId }, 'UI');
    }

    private dispatchToolEvent(type: string, tool: IMapTool): void {
        this.dispatchEvent(new CustomEvent<ToolEventDetail>(type, {
            detail: { toolId: tool.toolId, tool }
        }));
    }
}
