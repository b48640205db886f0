import type { ToolId } from './tool-ids';

/**
 * Interface for tools that capture map events exclusively.
 *
 * Tools are mutually exclusive - the ToolController keeps exactly one active.
 *
 * @example
 * ```typescript
 * class MyTool extends InteractionTool {
 *   constructor(interactions: IInteractionService) {
 *     super('navigate', 'navigate', interactions);
 *   }
 * }
 * ```
 */
export interface IMapTool {
    /**
     * Unique identifier for this tool.
     * Used by ToolController for registration and activation.
     */
    readonly toolId: ToolId;

    /**
     * Whether the tool is currently active.
     */
    readonly active: boolean;

    /**
     * Activate the tool. Called by ToolController only.
     */
    activate(): void;

    /**
     * Deactivate the tool. Called by ToolController when another tool is activated.
     */
    deactivate(): void;
}
