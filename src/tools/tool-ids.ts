/**
 * Interaction modes of the editor. Exactly one is active at any time.
 */
export type ToolId = 'navigate' | 'point-select' | 'box-select' | 'polygon-select' | 'assign';

export const TOOL_IDS: readonly ToolId[] = ['navigate', 'point-select', 'box-select', 'polygon-select', 'assign'];

export const INITIAL_TOOL: ToolId = 'navigate';

export function isToolId(value: unknown): value is ToolId {
    return typeof value === 'string' && TOOL_IDS.some(id => id === value);
}
