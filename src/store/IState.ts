import type { ToolId } from '../tools/tool-ids';
import type { SelectionStyle } from '../selection/selection-buffer';

/** Summary of a district, as shown in the district picker. */
export interface DistrictSummary {
    id: string;
    name: string;
    version: number | null;
}

/**
 * Phase of the assign round trip.
 * - `pending`: request in flight, selection holds the units being committed
 * - `committed`: server accepted, highlight shows the "select" style until the district reload ends
 * - `failed`: request rejected or unreachable, selection and tool left as they were
 */
export type AssignmentStatus = 'idle' | 'pending' | 'committed' | 'failed';

export interface AssignmentState {
    status: AssignmentStatus;
    districtId: string | null;
    message: string | null;
}

/**
 * The single source of truth for one editor instance.
 * Any property added here must be initialized in createInitialState().
 */
export interface IAppState {
    mapLoaded: boolean;
    /** True while an assignment or a district reload is in flight */
    mapBusy: boolean;
    planId: string | null;

    /** Exactly one tool is active at any time. */
    activeTool: ToolId;
    /** Tool to restore once an assignment succeeds; set only while Assign is active. */
    previousTool: ToolId | null;

    /** Geounit ids in the selection buffer, in insertion order */
    selection: string[];
    selectionStyle: SelectionStyle;
    /** Feature type queried by the selection tools */
    snapLayer: string | null;

    /** Districts of the current plan, sorted by name */
    districts: DistrictSummary[];
    districtsLoading: boolean;

    assignment: AssignmentState;

    baseLayer: string | null;
    zoomLevel: number | null;
}

/** Defines who initiated the state change for loop prevention. */
export type StateSource = 'UI' | 'MAP' | 'INIT' | 'SERVER';

export function createInitialState(): IAppState {
    return {
        mapLoaded: false,
        mapBusy: false,
        planId: null,
        activeTool: 'navigate',
        previousTool: null,
        selection: [],
        selectionStyle: 'default',
        snapLayer: null,
        districts: [],
        districtsLoading: false,
        assignment: { status: 'idle', districtId: null, message: null },
        baseLayer: null,
        zoomLevel: null,
    };
}
