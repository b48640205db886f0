/**
 * EditorController - wires one map adapter to the editing model.
 *
 * Owns the selection buffer, the tool controller, the district layer and the
 * service clients of a single editor, and mirrors their state into the
 * adapter's MapStateStore.
 *
 * The assign round trip runs in two transitions:
 * - `pending → committed` when the server accepts: highlight flips to the
 *   "select" style and the tool active before Assign comes back
 * - `committed → idle` when the district reload that follows ends: the
 *   selection is cleared
 *
 * Any other reload (the one `start()` issues, say) leaves the selection alone.
 */

import type { IMapAdapter } from '../map/IMapAdapter';
import type { AppConfig } from '../config/types';
import { resolveServiceUrls } from '../config/loader';
import type { AssignmentState, DistrictSummary } from '../store/IState';
import type { MapStateStore } from '../store/map-state-store';
import { SelectionBuffer } from '../selection/selection-buffer';
import { SelectionQuery } from '../selection/selection-query';
import { WfsClient } from '../services/wfs-client';
import { AssignmentClient, type AssignmentResult } from '../services/assignment-client';
import {
    DistrictLayer,
    DISTRICT_LOADEND_EVENT,
    DISTRICT_LOADSTART_EVENT,
    type District,
    type DistrictLayerLoadEndDetail
} from '../services/district-layer';
import { ToolController, TOOL_ACTIVATED_EVENT, type ToolEventDetail } from '../tools/tool-controller';
import type { ToolId } from '../tools/tool-ids';
import { NavigateTool } from '../tools/navigate-tool';
import { PointSelectTool, DEFAULT_CLICK_TOLERANCE } from '../tools/point-select-tool';
import { BoxSelectTool } from '../tools/box-select-tool';
import { PolygonSelectTool } from '../tools/polygon-select-tool';
import { AssignTool } from '../tools/assign-tool';
import { BusyTracker } from '../utils/busy-tracker';
import { thematicLayerName } from './thematic';

export const DEFAULT_GEOMETRY_NAME = 'geom';

export interface EditorControllerOptions {
    adapter: IMapAdapter;
    config: AppConfig;
    planId: string;
}

export class EditorController {
    readonly selection: SelectionBuffer;
    readonly tools: ToolController;
    readonly districts: DistrictLayer;
    readonly query: SelectionQuery;

    private readonly adapter: IMapAdapter;
    private readonly config: AppConfig;
    private readonly planId: string;
    private readonly busy: BusyTracker;
    private readonly assignments: AssignmentClient;
    private readonly reloadReleases: Array<() => void> = [];
    private readonly cleanups: Array<() => void> = [];
    private assignPending = false;
    private disposed = false;

    constructor({ adapter, config, planId }: EditorControllerOptions) {
        this.adapter = adapter;
        this.config = config;
        this.planId = planId;

        const urls = resolveServiceUrls(config.services);
        const wfs = new WfsClient({
            url: urls.wfs,
            featureNS: config.services.featureNS,
            featurePrefix: config.services.featurePrefix,
            srsName: config.services.srsName ?? config.map.projection,
            geometryName: config.services.geometryName ?? DEFAULT_GEOMETRY_NAME
        });

        this.busy = new BusyTracker(busy => {
            this.adapter.core.setBusy(busy);
            this.store.dispatch({ mapBusy: busy }, 'MAP');
        });

        this.selection = new SelectionBuffer(adapter.highlightLayer);
        this.query = new SelectionQuery(wfs, initialSnapLayer(config));
        this.tools = new ToolController(this.selection);
        this.districts = new DistrictLayer({
            wfs,
            featureType: config.layers.districtFeatureType,
            planId,
            layer: adapter.districtLayer
        });
        this.assignments = new AssignmentClient({
            baseUrl: config.services.assignBaseUrl,
            csrfToken: config.services.csrfToken,
            busy: this.busy
        });

        this.store.dispatch({
            planId,
            snapLayer: this.query.snapLayer,
            baseLayer: adapter.core.getBaseLayer(),
            zoomLevel: adapter.core.getZoom()
        }, 'INIT');

        this.wire();
        this.registerTools();
        this.tools.setStore(this.store);
    }

    get store(): MapStateStore {
        return this.adapter.store;
    }

    get assignmentPending(): boolean {
        return this.assignPending;
    }

    /**
     * Loads the plan's districts for the first time.
     */
    start(): Promise<boolean> {
        return this.districts.reload();
    }

    activateTool(toolId: ToolId): boolean {
        return this.tools.activate(toolId);
    }

    /**
     * Assigns the selected geounits to a district.
     *
     * Switches to Assign first (remembering the current tool). Refused, and
     * resolved with null, when the selection is empty or another assignment is
     * in flight.
     */
    async assignSelection(districtId: string): Promise<AssignmentResult | null> {
        if (this.assignPending) {
            console.warn('[editor] An assignment is already in flight');
            return null;
        }
        const geolevelId = this.selection.geolevelId;
        if (this.selection.size === 0 || geolevelId === null) {
            console.warn('[editor] Nothing selected to assign');
            return null;
        }

        this.tools.activate('assign');
        this.assignPending = true;
        this.setAssignment({ status: 'pending', districtId, message: null });

        const result = await this.assignments.assign({
            planId: this.planId,
            districtId,
            geolevelId,
            geounitIds: this.selection.ids
        });
        this.assignPending = false;

        if (this.disposed) {
            return result;
        }

        if (!result.ok) {
            console.warn(`[editor] Assignment to district ${districtId} failed (${result.reason}): ${result.message}`);
            this.setAssignment({ status: 'failed', districtId, message: result.message });
            return result;
        }

        this.selection.setStyle('select');
        this.tools.restorePrevious();
        this.setAssignment({ status: 'committed', districtId, message: result.message });
        await this.districts.reload();
        return result;
    }

    /** Changes the feature type the selection tools query. */
    setSnapLayer(featureType: string): void {
        if (!this.config.layers.snap.some(layer => layer.featureType === featureType)) {
            console.warn(`[editor] Unknown snap layer "${featureType}"`);
            return;
        }
        this.query.setSnapLayer(featureType);
        this.store.dispatch({ snapLayer: featureType }, 'UI');
    }

    setBaseLayer(name: string): boolean {
        if (!this.adapter.core.setBaseLayer(name)) {
            console.warn(`[editor] Unknown base layer "${name}"`);
            return false;
        }
        this.store.dispatch({ baseLayer: name }, 'UI');
        return true;
    }

    /** Shows the thematic map of a boundary shaded by an attribute. */
    showThematicLayer(boundary: string, showBy: string): boolean {
        return this.setBaseLayer(
            thematicLayerName(this.config.services.featurePrefix, boundary, showBy, this.config.thematic?.pattern)
        );
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        this.tools.activeTool?.deactivate();
        this.cleanups.forEach(cleanup => cleanup());
        this.cleanups.length = 0;
        this.reloadReleases.forEach(release => release());
        this.reloadReleases.length = 0;
    }

    // ─────────────────────────────────────────────────────────────────────
    // Private helpers
    // ─────────────────────────────────────────────────────────────────────

    private registerTools(): void {
        const { interactions, events } = this.adapter;
        const tools = this.config.tools ?? {};

        this.tools.register(new NavigateTool(interactions));
        if (tools.pointSelect?.enabled !== false) {
            this.tools.register(new PointSelectTool(
                interactions, events, this.query, this.selection,
                tools.pointSelect?.clickTolerance ?? DEFAULT_CLICK_TOLERANCE
            ));
        }
        if (tools.boxSelect?.enabled !== false) {
            this.tools.register(new BoxSelectTool(interactions, events, this.query, this.selection));
        }
        if (tools.polygonSelect?.enabled !== false) {
            this.tools.register(new PolygonSelectTool(interactions, events, this.query, this.selection));
        }
        this.tools.register(new AssignTool(interactions, events, (districtId) => {
            this.assignSelection(districtId).catch(error => {
                console.error('[editor] Assignment failed:', error);
            });
        }));
    }

    private wire(): void {
        this.cleanups.push(this.selection.subscribe(snapshot => {
            this.store.dispatch({ selection: snapshot.ids, selectionStyle: snapshot.style }, 'UI');
        }));

        const onToolActivated = (event: Event) => {
            // Answers to queries made under the previous tool are dropped
            this.query.invalidate();
            const detail: ToolEventDetail | undefined = event instanceof CustomEvent ? event.detail : undefined;
            if (detail?.toolId !== 'assign' && this.store.getState().assignment.status === 'failed') {
                this.setAssignment({ status: 'idle', districtId: null, message: null });
            }
        };
        this.tools.addEventListener(TOOL_ACTIVATED_EVENT, onToolActivated);
        this.cleanups.push(() => this.tools.removeEventListener(TOOL_ACTIVATED_EVENT, onToolActivated));

        const onLoadStart = () => {
            this.reloadReleases.push(this.busy.acquire());
            this.store.dispatch({ districtsLoading: true }, 'SERVER');
        };
        const onLoadEnd = (event: Event) => {
            this.reloadReleases.shift()?.();
            if (!(event instanceof CustomEvent)) return;
            const detail: DistrictLayerLoadEndDetail = event.detail;
            this.onDistrictsLoaded(detail);
        };
        this.districts.addEventListener(DISTRICT_LOADSTART_EVENT, onLoadStart);
        this.districts.addEventListener(DISTRICT_LOADEND_EVENT, onLoadEnd);
        this.cleanups.push(() => {
            this.districts.removeEventListener(DISTRICT_LOADSTART_EVENT, onLoadStart);
            this.districts.removeEventListener(DISTRICT_LOADEND_EVENT, onLoadEnd);
        });

        this.cleanups.push(this.adapter.events.on('view-change-end', (event) => {
            this.store.dispatch({ zoomLevel: event.zoom }, 'MAP');
        }));
    }

    private onDistrictsLoaded(detail: DistrictLayerLoadEndDetail): void {
        this.store.dispatch({
            districtsLoading: this.reloadReleases.length > 0,
            districts: detail.districts.map(toSummary)
        }, 'SERVER');

        // The commit's reload supersedes every earlier one, so only its loadend
        // (or a later one) arrives non-stale while committed.
        if (detail.stale || this.store.getState().assignment.status !== 'committed') {
            return;
        }
        this.selection.clear();
        this.setAssignment({ status: 'idle', districtId: null, message: null });
    }

    private setAssignment(assignment: AssignmentState): void {
        this.store.dispatch({ assignment }, 'UI');
    }
}

function initialSnapLayer(config: AppConfig): string {
    const { snap, defaultSnap } = config.layers;
    if (defaultSnap && snap.some(layer => layer.featureType === defaultSnap)) {
        return defaultSnap;
    }
    return snap.length > 0 ? snap[0].featureType : '';
}

function toSummary(district: District): DistrictSummary {
    return { id: district.id, name: district.name, version: district.version };
}
