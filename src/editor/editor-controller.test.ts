import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EditorController } from './editor-controller';
import { FakeMapAdapter } from '../test-utils/fake-map-adapter';
import {
    districtFeature,
    featureCollection,
    geounitFeature,
    jsonResponse,
    requestBody,
    square,
    testConfig
} from '../test-utils/fixtures';
import type { AppConfig } from '../config/types';
import type { AssignmentStatus } from '../store/IState';

const WFS_URL = 'http://maps.test/geoserver/wfs';
const ASSIGN_URL = '/districtmapping/plan/12/district/7/add';

type AssignReply = () => Promise<Response>;

/**
 * Routes the editor's requests: district reloads and geounit queries go to the
 * WFS URL, assignments to the plan's add URL.
 */
function routeFetch(assignReply: AssignReply, onDistrictReload: () => void = () => {}) {
    const fetchMock = vi.fn((url: string, init?: RequestInit): Promise<Response> => {
        if (url === ASSIGN_URL) {
            return assignReply();
        }
        if (url !== WFS_URL) {
            return Promise.reject(new Error(`unexpected request to ${url}`));
        }
        if (requestBody(init).includes('redist:simple_district')) {
            onDistrictReload();
            return Promise.resolve(jsonResponse(featureCollection([
                districtFeature(7, 'District 7'),
                districtFeature(2, 'District 2')
            ])));
        }
        return Promise.resolve(jsonResponse(featureCollection([
            geounitFeature('1'),
            geounitFeature('2'),
            geounitFeature('3')
        ])));
    });
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function assignCalls(fetchMock: ReturnType<typeof routeFetch>): string[] {
    return fetchMock.mock.calls
        .filter(([url]) => url === ASSIGN_URL)
        .map(([, init]) => requestBody(init));
}

function recordStatuses(adapter: FakeMapAdapter): AssignmentStatus[] {
    const statuses: AssignmentStatus[] = [];
    let last = adapter.store.getState().assignment.status;
    adapter.store.subscribe(state => {
        const status = state.assignment.status;
        if (status !== last) {
            statuses.push(status);
            last = status;
        }
    });
    return statuses;
}

describe('EditorController', () => {
    let adapter: FakeMapAdapter;

    function createEditor(config: AppConfig = testConfig()): EditorController {
        return new EditorController({ adapter, config, planId: '12' });
    }

    async function selectThreeUnits(editor: EditorController): Promise<void> {
        editor.activateTool('polygon-select');
        adapter.events.emit('draw-end', { polygon: square(0, 0, 40) });
        await vi.waitFor(() => expect(editor.selection.ids).toEqual(['1', '2', '3']));
    }

    beforeEach(() => {
        adapter = new FakeMapAdapter();
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    it('starts on Navigate with the plan and the default snap layer in the store', () => {
        const editor = createEditor(testConfig({
            layers: { ...testConfig().layers, defaultSnap: 'simple_county' }
        }));

        const state = adapter.store.getState();
        expect(editor.tools.activeToolId).toBe('navigate');
        expect(state.activeTool).toBe('navigate');
        expect(state.planId).toBe('12');
        expect(state.snapLayer).toBe('simple_county');
        expect(adapter.interactions.getMode()).toBe('navigate');
    });

    it('registers only the enabled selection tools', () => {
        const editor = createEditor(testConfig({ tools: { polygonSelect: { enabled: false } } }));

        expect(editor.tools.getToolIds()).toEqual(['navigate', 'point-select', 'box-select', 'assign']);
    });

    it('loads the districts of the plan into the store on start', async () => {
        routeFetch(() => Promise.reject(new Error('no assignment expected')));
        const editor = createEditor();

        expect(await editor.start()).toBe(true);

        const state = adapter.store.getState();
        expect(state.districts).toEqual([
            { id: '2', name: 'District 2', version: 1 },
            { id: '7', name: 'District 7', version: 1 }
        ]);
        expect(state.districtsLoading).toBe(false);
        expect(adapter.districtLayer.getFeatureCount()).toBe(2);
        expect(adapter.core.busyChanges).toEqual([true, false]);
        expect(state.mapBusy).toBe(false);
    });

    it('assigns a polygon selection and returns to the polygon tool once the districts reload', async () => {
        let styleDuringReload: string | null = null;
        let toolDuringReload: string | null = null;
        const editor = createEditor();
        const fetchMock = routeFetch(
            () => Promise.resolve(jsonResponse({ success: true, message: 'Updated 3 units' })),
            () => {
                styleDuringReload = editor.selection.highlightStyle;
                toolDuringReload = editor.tools.activeToolId;
            }
        );
        await editor.start();
        await selectThreeUnits(editor);
        const statuses = recordStatuses(adapter);

        const result = await editor.assignSelection('7');

        expect(result).toEqual({ ok: true, message: 'Updated 3 units' });
        expect(assignCalls(fetchMock)).toEqual(['geolevel=2&geounits=1%7C2%7C3']);
        expect(styleDuringReload).toBe('select');
        expect(toolDuringReload).toBe('polygon-select');
        expect(statuses).toEqual(['pending', 'committed', 'idle']);

        const state = adapter.store.getState();
        expect(editor.selection.ids).toEqual([]);
        expect(state.selection).toEqual([]);
        expect(state.selectionStyle).toBe('default');
        expect(state.activeTool).toBe('polygon-select');
        expect(state.previousTool).toBeNull();
        expect(adapter.highlightLayer.getFeatureCount()).toBe(0);
        expect(adapter.interactions.getMode()).toBe('polygon');
    });

    it('keeps the selection and the Assign tool when the server rejects the assignment', async () => {
        const fetchMock = routeFetch(() => Promise.resolve(jsonResponse({ success: false, message: 'Plan is locked' })));
        const editor = createEditor();
        await editor.start();
        await selectThreeUnits(editor);
        const reloadsBefore = fetchMock.mock.calls.length;

        const result = await editor.assignSelection('7');

        expect(result).toEqual({ ok: false, reason: 'rejected', message: 'Plan is locked' });
        expect(editor.selection.ids).toEqual(['1', '2', '3']);
        expect(editor.selection.highlightStyle).toBe('default');
        expect(editor.tools.activeToolId).toBe('assign');
        expect(editor.tools.previousToolId).toBe('polygon-select');
        expect(adapter.store.getState().assignment).toEqual({
            status: 'failed',
            districtId: '7',
            message: 'Plan is locked'
        });
        // only the assign request, no district reload
        expect(fetchMock.mock.calls.length).toBe(reloadsBefore + 1);
    });

    it('keeps the selection when the start-up reload lands during a rejected assignment', async () => {
        let releaseDistricts: () => void = () => {};
        let replyAssign: (response: Response) => void = () => {};
        const districts = featureCollection([districtFeature(7, 'District 7'), districtFeature(2, 'District 2')]);
        vi.stubGlobal('fetch', vi.fn((url: string, init?: RequestInit): Promise<Response> => {
            if (url === ASSIGN_URL) {
                return new Promise<Response>(resolve => { replyAssign = resolve; });
            }
            if (requestBody(init).includes('redist:simple_district')) {
                return new Promise<Response>(resolve => {
                    releaseDistricts = () => resolve(jsonResponse(districts));
                });
            }
            return Promise.resolve(jsonResponse(featureCollection([
                geounitFeature('1'),
                geounitFeature('2'),
                geounitFeature('3')
            ])));
        }));
        const editor = createEditor();
        const started = editor.start();
        await selectThreeUnits(editor);
        const assigned = editor.assignSelection('7');

        releaseDistricts();
        expect(await started).toBe(true);
        expect(editor.selection.ids).toEqual(['1', '2', '3']);
        expect(adapter.store.getState().assignment.status).toBe('pending');

        replyAssign(jsonResponse({ success: false, message: 'Plan is locked' }));

        expect(await assigned).toEqual({ ok: false, reason: 'rejected', message: 'Plan is locked' });
        expect(editor.selection.ids).toEqual(['1', '2', '3']);
        expect(editor.tools.activeToolId).toBe('assign');
        expect(adapter.store.getState().districts).toHaveLength(2);
    });

    it('keeps the selection and the Assign tool when the server is unreachable', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        routeFetch(() => Promise.reject(new TypeError('Failed to fetch')));
        const editor = createEditor();
        await editor.start();
        await selectThreeUnits(editor);

        const result = await editor.assignSelection('7');

        expect(result).toEqual({ ok: false, reason: 'network', message: 'failed to select' });
        expect(editor.selection.ids).toEqual(['1', '2', '3']);
        expect(editor.tools.activeToolId).toBe('assign');
        expect(adapter.store.getState().assignment.status).toBe('failed');
        expect(editor.assignmentPending).toBe(false);
    });

    it('clears a failed assignment when another tool is chosen', async () => {
        routeFetch(() => Promise.resolve(jsonResponse({ success: false })));
        const editor = createEditor();
        await editor.start();
        await selectThreeUnits(editor);
        await editor.assignSelection('7');

        editor.activateTool('box-select');

        expect(adapter.store.getState().assignment).toEqual({ status: 'idle', districtId: null, message: null });
        expect(editor.selection.ids).toEqual([]);
    });

    it('refuses to assign an empty selection', async () => {
        const fetchMock = routeFetch(() => Promise.resolve(jsonResponse({ success: true })));
        const editor = createEditor();
        await editor.start();

        expect(await editor.assignSelection('7')).toBeNull();

        expect(assignCalls(fetchMock)).toEqual([]);
        expect(editor.tools.activeToolId).toBe('navigate');
        expect(adapter.store.getState().assignment.status).toBe('idle');
    });

    it('refuses a second assignment while one is in flight', async () => {
        let reply: (response: Response) => void = () => {};
        const fetchMock = routeFetch(() => new Promise<Response>(resolve => { reply = resolve; }));
        const editor = createEditor();
        await editor.start();
        await selectThreeUnits(editor);

        const first = editor.assignSelection('7');
        expect(editor.assignmentPending).toBe(true);
        expect(adapter.core.busy).toBe(true);
        expect(adapter.store.getState().assignment.status).toBe('pending');

        expect(await editor.assignSelection('7')).toBeNull();

        reply(jsonResponse({ success: true }));
        await first;
        expect(assignCalls(fetchMock)).toHaveLength(1);
        expect(adapter.core.busy).toBe(false);
    });

    it('assigns a district picked on the map while Assign is active', async () => {
        const fetchMock = routeFetch(() => Promise.resolve(jsonResponse({ success: true })));
        const editor = createEditor();
        await editor.start();
        await selectThreeUnits(editor);
        editor.activateTool('assign');

        adapter.events.emit('district-pick', { districtId: '7' });

        await vi.waitFor(() => expect(editor.selection.ids).toEqual([]));
        expect(assignCalls(fetchMock)).toEqual(['geolevel=2&geounits=1%7C2%7C3']);
        expect(editor.tools.activeToolId).toBe('polygon-select');
        expect(adapter.store.getState().assignment.status).toBe('idle');
    });

    it('changes the snap layer of the selection tools', () => {
        const editor = createEditor();

        editor.setSnapLayer('simple_county');
        editor.setSnapLayer('simple_state');

        expect(editor.query.snapLayer).toBe('simple_county');
        expect(adapter.store.getState().snapLayer).toBe('simple_county');
    });

    it('switches base and thematic layers known to the map', () => {
        adapter.core.initialize(document.createElement('div'), {
            projection: 'EPSG:3857',
            extent: [0, 0, 1000, 1000],
            wmsUrl: 'http://maps.test/geoserver/gwc/service/wms',
            baseLayers: [{ name: 'redist:roads' }, { name: 'redist:demo_county_population' }]
        });
        const editor = createEditor();

        expect(editor.showThematicLayer('county', 'population')).toBe(true);
        expect(adapter.store.getState().baseLayer).toBe('redist:demo_county_population');

        expect(editor.setBaseLayer('redist:missing')).toBe(false);
        expect(adapter.core.getBaseLayer()).toBe('redist:demo_county_population');
    });

    it('mirrors the zoom level of the map', () => {
        createEditor();

        adapter.events.emit('view-change-end', { center: [500, 500], zoom: 9, extent: [0, 0, 1000, 1000] });

        expect(adapter.store.getState().zoomLevel).toBe(9);
    });

    it('stops mirroring the selection once disposed', () => {
        const editor = createEditor();
        editor.dispose();

        editor.selection.add({ id: '1', geolevelId: '2', feature: geounitFeature('1') });

        expect(adapter.store.getState().selection).toEqual([]);
        expect(editor.tools.activeTool?.active).toBe(false);
    });
});
