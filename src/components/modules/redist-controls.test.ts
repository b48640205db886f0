import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import './redist-map';
import './redist-toolbar';
import './redist-district-picker';
import './redist-layer-controls';
import './redist-status';
import SlSelect from '@shoelace-style/shoelace/dist/components/select/select.js';
import { NO_DISTRICT } from './redist-district-picker';
import type { RedistMapElement } from './redist-map';
import type { EditorController } from '../../editor/editor-controller';
import { FAKE_ADAPTER_NAME, registerFakeAdapter } from '../../test-utils/fake-map-adapter';
import { districtFeature, featureCollection, geounit, jsonResponse, testConfig } from '../../test-utils/fixtures';

const ASSIGN_URL = '/districtmapping/plan/12/district/7/add';

registerFakeAdapter();

/** Answers district reloads; assignments get `assignReply`. */
function stubServer(assignReply: () => Promise<Response>) {
    vi.stubGlobal('fetch', vi.fn((url: string) => {
        if (url === ASSIGN_URL) {
            return assignReply();
        }
        return Promise.resolve(jsonResponse(featureCollection([
            districtFeature(7, 'District 7'),
            districtFeature(2, 'District 2')
        ])));
    }));
}

async function mountEditor(controls: string): Promise<{ map: RedistMapElement; editor: EditorController }> {
    const map = document.createElement('redist-map');
    map.setAttribute('adapter', FAKE_ADAPTER_NAME);
    map.setAttribute('plan-id', '12');
    map.innerHTML = controls;
    document.body.append(map);

    map.setConfig(testConfig({
        thematic: {
            boundaries: [{ value: 'county', label: 'County' }, { value: 'tract', label: 'Tract' }],
            showBy: [{ value: 'population', label: 'Population' }]
        }
    }));
    await map.getAdapterAsync();
    const editor = map.editor;
    if (!editor) {
        throw new Error('editor did not start');
    }
    await vi.waitFor(() => expect(editor.store.getState().districts).toHaveLength(2));
    return { map, editor };
}

function shadowSelect(host: Element, name?: string): SlSelect {
    const select = host.shadowRoot?.querySelector(name ? `sl-select[name="${name}"]` : 'sl-select');
    if (!(select instanceof SlSelect)) {
        throw new Error('sl-select not rendered');
    }
    return select;
}

/** Picks a value the way a click on an sl-option does. */
function choose(select: SlSelect, value: string): void {
    select.value = value;
    select.dispatchEvent(new CustomEvent('sl-change', { bubbles: true, composed: true }));
}

describe('editor controls', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        document.body.innerHTML = '';
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('redist-map', () => {
        it('starts the editor with the configured and thematic base layers', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map, editor } = await mountEditor('');

            expect(editor.store.getState().planId).toBe('12');
            expect(map.mapElement?.classList.contains('redist-map__surface')).toBe(true);
            expect(map.adapter?.core.getBaseLayer()).toBe('redist:roads');
        });

        it('ignores a new configuration once the editor runs', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map, editor } = await mountEditor('');

            map.setConfig(testConfig({ plan: { id: 99 } }));

            expect(map.editor).toBe(editor);
            expect(map.config?.plan).toBeUndefined();
        });
    });

    describe('redist-toolbar', () => {
        const buttons = `
            <redist-toolbar>
                <button data-tool="navigate">Pan</button>
                <button data-tool="box-select">Box</button>
            </redist-toolbar>`;

        it('activates the tool of a clicked button and marks it', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map, editor } = await mountEditor(buttons);
            const toolbar = map.querySelector('redist-toolbar');
            await toolbar?.updateComplete;
            const [pan, box] = Array.from(map.querySelectorAll('button'));

            expect(pan.hasAttribute('active')).toBe(true);

            box.click();

            expect(editor.tools.activeToolId).toBe('box-select');
            expect(box.hasAttribute('active')).toBe(true);
            expect(pan.hasAttribute('active')).toBe(false);
        });

        it('clears the selection when the active tool is clicked again', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map, editor } = await mountEditor(buttons);
            const [, box] = Array.from(map.querySelectorAll('button'));
            box.click();
            editor.selection.addAll([geounit('1'), geounit('2')]);

            box.click();

            expect(editor.tools.activeToolId).toBe('box-select');
            expect(editor.selection.ids).toEqual([]);
        });
    });

    describe('redist-district-picker', () => {
        it('lists the districts after the placeholder', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map } = await mountEditor('<redist-district-picker></redist-district-picker>');
            const picker = map.querySelector('redist-district-picker');
            await picker?.updateComplete;
            if (!picker) throw new Error('picker missing');

            const options = Array.from(picker.shadowRoot?.querySelectorAll('sl-option') ?? []);

            expect(options.map(o => o.textContent?.trim())).toEqual(['-- Select One --', 'District 2', 'District 7']);
            expect(options.map(o => o.getAttribute('value'))).toEqual([NO_DISTRICT, '2', '7']);
            expect(shadowSelect(picker).value).toBe(NO_DISTRICT);
        });

        it('assigns the selection and returns to the placeholder', async () => {
            let reply: (response: Response) => void = () => {};
            stubServer(() => new Promise<Response>(resolve => { reply = resolve; }));
            const { map, editor } = await mountEditor('<redist-district-picker></redist-district-picker>');
            const picker = map.querySelector('redist-district-picker');
            await picker?.updateComplete;
            if (!picker) throw new Error('picker missing');
            editor.selection.addAll([geounit('1'), geounit('2')]);
            const select = shadowSelect(picker);

            choose(select, '7');
            await picker.updateComplete;
            expect(select.disabled).toBe(true);

            reply(jsonResponse({ success: true }));

            await vi.waitFor(async () => {
                await picker.updateComplete;
                expect(select.value).toBe(NO_DISTRICT);
            });
            expect(select.disabled).toBe(false);
            expect(editor.selection.ids).toEqual([]);
        });

        it('keeps the chosen district and shows the failure when the server refuses', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: false, message: 'Plan is locked' })));
            const { map, editor } = await mountEditor(`
                <redist-district-picker></redist-district-picker>
                <redist-status></redist-status>`);
            const picker = map.querySelector('redist-district-picker');
            const status = map.querySelector('redist-status');
            await picker?.updateComplete;
            if (!picker || !status) throw new Error('controls missing');
            editor.selection.addAll([geounit('1')]);
            const select = shadowSelect(picker);

            choose(select, '7');

            await vi.waitFor(() => expect(editor.store.getState().assignment.status).toBe('failed'));
            await status.updateComplete;
            await picker.updateComplete;
            expect(status.shadowRoot?.querySelector('[role="alert"]')?.textContent).toBe('Plan is locked');
            expect(select.value).toBe('7');
            expect(editor.selection.ids).toEqual(['1']);
        });
    });

    describe('redist-layer-controls', () => {
        it('changes the snap layer and the thematic base layer', async () => {
            stubServer(() => Promise.resolve(jsonResponse({ success: true })));
            const { map, editor } = await mountEditor('<redist-layer-controls></redist-layer-controls>');
            const controls = map.querySelector('redist-layer-controls');
            await controls?.updateComplete;
            if (!controls) throw new Error('layer controls missing');

            choose(shadowSelect(controls, 'snap'), 'simple_county');
            choose(shadowSelect(controls, 'boundary'), 'tract');

            expect(editor.query.snapLayer).toBe('simple_county');
            expect(map.adapter?.core.getBaseLayer()).toBe('redist:demo_tract_population');
        });
    });
});
