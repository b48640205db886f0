import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PointSelectTool } from './point-select-tool';
import { BoxSelectTool } from './box-select-tool';
import { PolygonSelectTool } from './polygon-select-tool';
import { AssignTool } from './assign-tool';
import { NavigateTool } from './navigate-tool';
import { SelectionBuffer } from '../selection/selection-buffer';
import { SelectionQuery } from '../selection/selection-query';
import { WfsClient } from '../services/wfs-client';
import { MapEventBus } from '../store/map-events';
import { FakeInteractionService } from '../test-utils/fake-map-adapter';
import { geounit, square } from '../test-utils/fixtures';

describe('selection tools', () => {
    let interactions: FakeInteractionService;
    let events: MapEventBus;
    let selection: SelectionBuffer;
    let query: SelectionQuery;

    beforeEach(() => {
        interactions = new FakeInteractionService();
        events = new MapEventBus();
        selection = new SelectionBuffer();
        query = new SelectionQuery(new WfsClient({
            url: 'http://maps.test/geoserver/wfs',
            featureNS: 'http://example.org/redist',
            featurePrefix: 'redist',
            srsName: 'EPSG:3857',
            geometryName: 'geom'
        }), 'simple_block');
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('switch the interaction mode on activation', () => {
        new NavigateTool(interactions).activate();
        new PointSelectTool(interactions, events, query, selection).activate();
        new BoxSelectTool(interactions, events, query, selection).activate();
        new PolygonSelectTool(interactions, events, query, selection).activate();
        new AssignTool(interactions, events, () => {}).activate();

        expect(interactions.history).toEqual(['navigate', 'point', 'box', 'polygon', 'district-pick']);
    });

    describe('PointSelectTool', () => {
        it('queries a square around the click, sized by the tolerance', async () => {
            const spy = vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('1')]);
            new PointSelectTool(interactions, events, query, selection, 5).activate();

            events.emit('unit-click', { coordinate: [100, 200], pixel: [10, 10], resolution: 2, additive: false });

            expect(spy).toHaveBeenCalledWith([95, 195, 105, 205]);
            await vi.waitFor(() => expect(selection.ids).toEqual(['1']));
        });

        it('replaces the selection on a plain click', async () => {
            selection.addAll([geounit('8'), geounit('9')]);
            vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('1')]);
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [0, 0], pixel: [0, 0], resolution: 1, additive: false });

            await vi.waitFor(() => expect(selection.ids).toEqual(['1']));
        });

        it('picks the unit containing the click out of several hits', async () => {
            selection.addAll([geounit('8'), geounit('9')]);
            vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('1'), geounit('2'), geounit('3')]);
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [25, 5], pixel: [0, 0], resolution: 1, additive: false });

            await vi.waitFor(() => expect(selection.ids).toEqual(['2']));
        });

        it('picks the nearest hit when none contains the click', async () => {
            vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('1'), geounit('3')]);
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [42, 15], pixel: [0, 0], resolution: 1, additive: false });

            await vi.waitFor(() => expect(selection.ids).toEqual(['3']));
        });

        it('adds the clicked unit on a shift-click and never removes one', async () => {
            selection.addAll([geounit('1'), geounit('2')]);
            vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('2'), geounit('3')]);
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [25, 5], pixel: [0, 0], resolution: 1, additive: true });
            events.emit('unit-click', { coordinate: [35, 5], pixel: [0, 0], resolution: 1, additive: true });

            await vi.waitFor(() => expect(selection.ids).toEqual(['1', '2', '3']));
        });

        it('ignores stale answers', async () => {
            selection.add(geounit('1'));
            const spy = vi.spyOn(query, 'intersectingExtent').mockResolvedValue(null);
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [0, 0], pixel: [0, 0], resolution: 1, additive: false });

            await vi.waitFor(() => expect(spy).toHaveBeenCalled());
            await Promise.resolve();
            expect(selection.ids).toEqual(['1']);
        });

        it('logs failed queries and keeps the selection', async () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            selection.add(geounit('1'));
            vi.spyOn(query, 'intersectingExtent').mockRejectedValue(new Error('WFS down'));
            new PointSelectTool(interactions, events, query, selection).activate();

            events.emit('unit-click', { coordinate: [0, 0], pixel: [0, 0], resolution: 1, additive: false });

            await vi.waitFor(() => expect(error).toHaveBeenCalled());
            expect(selection.ids).toEqual(['1']);
        });

        it('stops listening once deactivated', () => {
            const spy = vi.spyOn(query, 'intersectingExtent').mockResolvedValue([]);
            const tool = new PointSelectTool(interactions, events, query, selection);
            tool.activate();
            tool.deactivate();

            events.emit('unit-click', { coordinate: [0, 0], pixel: [0, 0], resolution: 1, additive: false });

            expect(spy).not.toHaveBeenCalled();
            expect(tool.active).toBe(false);
        });
    });

    it('BoxSelectTool replaces the selection with the units in the box', async () => {
        selection.add(geounit('9'));
        const spy = vi.spyOn(query, 'intersectingExtent').mockResolvedValue([geounit('1'), geounit('2')]);
        new BoxSelectTool(interactions, events, query, selection).activate();

        events.emit('box-end', { extent: [0, 0, 30, 30] });

        expect(spy).toHaveBeenCalledWith([0, 0, 30, 30]);
        await vi.waitFor(() => expect(selection.ids).toEqual(['1', '2']));
    });

    it('PolygonSelectTool replaces the selection with the units under the polygon', async () => {
        const polygon = square(0, 0, 40);
        const spy = vi.spyOn(query, 'intersecting').mockResolvedValue([geounit('4'), geounit('5'), geounit('6')]);
        new PolygonSelectTool(interactions, events, query, selection).activate();

        events.emit('draw-end', { polygon });

        expect(spy).toHaveBeenCalledWith(polygon);
        await vi.waitFor(() => expect(selection.ids).toEqual(['4', '5', '6']));
    });

    it('AssignTool hands the picked district over', () => {
        const picked = vi.fn();
        new AssignTool(interactions, events, picked).activate();

        events.emit('district-pick', { districtId: '7' });

        expect(picked).toHaveBeenCalledWith('7');
    });
});
