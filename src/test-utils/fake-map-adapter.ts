// In-process stand-in for the OpenLayers adapter, used by tests.

import { MapStateStore } from '../store/map-state-store';
import { MapEventBus, type Coordinate, type Extent } from '../store/map-events';
import type { IMapAdapter } from '../map/IMapAdapter';
import type {
    IFeatureLayer,
    IInteractionService,
    IMapCore,
    InteractionMode,
    MapInitOptions
} from '../map/IMapInterfaces';
import type { SelectionStyle } from '../selection/selection-buffer';
import { registerMapAdapter } from '../map/adapter-registry';

export class FakeMapCore implements IMapCore {
    initOptions: MapInitOptions | null = null;
    container: HTMLElement | null = null;
    busy = false;
    busyChanges: boolean[] = [];
    baseLayer: string | null = null;
    fitted: Extent[] = [];
    destroyed = false;

    initialize(container: HTMLElement, options: MapInitOptions): void {
        this.container = container;
        this.initOptions = options;
        const initial = options.initialBaseLayer ?? options.baseLayers[0]?.name;
        if (initial) {
            this.setBaseLayer(initial);
        }
    }

    setBusy(busy: boolean): void {
        this.busy = busy;
        this.busyChanges.push(busy);
    }

    setBaseLayer(name: string): boolean {
        if (!this.initOptions?.baseLayers.some(layer => layer.name === name)) {
            return false;
        }
        this.baseLayer = name;
        return true;
    }

    getBaseLayer(): string | null {
        return this.baseLayer;
    }

    fitExtent(extent: Extent): void {
        this.fitted.push(extent);
    }

    getCenter(): Coordinate | null {
        return null;
    }

    getZoom(): number | null {
        return null;
    }

    destroy(): void {
        this.destroyed = true;
    }
}

export class FakeInteractionService implements IInteractionService {
    private mode: InteractionMode = 'navigate';
    readonly history: InteractionMode[] = [];

    setMode(mode: InteractionMode): void {
        this.mode = mode;
        this.history.push(mode);
    }

    getMode(): InteractionMode {
        return this.mode;
    }
}

export class FakeFeatureLayer implements IFeatureLayer {
    features: GeoJSON.Feature[] = [];
    style: SelectionStyle | undefined = undefined;
    /** Number of remove-all calls */
    clears = 0;

    constructor(readonly id: string) {}

    removeAllFeatures(): void {
        this.features = [];
        this.style = undefined;
        this.clears++;
    }

    addFeatures(features: readonly GeoJSON.Feature[], style?: SelectionStyle): void {
        this.features.push(...features);
        this.style = style;
    }

    getFeatureCount(): number {
        return this.features.length;
    }
}

export class FakeMapAdapter implements IMapAdapter {
    readonly store = new MapStateStore();
    readonly events = new MapEventBus();
    readonly core = new FakeMapCore();
    readonly interactions = new FakeInteractionService();
    readonly highlightLayer = new FakeFeatureLayer('selection');
    readonly districtLayer = new FakeFeatureLayer('districts');
}

export const FAKE_ADAPTER_NAME = 'fake';

/** Registers the fake under "fake"; returns every adapter it creates. */
export function registerFakeAdapter(): FakeMapAdapter[] {
    const created: FakeMapAdapter[] = [];
    registerMapAdapter(FAKE_ADAPTER_NAME, async () => {
        const adapter = new FakeMapAdapter();
        created.push(adapter);
        return adapter;
    });
    return created;
}
