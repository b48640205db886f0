import type { IMapAdapter } from '../../map/IMapAdapter';
import { createMapAdapter, DEFAULT_ADAPTER_NAME } from '../../map/adapter-registry';
import type { AppConfig } from '../../config/types';
import { resolveAppConfig, resolvePlanId, resolveServiceUrls } from '../../config/loader';
import { EditorController } from '../../editor/editor-controller';
import { collectBaseLayers } from '../../editor/thematic';

const MAP_VIEW_SLOT = 'map-view';
const MAP_SURFACE_CLASS = 'redist-map__surface';
const MAP_ADAPTER_ATTRIBUTE = 'adapter';

export const MAP_READY_EVENT = 'redist-map-ready';
export const CONFIG_READY_EVENT = 'redist-config-ready';
export const EDITOR_READY_EVENT = 'redist-editor-ready';

/** Event detail for redist-map-ready */
export interface MapReadyEventDetail {
  adapter: IMapAdapter;
  map: RedistMapElement;
}

/** Event detail for redist-config-ready */
export interface ConfigReadyEventDetail {
  config: AppConfig;
  map: RedistMapElement;
}

/** Event detail for redist-editor-ready */
export interface EditorReadyEventDetail {
  editor: EditorController;
  map: RedistMapElement;
}

/**
 * Hosts the map canvas, the editor configuration and the EditorController,
 * without using Shadow DOM. Consumers provide one child with slot="map-view"
 * for the mapping library plus any number of default children for the
 * editor controls.
 *
 * The editor starts once both the adapter and the configuration are there.
 * Configuration comes from setConfig() or from the `src` attribute.
 */
export class RedistMapElement extends HTMLElement {
  private surfaceObserver?: MutationObserver;
  private currentSurface: HTMLElement | null = null;
  private adapterInstance: IMapAdapter | null = null;
  private adapterPromise: Promise<IMapAdapter | null> | null = null;
  private configInstance: AppConfig | null = null;
  private editorInstance: EditorController | null = null;

  connectedCallback(): void {
    this.upsertAndStyleSurface();
    this.observeSurfaceChanges();
    this.ensureAdapter().catch(error => {
      console.error('[redist-map] Adapter setup failed.', error);
    });
    if (!this.configInstance && this.hasAttribute('src')) {
      this.loadSourceConfig().catch(error => {
        console.error('[redist-map] Config setup failed.', error);
      });
    }
  }

  disconnectedCallback(): void {
    this.surfaceObserver?.disconnect();
    this.surfaceObserver = undefined;
    this.editorInstance?.dispose();
    this.editorInstance = null;
    this.adapterInstance?.core.destroy();
  }

  /** Returns the adapter owned by this map, once created. */
  public get adapter(): IMapAdapter | null {
    return this.adapterInstance;
  }

  /** Resolves with the adapter once created (null if creation failed). */
  public getAdapterAsync(): Promise<IMapAdapter | null> {
    return this.ensureAdapter();
  }

  /** Returns the element that should host the mapping library instance. */
  public get mapElement(): HTMLElement | null {
    return this.querySelector<HTMLElement>(`[slot="${MAP_VIEW_SLOT}"]`);
  }

  /** Returns the full configuration for this map. */
  public get config(): AppConfig | null {
    return this.configInstance;
  }

  /** Returns the editor once the map is configured. */
  public get editor(): EditorController | null {
    return this.editorInstance;
  }

  /**
   * Sets the configuration for this map and notifies child components.
   * Dispatches a 'redist-config-ready' event that bubbles up.
   */
  public setConfig(config: AppConfig): void {
    if (this.editorInstance) {
      console.warn('[redist-map] Editor already running; configuration change ignored');
      return;
    }
    this.configInstance = config;
    this.dispatchEvent(new CustomEvent<ConfigReadyEventDetail>(CONFIG_READY_EVENT, {
      detail: { config, map: this },
      bubbles: true,
      composed: true,
    }));
    console.log(`[redist-map] Config set for "${this.id || 'unnamed'}"`);
    this.startEditor();
  }

  private async loadSourceConfig(): Promise<void> {
    const config = await resolveAppConfig(this);
    if (config && !this.configInstance) {
      this.setConfig(config);
    }
  }

  private ensureAdapter(): Promise<IMapAdapter | null> {
    if (!this.adapterPromise) {
      this.adapterPromise = this.createAdapter();
    }
    return this.adapterPromise;
  }

  private async createAdapter(): Promise<IMapAdapter | null> {
    const requestedAdapter = this.getAttribute(MAP_ADAPTER_ATTRIBUTE) ?? DEFAULT_ADAPTER_NAME;

    const adapter = await createMapAdapter(requestedAdapter);
    if (!adapter) {
      console.error(`[redist-map] No adapter available for "${requestedAdapter}".`);
      return null;
    }

    this.adapterInstance = adapter;
    this.dispatchEvent(new CustomEvent<MapReadyEventDetail>(MAP_READY_EVENT, {
      detail: { adapter, map: this },
      bubbles: true,
      composed: true
    }));
    this.startEditor();
    return adapter;
  }

  private startEditor(): void {
    const adapter = this.adapterInstance;
    const config = this.configInstance;
    if (!adapter || !config || this.editorInstance) {
      return;
    }

    const planId = resolvePlanId(config, this);
    if (!planId) {
      console.error('[redist-map] No plan id in config, "plan-id" attribute or page path');
      return;
    }

    const surface = this.mapElement ?? this.upsertAndStyleSurface();
    const baseLayers = collectBaseLayers(config);
    adapter.core.initialize(surface, {
      projection: config.map.projection,
      extent: config.map.extent,
      initialExtent: config.map.initialExtent,
      resolutions: config.map.resolutions,
      wmsUrl: resolveServiceUrls(config.services).wms,
      baseLayers,
      initialBaseLayer: config.layers.defaultBase
    });

    const editor = new EditorController({ adapter, config, planId });
    this.editorInstance = editor;
    this.dispatchEvent(new CustomEvent<EditorReadyEventDetail>(EDITOR_READY_EVENT, {
      detail: { editor, map: this },
      bubbles: true,
      composed: true
    }));
    console.log(`[redist-map] Editing plan ${planId}`);

    editor.start().catch(error => {
      console.error('[redist-map] Initial district load failed.', error);
    });
  }

  private upsertAndStyleSurface(): HTMLElement {
    const surface = this.ensureMapViewElement();
    this.decorateMapSurface(surface);
    this.currentSurface = surface;
    return surface;
  }

  private ensureMapViewElement(): HTMLElement {
    const existing = this.mapElement;
    if (existing) {
      return existing;
    }

    const fallback = document.createElement('div');
    fallback.setAttribute('slot', MAP_VIEW_SLOT);
    fallback.classList.add('redist-map__auto-view');
    this.prepend(fallback);
    return fallback;
  }

  private decorateMapSurface(target: HTMLElement): void {
    target.classList.add(MAP_SURFACE_CLASS);
    const defaults: Record<string, string> = {
      position: 'absolute',
      top: '0',
      right: '0',
      bottom: '0',
      left: '0',
    };
    for (const [property, value] of Object.entries(defaults)) {
      if (!target.style.getPropertyValue(property)) {
        target.style.setProperty(property, value);
      }
    }
  }

  private observeSurfaceChanges(): void {
    if (this.surfaceObserver) {
      return;
    }

    this.surfaceObserver = new MutationObserver(() => {
      const surface = this.mapElement;

      if (!surface) {
        this.upsertAndStyleSurface();
        return;
      }

      if (surface !== this.currentSurface) {
        this.decorateMapSurface(surface);
        this.currentSurface = surface;
      }
    });

    this.surfaceObserver.observe(this, { childList: true });
  }
}

if (!customElements.get('redist-map')) {
  customElements.define('redist-map', RedistMapElement);
}

declare global {
  interface HTMLElementTagNameMap {
    'redist-map': RedistMapElement;
  }
}
