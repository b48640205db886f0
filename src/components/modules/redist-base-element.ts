import { LitElement } from 'lit';
import type { MapStateStore } from '../../store/map-state-store';
import type { IAppState, StateSource } from '../../store/IState';
import type { AppConfig } from '../../config/types';
import type { EditorController } from '../../editor/editor-controller';
import { resolveMapElement } from './map-context';
import { EDITOR_READY_EVENT, type RedistMapElement } from './redist-map';

/**
 * Base class for the editor's controls.
 * Handles connection to the EditorController, its StateStore and the config.
 */
export abstract class RedistBaseElement extends LitElement {

    protected editor: EditorController | null = null;
    protected store: MapStateStore | null = null;
    private mapHostElement: RedistMapElement | null = null;
    private unsubscribe: (() => void) | null = null;
    private editorReadyHandler: (() => void) | null = null;

    /**
     * Flag to prevent infinite loops when updating the store from the UI.
     * Set this to true before dispatching an action, and false after.
     * The handleStateChange method will ignore updates from 'UI' when this is true.
     */
    protected isSettingValue: boolean = false;

    connectedCallback(): void {
        super.connectedCallback();
        this.mapHostElement = resolveMapElement(this);
        this.bindToEditor();
    }

    disconnectedCallback(): void {
        this.releaseEditor();
        this.mapHostElement = null;
        super.disconnectedCallback();
    }

    protected bindToEditor(): void {
        this.releaseEditor();
        const editor = this.mapHostElement?.editor;
        if (!editor) {
            this.subscribeToEditorReady();
            return;
        }

        this.editor = editor;
        this.store = editor.store;
        this.unsubscribe = this.store.subscribe(this.handleStateChange.bind(this));

        this.onEditorAttached(editor);

        // Initial state sync
        this.onStateChanged(this.store.getState());
    }

    protected releaseEditor(): void {
        this.unsubscribeFromEditorReady();
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
        }
        if (this.editor) {
            this.editor = null;
            this.store = null;
            this.onEditorDetached();
        }
    }

    private subscribeToEditorReady(): void {
        if (this.editorReadyHandler || !this.mapHostElement) return;

        this.editorReadyHandler = () => {
            this.unsubscribeFromEditorReady();
            this.bindToEditor();
        };

        this.mapHostElement.addEventListener(EDITOR_READY_EVENT, this.editorReadyHandler);
    }

    private unsubscribeFromEditorReady(): void {
        if (!this.editorReadyHandler) return;
        this.mapHostElement?.removeEventListener(EDITOR_READY_EVENT, this.editorReadyHandler);
        this.editorReadyHandler = null;
    }

    /**
     * Handles updates from the Map State Store.
     * Implements the "Temporary Muting" pattern.
     */
    private handleStateChange(state: IAppState, source: StateSource): void {
        if (source === 'UI' && this.isSettingValue) {
            return;
        }

        this.onStateChanged(state);
    }

    /**
     * Called when the editor is attached.
     * Override this to read configuration or keep references.
     */
    protected onEditorAttached(_editor: EditorController): void {
        // Optional override
    }

    /**
     * Called when the editor is detached.
     */
    protected onEditorDetached(): void {
        // Optional override
    }

    /**
     * Called when the store state changes (and isn't muted).
     * Override this to update your component's reactive properties.
     */
    protected abstract onStateChanged(state: IAppState): void;

    /**
     * Returns the <redist-map> this control drives, if any.
     */
    protected get mapHost(): RedistMapElement | null {
        return this.mapHostElement;
    }

    /**
     * Returns the full configuration from the map.
     */
    protected get config(): AppConfig | null {
        return this.mapHostElement?.config ?? null;
    }
}
