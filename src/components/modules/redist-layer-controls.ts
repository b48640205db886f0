import { html, css, nothing } from 'lit';
import { customElement, state } from 'lit/decorators.js';
import SlSelect from '@shoelace-style/shoelace/dist/components/select/select.js';
import '@shoelace-style/shoelace/dist/components/option/option.js';
import { RedistBaseElement } from './redist-base-element';
import type { IAppState } from '../../store/IState';
import type { ChoiceConfig } from '../../config/types';
import type { EditorController } from '../../editor/editor-controller';

/**
 * Snap-to, boundary and show-by selects.
 *
 * Snap-to changes the geounits the selection tools pick. Boundary and show-by
 * together name the thematic base layer.
 */
@customElement('redist-layer-controls')
export class RedistLayerControls extends RedistBaseElement {
    @state() private snapLayers: ChoiceConfig[] = [];
    @state() private boundaries: ChoiceConfig[] = [];
    @state() private showByChoices: ChoiceConfig[] = [];
    @state() private snapLayer = '';
    @state() private boundary = '';
    @state() private showBy = '';

    static styles = css`
        :host {
            display: flex;
            flex-direction: column;
            gap: 0.5rem;
        }
        sl-select::part(combobox) {
            min-height: 2.5rem;
        }
    `;

    protected onEditorAttached(_editor: EditorController): void {
        const config = this.config;
        if (!config) return;

        this.snapLayers = config.layers.snap.map(s => ({ value: s.featureType, label: s.label }));
        this.boundaries = config.thematic?.boundaries ?? [];
        this.showByChoices = config.thematic?.showBy ?? [];
        this.boundary = this.boundaries[0]?.value ?? '';
        this.showBy = this.showByChoices[0]?.value ?? '';
    }

    protected onStateChanged(state: IAppState): void {
        this.snapLayer = state.snapLayer ?? '';
    }

    private handleSnapChange(e: Event): void {
        const select = e.target;
        if (!(select instanceof SlSelect) || typeof select.value !== 'string' || !this.editor) return;
        this.snapLayer = select.value;
        this.isSettingValue = true;
        this.editor.setSnapLayer(select.value);
        this.isSettingValue = false;
    }

    private handleThematicChange(e: Event): void {
        const select = e.target;
        if (!(select instanceof SlSelect) || typeof select.value !== 'string' || !this.editor) return;
        if (select.name === 'boundary') {
            this.boundary = select.value;
        } else {
            this.showBy = select.value;
        }
        this.editor.showThematicLayer(this.boundary, this.showBy);
    }

    private renderSelect(name: string, label: string, choices: ChoiceConfig[], value: string, onChange: (e: Event) => void) {
        if (choices.length === 0) {
            return nothing;
        }
        return html`
            <sl-select name=${name} label=${label} .value=${value} @sl-change=${onChange}>
                ${choices.map(c => html`<sl-option value=${c.value}>${c.label}</sl-option>`)}
            </sl-select>
        `;
    }

    render() {
        return html`
            ${this.renderSelect('snap', 'Snap to', this.snapLayers, this.snapLayer, this.handleSnapChange)}
            ${this.renderSelect('boundary', 'Boundaries', this.boundaries, this.boundary, this.handleThematicChange)}
            ${this.renderSelect('showBy', 'Show by', this.showByChoices, this.showBy, this.handleThematicChange)}
        `;
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'redist-layer-controls': RedistLayerControls;
    }
}
