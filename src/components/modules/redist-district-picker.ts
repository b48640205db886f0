import { html, css } from 'lit';
import { customElement, state } from 'lit/decorators.js';
import SlSelect from '@shoelace-style/shoelace/dist/components/select/select.js';
import '@shoelace-style/shoelace/dist/components/option/option.js';
import { RedistBaseElement } from './redist-base-element';
import type { DistrictSummary, IAppState } from '../../store/IState';

/** Value of the placeholder option; never sent to the server. */
export const NO_DISTRICT = '-1';

/**
 * Drop-down of the plan's districts. Choosing one assigns the current
 * selection to it; the drop-down returns to the placeholder once the server
 * has accepted the assignment.
 */
@customElement('redist-district-picker')
export class RedistDistrictPicker extends RedistBaseElement {
    @state() private districts: DistrictSummary[] = [];
    @state() private value = NO_DISTRICT;
    @state() private disabled = true;

    static styles = css`
        :host {
            display: block;
        }
        sl-select {
            min-width: 12rem;
        }
    `;

    protected onStateChanged(state: IAppState): void {
        this.districts = state.districts;
        this.disabled = state.assignment.status === 'pending';
        if (this.value !== NO_DISTRICT && !state.districts.some(d => d.id === this.value)) {
            this.value = NO_DISTRICT;
        }
    }

    private handleChange(e: Event): void {
        const select = e.target;
        if (!(select instanceof SlSelect) || typeof select.value !== 'string') return;

        const districtId = select.value;
        this.value = districtId;
        if (districtId === NO_DISTRICT || !this.editor) {
            return;
        }

        this.editor.assignSelection(districtId)
            .then(result => {
                if (result === null || result.ok) {
                    this.value = NO_DISTRICT;
                }
            })
            .catch(error => {
                console.error('[redist-district-picker] Assignment failed:', error);
            });
    }

    render() {
        return html`
            <sl-select
                label="Assign to district"
                .value=${this.value}
                ?disabled=${this.disabled}
                @sl-change=${this.handleChange}
            >
                <sl-option value=${NO_DISTRICT}>-- Select One --</sl-option>
                ${this.districts.map(d => html`
                    <sl-option value=${d.id}>${d.name}</sl-option>
                `)}
            </sl-select>
        `;
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'redist-district-picker': RedistDistrictPicker;
    }
}
