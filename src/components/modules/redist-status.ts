import { html, css, nothing } from 'lit';
import { customElement, state } from 'lit/decorators.js';
import { RedistBaseElement } from './redist-base-element';
import type { AssignmentState, IAppState } from '../../store/IState';

/**
 * Shows the outcome of the last assignment while it matters: the failure
 * message until the user tries again or switches tools.
 */
@customElement('redist-status')
export class RedistStatus extends RedistBaseElement {
    @state() private assignment: AssignmentState = { status: 'idle', districtId: null, message: null };

    static styles = css`
        :host {
            display: block;
        }
        .failed {
            color: var(--sl-color-danger-600, #b91c1c);
        }
    `;

    protected onStateChanged(state: IAppState): void {
        this.assignment = state.assignment;
    }

    render() {
        const { status, message } = this.assignment;
        if (status === 'failed') {
            return html`<div class="failed" role="alert">${message ?? 'failed to select'}</div>`;
        }
        if (status === 'pending') {
            return html`<div class="pending" role="status">Assigning…</div>`;
        }
        return nothing;
    }
}

declare global {
    interface HTMLElementTagNameMap {
        'redist-status': RedistStatus;
    }
}
