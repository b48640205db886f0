import { html, css } from 'lit';
import { customElement, property, queryAssignedElements } from 'lit/decorators.js';
import { RedistBaseElement } from './redist-base-element';
import type { IAppState } from '../../store/IState';
import { isToolId, type ToolId } from '../../tools/tool-ids';

/**
 * Tool buttons of the editor.
 *
 * Slotted buttons name their tool with `data-tool` (or `name`). A click always
 * activates the tool, which clears the selection except for Assign; there is
 * no toggling off. The button of the active tool gets the `active` attribute.
 *
 * @example
 * ```html
 * <redist-toolbar>
 *   <sl-button data-tool="navigate">Pan</sl-button>
 *   <sl-button data-tool="polygon-select">Polygon</sl-button>
 * </redist-toolbar>
 * ```
 */
@customElement('redist-toolbar')
export class RedistToolbar extends RedistBaseElement {
  @property({ type: String, reflect: true }) orientation = 'vertical';

  static styles = css`
    :host {
      display: flex;
      flex-direction: column;
      flex-wrap: wrap;
      flex: 0 0 auto;
      background: var(--redist-toolbar-bg, var(--sl-color-neutral-0, #fff));
      border: 1px solid var(--sl-color-neutral-200, #e5e5e5);
      height: fit-content;
      width: fit-content;
      padding: 0.5rem;
      gap: 0.5rem;
      pointer-events: auto;
      box-shadow: var(--sl-shadow-small);
    }

    :host([orientation="horizontal"]) {
      flex-direction: row;
      max-width: 100%;
    }
  `;

  @queryAssignedElements()
  buttons!: HTMLElement[];

  private activeToolId: ToolId | null = null;

  constructor() {
    super();
    this.addEventListener('click', (e) => this.handleButtonClick(e));
  }

  protected onStateChanged(state: IAppState): void {
    this.activeToolId = state.activeTool;
    this.syncButtons();
  }

  protected firstUpdated(): void {
    this.syncButtons();
  }

  handleSlotChange(): void {
    this.syncButtons();
  }

  handleButtonClick(e: Event): void {
    const target = e.target;
    if (!(target instanceof Element)) return;
    const clickedBtn = target.closest<HTMLElement>('[data-tool], [name]');
    if (!clickedBtn || !this.contains(clickedBtn)) return;

    const toolId = toolIdOf(clickedBtn);
    if (!isToolId(toolId)) {
      console.warn(`[redist-toolbar] Unknown tool "${toolId}"`);
      return;
    }
    if (!this.editor) {
      console.warn('[redist-toolbar] Editor not ready');
      return;
    }
    this.editor.activateTool(toolId);
  }

  /** Marks the button of the active tool. */
  private syncButtons(): void {
    this.buttons?.forEach(btn => {
      const active = this.activeToolId !== null && toolIdOf(btn) === this.activeToolId;
      btn.toggleAttribute('active', active);
      if (btn.tagName.toLowerCase() === 'sl-button') {
        btn.setAttribute('variant', active ? 'primary' : 'default');
      }
    });
  }

  render() {
    return html`<slot @slotchange=${this.handleSlotChange}></slot>`;
  }
}

function toolIdOf(button: HTMLElement): string | null {
  return button.getAttribute('data-tool') ?? button.getAttribute('name');
}

declare global {
  interface HTMLElementTagNameMap {
    'redist-toolbar': RedistToolbar;
  }
}
