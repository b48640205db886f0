import type { MapStateStore } from '../store/map-state-store';
import type { MapEventBus } from '../store/map-events';
import type { IFeatureLayer, IInteractionService, IMapCore } from './IMapInterfaces';

export interface IMapAdapter {
  readonly store: MapStateStore;
  readonly core: IMapCore;

  /** Switches the pointer interaction (navigate, point, box, polygon, district-pick). */
  readonly interactions: IInteractionService;

  /** Layer drawing the selection buffer. */
  readonly highlightLayer: IFeatureLayer;

  /** Layer drawing the committed districts of the plan. */
  readonly districtLayer: IFeatureLayer;

  /**
   * Event bus for normalized map events.
   * Tools subscribe here to receive library-agnostic events.
   *
   * @example
   * adapter.events.on('box-end', (e) => {
   *   console.log(`Box ${e.extent.join(',')}`);
   * });
   */
  readonly events: MapEventBus;
}
