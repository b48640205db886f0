// src/index.ts
// Public API of the editor package.

export * from './config';
export { EditorController, type EditorControllerOptions } from './editor/editor-controller';
export { thematicLayerName, collectBaseLayers } from './editor/thematic';
export { MapStateStore } from './store/map-state-store';
export {
  MapEventBus,
  type Coordinate,
  type Extent,
  type Pixel,
  type MapEventMap,
  type MapEventType
} from './store/map-events';
export type { IAppState, AssignmentState, AssignmentStatus, DistrictSummary, StateSource } from './store/IState';
export type { IMapAdapter } from './map/IMapAdapter';
export type { IMapCore, IInteractionService, IFeatureLayer, InteractionMode, MapInitOptions } from './map/IMapInterfaces';
export { createMapAdapter, registerMapAdapter, getRegisteredAdapters } from './map/adapter-registry';
export { ToolController, TOOL_ACTIVATED_EVENT, TOOL_DEACTIVATED_EVENT, type ToolEventDetail } from './tools/tool-controller';
export { TOOL_IDS, isToolId, type ToolId } from './tools/tool-ids';
export { SelectionBuffer, type SelectionStyle, type SelectionSnapshot } from './selection/selection-buffer';
export { toGeoUnit, toGeoUnits, type GeoUnit } from './selection/geounit';
export { WfsClient, type WfsClientOptions } from './services/wfs-client';
export {
  AssignmentClient,
  type AssignmentRequest,
  type AssignmentResult,
  type AssignmentFailureReason
} from './services/assignment-client';
export { DistrictLayer, type District } from './services/district-layer';
export { formatPlanSubmissionEmail, type PlanSubmission } from './notifications/plan-submission-email';
export { RedistMapElement } from './components/modules/redist-map';
