// src/config/index.ts
// Public API for configuration types and validation

export type {
  AppConfig,
  MapConfig,
  ServicesConfig,
  BaseLayerConfig,
  SnapLayerConfig,
  LayersConfig,
  ChoiceConfig,
  ThematicConfig,
  ToolsConfig,
  ToolConfig,
  PointSelectToolConfig,
  PlanConfig,
  MapAdapterType,
} from './types';

export {
  validateConfig,
  formatValidationResult,
  type ValidationResult,
  type ValidationMessage,
  type ValidationSeverity,
} from './validator';

export {
  loadAppConfig,
  resolveAppConfig,
  fetchConfig,
  parseAttributeConfig,
  parsePlanIdFromPath,
  resolvePlanId,
  resolveServiceUrls,
  getConfigUrlParam,
  clearConfigCache,
  type AttributeConfig,
  type LoadedAppConfig,
  type ServiceUrls,
} from './loader';
