// src/config/validator.ts
// Runtime validator for editor configuration files

import { isExtent } from '../utils/extent';
import type {
  AppConfig,
  BaseLayerConfig,
  ChoiceConfig,
  LayersConfig,
  MapAdapterType,
  MapConfig,
  PlanConfig,
  ServicesConfig,
  SnapLayerConfig,
  ThematicConfig,
  ToolsConfig,
} from './types';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationMessage {
  severity: ValidationSeverity;
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationMessage[];
  warnings: ValidationMessage[];
  /** The configuration rebuilt from the checked values; null when there are errors */
  config: AppConfig | null;
}

// Known keys for each config section
const KNOWN_KEYS = {
  root: ['map', 'services', 'layers', 'thematic', 'tools', 'plan'],
  map: ['label', 'type', 'projection', 'extent', 'initialExtent', 'resolutions'],
  services: ['mapServer', 'wfsPath', 'wmsPath', 'featureNS', 'featurePrefix', 'srsName', 'geometryName', 'assignBaseUrl', 'csrfToken'],
  layers: ['base', 'defaultBase', 'districtFeatureType', 'snap', 'defaultSnap'],
  baseLayer: ['name', 'title'],
  snapLayer: ['featureType', 'label'],
  thematic: ['boundaries', 'showBy', 'pattern'],
  choice: ['value', 'label'],
  tool: ['enabled'],
  pointSelect: ['enabled', 'clickTolerance'],
  plan: ['id'],
};

const VALID_MAP_TYPES: readonly MapAdapterType[] = ['openlayers'];
const KNOWN_TOOLS = ['pointSelect', 'boxSelect', 'polygonSelect'];

/**
 * Validates an editor configuration object.
 * A valid result carries the configuration, typed, with unknown keys left out.
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationMessage[] = [];
  const warnings: ValidationMessage[] = [];

  if (!isObject(config)) {
    errors.push({ severity: 'error', path: '', message: 'Configuration must be an object' });
    return { valid: false, errors, warnings, config: null };
  }

  checkUnknownKeys(config, KNOWN_KEYS.root, '', warnings);

  const map = validateMapSection(config.map, errors, warnings);
  const services = validateServicesSection(config.services, errors, warnings);
  const layers = validateLayersSection(config.layers, config.thematic !== undefined, errors, warnings);

  const thematic = config.thematic !== undefined
    ? validateThematicSection(config.thematic, errors, warnings)
    : undefined;

  const tools = config.tools !== undefined
    ? validateToolsSection(config.tools, 'tools', errors, warnings)
    : undefined;

  const plan = config.plan !== undefined
    ? validatePlanSection(config.plan, errors, warnings)
    : undefined;

  if (errors.length > 0 || !map || !services || !layers || thematic === null || plan === null) {
    return { valid: false, errors, warnings, config: null };
  }

  return {
    valid: true,
    errors,
    warnings,
    config: { map, services, layers, thematic, tools, plan },
  };
}

function validateMapSection(
  map: unknown,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): MapConfig | null {
  const path = 'map';

  if (map === undefined) {
    errors.push({ severity: 'error', path, message: 'Missing required "map" section' });
    return null;
  }

  if (!isObject(map)) {
    errors.push({ severity: 'error', path, message: '"map" must be an object' });
    return null;
  }

  const errorCount = errors.length;
  checkUnknownKeys(map, KNOWN_KEYS.map, path, warnings);

  const label = optionalString(map, 'label', path, errors);

  const type = map.type;
  if (type === undefined) {
    errors.push({ severity: 'error', path: `${path}.type`, message: 'Missing required "type"' });
  } else if (!isMapType(type)) {
    errors.push({
      severity: 'error',
      path: `${path}.type`,
      message: `"type" must be one of: ${VALID_MAP_TYPES.join(', ')}`,
    });
  }

  const projection = requireString(map, 'projection', path, errors);

  const extent = map.extent;
  if (extent === undefined) {
    errors.push({ severity: 'error', path: `${path}.extent`, message: 'Missing required "extent"' });
  } else if (!isExtent(extent)) {
    errors.push({
      severity: 'error',
      path: `${path}.extent`,
      message: '"extent" must be [minX, minY, maxX, maxY] with min <= max',
    });
  }

  const initialExtent = map.initialExtent;
  if (initialExtent !== undefined && !isExtent(initialExtent)) {
    errors.push({
      severity: 'error',
      path: `${path}.initialExtent`,
      message: '"initialExtent" must be [minX, minY, maxX, maxY] with min <= max',
    });
  }

  const resolutions = map.resolutions;
  if (resolutions !== undefined) {
    if (!Array.isArray(resolutions) || resolutions.length === 0 || !resolutions.every(isPositiveNumber)) {
      errors.push({ severity: 'error', path: `${path}.resolutions`, message: '"resolutions" must be a non-empty array of positive numbers' });
    } else if (resolutions.some((r, i) => i > 0 && r >= resolutions[i - 1])) {
      errors.push({ severity: 'error', path: `${path}.resolutions`, message: '"resolutions" must be sorted from largest to smallest' });
    }
  }

  if (errors.length > errorCount || !isMapType(type) || projection === null || !isExtent(extent)) {
    return null;
  }
  return {
    label,
    type,
    projection,
    extent,
    initialExtent: isExtent(initialExtent) ? initialExtent : undefined,
    resolutions: Array.isArray(resolutions) && resolutions.every(isPositiveNumber) ? resolutions : undefined,
  };
}

function validateServicesSection(
  services: unknown,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): ServicesConfig | null {
  const path = 'services';

  if (services === undefined) {
    errors.push({ severity: 'error', path, message: 'Missing required "services" section' });
    return null;
  }

  if (!isObject(services)) {
    errors.push({ severity: 'error', path, message: '"services" must be an object' });
    return null;
  }

  const errorCount = errors.length;
  checkUnknownKeys(services, KNOWN_KEYS.services, path, warnings);

  const mapServer = requireString(services, 'mapServer', path, errors);
  const featureNS = requireString(services, 'featureNS', path, errors);
  const featurePrefix = requireString(services, 'featurePrefix', path, errors);

  const wfsPath = optionalString(services, 'wfsPath', path, errors);
  const wmsPath = optionalString(services, 'wmsPath', path, errors);
  const srsName = optionalString(services, 'srsName', path, errors);
  const geometryName = optionalString(services, 'geometryName', path, errors);
  const assignBaseUrl = optionalString(services, 'assignBaseUrl', path, errors);
  const csrfToken = optionalString(services, 'csrfToken', path, errors);

  if (errors.length > errorCount || mapServer === null || featureNS === null || featurePrefix === null) {
    return null;
  }
  return { mapServer, wfsPath, wmsPath, featureNS, featurePrefix, srsName, geometryName, assignBaseUrl, csrfToken };
}

function validateLayersSection(
  layers: unknown,
  hasThematic: boolean,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): LayersConfig | null {
  const path = 'layers';

  if (layers === undefined) {
    errors.push({ severity: 'error', path, message: 'Missing required "layers" section' });
    return null;
  }

  if (!isObject(layers)) {
    errors.push({ severity: 'error', path, message: '"layers" must be an object' });
    return null;
  }

  const errorCount = errors.length;
  checkUnknownKeys(layers, KNOWN_KEYS.layers, path, warnings);

  const districtFeatureType = requireString(layers, 'districtFeatureType', path, errors);

  const base: BaseLayerConfig[] = [];
  const baseNames = new Set<string>();
  if (!Array.isArray(layers.base)) {
    errors.push({ severity: 'error', path: `${path}.base`, message: '"base" must be an array' });
  } else {
    if (layers.base.length === 0 && !hasThematic) {
      warnings.push({ severity: 'warning', path: `${path}.base`, message: 'No base layers configured' });
    }
    layers.base.forEach((entry, index) => {
      const entryPath = `${path}.base[${index}]`;
      if (!isObject(entry)) {
        errors.push({ severity: 'error', path: entryPath, message: 'Base layer must be an object' });
        return;
      }
      checkUnknownKeys(entry, KNOWN_KEYS.baseLayer, entryPath, warnings);
      const name = requireString(entry, 'name', entryPath, errors);
      const title = optionalString(entry, 'title', entryPath, errors);
      if (name === null) {
        return;
      }
      if (baseNames.has(name)) {
        errors.push({ severity: 'error', path: `${entryPath}.name`, message: `Duplicate base layer "${name}"` });
      }
      baseNames.add(name);
      base.push({ name, title });
    });
  }

  const snap: SnapLayerConfig[] = [];
  const snapTypes = new Set<string>();
  if (!Array.isArray(layers.snap)) {
    errors.push({ severity: 'error', path: `${path}.snap`, message: '"snap" must be an array' });
  } else {
    if (layers.snap.length === 0) {
      errors.push({ severity: 'error', path: `${path}.snap`, message: 'At least one snap layer is required' });
    }
    layers.snap.forEach((entry, index) => {
      const entryPath = `${path}.snap[${index}]`;
      if (!isObject(entry)) {
        errors.push({ severity: 'error', path: entryPath, message: 'Snap layer must be an object' });
        return;
      }
      checkUnknownKeys(entry, KNOWN_KEYS.snapLayer, entryPath, warnings);
      const label = requireString(entry, 'label', entryPath, errors);
      const featureType = requireString(entry, 'featureType', entryPath, errors);
      if (featureType !== null) {
        snapTypes.add(featureType);
      }
      if (label !== null && featureType !== null) {
        snap.push({ featureType, label });
      }
    });
  }

  const defaultBase = layers.defaultBase;
  if (defaultBase !== undefined && (typeof defaultBase !== 'string' || !baseNames.has(defaultBase))) {
    errors.push({ severity: 'error', path: `${path}.defaultBase`, message: '"defaultBase" must name one of the base layers' });
  }
  const defaultSnap = layers.defaultSnap;
  if (defaultSnap !== undefined && (typeof defaultSnap !== 'string' || !snapTypes.has(defaultSnap))) {
    errors.push({ severity: 'error', path: `${path}.defaultSnap`, message: '"defaultSnap" must name one of the snap layers' });
  }

  if (errors.length > errorCount || districtFeatureType === null) {
    return null;
  }
  return {
    base,
    defaultBase: typeof defaultBase === 'string' ? defaultBase : undefined,
    districtFeatureType,
    snap,
    defaultSnap: typeof defaultSnap === 'string' ? defaultSnap : undefined,
  };
}

function validateThematicSection(
  thematic: unknown,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): ThematicConfig | null {
  const path = 'thematic';

  if (!isObject(thematic)) {
    errors.push({ severity: 'error', path, message: '"thematic" must be an object' });
    return null;
  }

  const errorCount = errors.length;
  checkUnknownKeys(thematic, KNOWN_KEYS.thematic, path, warnings);

  const boundaries = validateChoices(thematic, 'boundaries', path, errors, warnings);
  const showBy = validateChoices(thematic, 'showBy', path, errors, warnings);

  const pattern = optionalString(thematic, 'pattern', path, errors);
  if (pattern !== undefined && (!pattern.includes('{boundary}') || !pattern.includes('{showBy}'))) {
    warnings.push({ severity: 'warning', path: `${path}.pattern`, message: '"pattern" should contain {boundary} and {showBy}' });
  }

  return errors.length > errorCount ? null : { boundaries, showBy, pattern };
}

function validateChoices(
  thematic: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): ChoiceConfig[] {
  const choices = thematic[key];
  if (!Array.isArray(choices) || choices.length === 0) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be a non-empty array` });
    return [];
  }
  const checked: ChoiceConfig[] = [];
  choices.forEach((choice, index) => {
    const choicePath = `${path}.${key}[${index}]`;
    if (!isObject(choice)) {
      errors.push({ severity: 'error', path: choicePath, message: 'Choice must be an object' });
      return;
    }
    checkUnknownKeys(choice, KNOWN_KEYS.choice, choicePath, warnings);
    const value = requireString(choice, 'value', choicePath, errors);
    const label = requireString(choice, 'label', choicePath, errors);
    if (value !== null && label !== null) {
      checked.push({ value, label });
    }
  });
  return checked;
}

/**
 * Tool settings only warn; a tool whose `enabled` is not `false` stays enabled.
 */
function validateToolsSection(
  tools: unknown,
  path: string,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): ToolsConfig | undefined {
  if (!isObject(tools)) {
    warnings.push({ severity: 'warning', path, message: '"tools" should be an object' });
    return undefined;
  }

  const checked: ToolsConfig = {};
  Object.entries(tools).forEach(([toolName, toolConfig]) => {
    const toolPath = `${path}.${toolName}`;
    if (!KNOWN_TOOLS.includes(toolName)) {
      warnings.push({ severity: 'warning', path: toolPath, message: `Unknown tool "${toolName}"` });
      return;
    }
    if (!isObject(toolConfig)) {
      warnings.push({ severity: 'warning', path: toolPath, message: 'Tool config should be an object' });
      return;
    }
    checkUnknownKeys(toolConfig, toolName === 'pointSelect' ? KNOWN_KEYS.pointSelect : KNOWN_KEYS.tool, toolPath, warnings);
    if (toolConfig.enabled === undefined) {
      warnings.push({ severity: 'warning', path: toolPath, message: 'Tool config is missing "enabled" property' });
    } else if (typeof toolConfig.enabled !== 'boolean') {
      warnings.push({ severity: 'warning', path: `${toolPath}.enabled`, message: '"enabled" should be a boolean' });
    }
    const enabled = toolConfig.enabled !== false;

    const clickTolerance = toolConfig.clickTolerance;
    if (clickTolerance !== undefined && (typeof clickTolerance !== 'number' || clickTolerance < 0)) {
      errors.push({ severity: 'error', path: `${toolPath}.clickTolerance`, message: '"clickTolerance" must be a non-negative number' });
    }

    if (toolName === 'pointSelect') {
      checked.pointSelect = { enabled, clickTolerance: typeof clickTolerance === 'number' ? clickTolerance : undefined };
    } else if (toolName === 'boxSelect') {
      checked.boxSelect = { enabled };
    } else {
      checked.polygonSelect = { enabled };
    }
  });
  return checked;
}

function validatePlanSection(
  plan: unknown,
  errors: ValidationMessage[],
  warnings: ValidationMessage[]
): PlanConfig | null {
  const path = 'plan';
  if (!isObject(plan)) {
    errors.push({ severity: 'error', path, message: '"plan" must be an object' });
    return null;
  }
  checkUnknownKeys(plan, KNOWN_KEYS.plan, path, warnings);
  const id = plan.id;
  if (id === undefined) {
    return {};
  }
  if (typeof id !== 'string' && typeof id !== 'number') {
    errors.push({ severity: 'error', path: `${path}.id`, message: '"id" must be a string or a number' });
    return null;
  }
  return { id };
}

// Helper functions

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMapType(value: unknown): value is MapAdapterType {
  return VALID_MAP_TYPES.some(type => type === value);
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && value > 0;
}

/**
 * Records an error unless `obj[key]` is a non-empty string.
 * @returns the string, or null when it is missing or invalid
 */
function requireString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[]
): string | null {
  const value = obj[key];
  if (value === undefined) {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `Missing required "${key}"` });
    return null;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be a non-empty string` });
    return null;
  }
  return value;
}

/** Records an error when `obj[key]` is present but not a string. */
function optionalString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
  errors: ValidationMessage[]
): string | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    errors.push({ severity: 'error', path: `${path}.${key}`, message: `"${key}" must be a string` });
    return undefined;
  }
  return value;
}

function checkUnknownKeys(
  obj: Record<string, unknown>,
  knownKeys: string[],
  path: string,
  warnings: ValidationMessage[]
): void {
  Object.keys(obj).forEach((key) => {
    if (!knownKeys.includes(key)) {
      warnings.push({
        severity: 'warning',
        path: path ? `${path}.${key}` : key,
        message: `Unknown key "${key}"`,
      });
    }
  });
}

/**
 * Formats validation results as a human-readable string.
 */
export function formatValidationResult(result: Pick<ValidationResult, 'valid' | 'errors' | 'warnings'>): string {
  const lines: string[] = [];

  if (result.valid) {
    lines.push('✓ Configuration is valid');
  } else {
    lines.push('✗ Configuration has errors');
  }

  if (result.errors.length > 0) {
    lines.push(`\nErrors (${result.errors.length}):`);
    result.errors.forEach((e) => {
      lines.push(`  [ERROR] ${e.path}: ${e.message}`);
    });
  }

  if (result.warnings.length > 0) {
    lines.push(`\nWarnings (${result.warnings.length}):`);
    result.warnings.forEach((w) => {
      lines.push(`  [WARN]  ${w.path}: ${w.message}`);
    });
  }

  return lines.join('\n');
}
