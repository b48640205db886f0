// src/config/loader.ts
// Configuration loader with priority cascade

import type { AppConfig, ServicesConfig } from './types';
import { validateConfig } from './validator';

const CONFIG_URL_PARAM = 'config';

const DEFAULT_WFS_PATH = '/geoserver/wfs';
const DEFAULT_WMS_PATH = '/geoserver/gwc/service/wms';
const PLAN_EDIT_PATH = /\/plan\/(\d+)\/edit\//;

/** Cache for loaded configs to avoid duplicate fetches */
const configCache = new Map<string, AppConfig>();

/**
 * Gets the config URL from the query string (?config=path/to/config.json)
 */
export function getConfigUrlParam(): string | null {
  const params = new URLSearchParams(window.location.search);
  return params.get(CONFIG_URL_PARAM);
}

/**
 * Fetches and parses a JSON config file.
 * Uses cache to avoid duplicate fetches.
 */
export async function fetchConfig(url: string): Promise<AppConfig> {
  const cached = configCache.get(url);
  if (cached) {
    return cached;
  }

  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`Failed to load config from "${url}": ${response.status} ${response.statusText}`);
  }

  const raw: unknown = await response.json();

  const result = validateConfig(raw);
  if (!result.config) {
    const errorMessages = result.errors.map(e => `  ${e.path}: ${e.message}`).join('\n');
    throw new Error(`Invalid config from "${url}":\n${errorMessages}`);
  }

  if (result.warnings.length > 0) {
    console.warn(`[config] Warnings for "${url}":`);
    result.warnings.forEach(w => console.warn(`  ${w.path}: ${w.message}`));
  }

  configCache.set(url, result.config);
  return result.config;
}

/** Settings a page can put on the map element itself. */
export interface AttributeConfig {
  planId?: string;
  mapServer?: string;
  label?: string;
}

/**
 * Parses per-page overrides from element attributes.
 */
export function parseAttributeConfig(element: HTMLElement): AttributeConfig {
  const config: AttributeConfig = {};

  const planId = element.getAttribute('plan-id');
  if (planId) {
    config.planId = planId;
  }

  const mapServer = element.getAttribute('map-server');
  if (mapServer) {
    config.mapServer = mapServer;
  }

  const label = element.getAttribute('label');
  if (label) {
    config.label = label;
  }

  return config;
}

export interface LoadedAppConfig {
  /** The loaded app configuration */
  config: AppConfig;
  /** Source URL of the config */
  source: string;
}

/**
 * Loads the app configuration from the URL ?config= parameter.
 * Returns null if no config param is present.
 */
export async function loadAppConfig(): Promise<LoadedAppConfig | null> {
  const configPath = getConfigUrlParam();
  if (!configPath) {
    return null;
  }

  const config = await fetchConfig(configPath);
  return {
    config,
    source: configPath,
  };
}

/**
 * Resolves the editor configuration for a map element with priority cascade:
 * 1. Provided appConfig (from ?config=, highest)
 * 2. src attribute on element
 *
 * Attribute overrides (map-server, label) are applied on top of either.
 * Returns null when neither source yields a configuration.
 */
export async function resolveAppConfig(
  element: HTMLElement,
  appConfig?: AppConfig | null
): Promise<AppConfig | null> {
  let config: AppConfig | null = null;

  if (appConfig) {
    console.log('[config] Using app-level config');
    config = appConfig;
  } else {
    const srcPath = element.getAttribute('src');
    if (srcPath) {
      try {
        config = await fetchConfig(srcPath);
        console.log(`[config] Loaded config from src="${srcPath}"`);
      } catch (error) {
        console.error('[config] Failed to load config from src:', error);
      }
    }
  }

  if (!config) {
    console.warn('[config] No editor configuration available');
    return null;
  }

  const attrs = parseAttributeConfig(element);
  return {
    ...config,
    map: attrs.label !== undefined ? { ...config.map, label: attrs.label } : config.map,
    services: attrs.mapServer ? { ...config.services, mapServer: attrs.mapServer } : config.services,
  };
}

/**
 * Plan id from an editor page path such as `/districtmapping/plan/12/edit/`.
 */
export function parsePlanIdFromPath(pathname: string): string | null {
  const match = PLAN_EDIT_PATH.exec(pathname);
  return match ? match[1] : null;
}

/**
 * Resolves the plan being edited: config `plan.id`, then the `plan-id`
 * attribute, then the page path.
 */
export function resolvePlanId(
  config: AppConfig,
  element: HTMLElement | null,
  pathname: string = window.location.pathname
): string | null {
  if (config.plan?.id !== undefined && String(config.plan.id) !== '') {
    return String(config.plan.id);
  }
  const attr = element?.getAttribute('plan-id');
  if (attr) {
    return attr;
  }
  return parsePlanIdFromPath(pathname);
}

export interface ServiceUrls {
  wfs: string;
  wms: string;
}

/**
 * Absolute WFS and WMS endpoints on the configured map server.
 * A bare host gets an `http://` prefix.
 */
export function resolveServiceUrls(services: ServicesConfig): ServiceUrls {
  const origin = (services.mapServer.includes('://') ? services.mapServer : `http://${services.mapServer}`)
    .replace(/\/+$/, '');
  return {
    wfs: origin + withLeadingSlash(services.wfsPath ?? DEFAULT_WFS_PATH),
    wms: origin + withLeadingSlash(services.wmsPath ?? DEFAULT_WMS_PATH),
  };
}

function withLeadingSlash(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

/**
 * Clears the config cache (useful for testing or hot reload).
 */
export function clearConfigCache(): void {
  configCache.clear();
}
