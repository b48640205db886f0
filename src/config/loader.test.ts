import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  clearConfigCache,
  fetchConfig,
  loadAppConfig,
  parsePlanIdFromPath,
  resolveAppConfig,
  resolvePlanId,
  resolveServiceUrls,
} from './loader';
import { jsonResponse, testConfig } from '../test-utils/fixtures';

function stubConfigFetch(body: unknown) {
  const fetchMock = vi.fn(() => Promise.resolve(jsonResponse(body)));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('config loader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    clearConfigCache();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('fetchConfig', () => {
    it('fetches each URL once', async () => {
      const fetchMock = stubConfigFetch(testConfig());

      const first = await fetchConfig('/config/editor.json');
      const second = await fetchConfig('/config/editor.json');

      expect(second).toBe(first);
      expect(first.layers.districtFeatureType).toBe('simple_district');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('fails on HTTP errors', async () => {
      vi.stubGlobal('fetch', vi.fn(() => Promise.resolve(new Response('', { status: 404, statusText: 'Not Found' }))));

      await expect(fetchConfig('/missing.json'))
        .rejects.toThrow('Failed to load config from "/missing.json": 404 Not Found');
    });

    it('lists the validation errors of an invalid config', async () => {
      stubConfigFetch({ map: testConfig().map });

      await expect(fetchConfig('/bad.json')).rejects.toThrow(
        'Invalid config from "/bad.json":\n' +
        '  services: Missing required "services" section\n' +
        '  layers: Missing required "layers" section'
      );
    });

    it('returns the checked config without unknown keys', async () => {
      stubConfigFetch({ ...testConfig(), theme: 'dark' });
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      const config = await fetchConfig('/extra.json');

      expect('theme' in config).toBe(false);
      expect(config).toEqual(testConfig());
    });

    it('logs validation warnings', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      stubConfigFetch({ ...testConfig(), theme: 'dark' });

      await fetchConfig('/warn.json');

      expect(warn.mock.calls).toEqual([
        ['[config] Warnings for "/warn.json":'],
        ['  theme: Unknown key "theme"'],
      ]);
    });
  });

  describe('loadAppConfig', () => {
    afterEach(() => {
      window.history.replaceState(null, '', '/');
    });

    it('loads the config named in the query string', async () => {
      stubConfigFetch(testConfig());
      window.history.replaceState(null, '', '/?config=/config/other.json');

      const loaded = await loadAppConfig();

      expect(loaded?.source).toBe('/config/other.json');
      expect(loaded?.config.services.mapServer).toBe('maps.test');
    });

    it('returns null without a config parameter', async () => {
      expect(await loadAppConfig()).toBeNull();
    });
  });

  describe('resolveAppConfig', () => {
    it('loads the src attribute and applies the attribute overrides', async () => {
      stubConfigFetch(testConfig());
      const element = document.createElement('redist-map');
      element.setAttribute('src', '/config/editor.json');
      element.setAttribute('map-server', 'https://gis.test/');
      element.setAttribute('label', 'North County');

      const config = await resolveAppConfig(element);

      expect(config?.services.mapServer).toBe('https://gis.test/');
      expect(config?.map).toEqual({ ...testConfig().map, label: 'North County' });
    });

    it('adds nothing to the map section it loads', async () => {
      stubConfigFetch(testConfig());
      const element = document.createElement('redist-map');
      element.setAttribute('src', '/config/editor.json');

      const config = await resolveAppConfig(element);

      expect(config?.map.initialExtent).toBeUndefined();
      expect(config?.map.resolutions).toBeUndefined();
      expect(config?.map.extent).toEqual([0, 0, 1000, 1000]);
    });

    it('prefers the app-level config over src', async () => {
      const fetchMock = stubConfigFetch(testConfig());
      const element = document.createElement('redist-map');
      element.setAttribute('src', '/config/editor.json');
      const appConfig = testConfig({ plan: { id: 3 } });

      const config = await resolveAppConfig(element, appConfig);

      expect(config?.plan).toEqual({ id: 3 });
      expect(config?.map).toBe(appConfig.map);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('returns null when nothing can be loaded', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.stubGlobal('fetch', vi.fn(() => Promise.reject(new TypeError('Failed to fetch'))));
      const element = document.createElement('redist-map');
      element.setAttribute('src', '/config/editor.json');

      expect(await resolveAppConfig(element)).toBeNull();
      expect(error).toHaveBeenCalledTimes(1);
      expect(await resolveAppConfig(document.createElement('redist-map'))).toBeNull();
    });
  });

  describe('plan id', () => {
    it('reads the plan id from an editor path', () => {
      expect(parsePlanIdFromPath('/districtmapping/plan/12/edit/')).toBe('12');
      expect(parsePlanIdFromPath('/districtmapping/plan/12/view/')).toBeNull();
    });

    it('prefers the config, then the attribute, then the path', () => {
      const element = document.createElement('redist-map');
      element.setAttribute('plan-id', '5');
      const path = '/districtmapping/plan/9/edit/';

      expect(resolvePlanId(testConfig({ plan: { id: 3 } }), element, path)).toBe('3');
      expect(resolvePlanId(testConfig(), element, path)).toBe('5');
      expect(resolvePlanId(testConfig(), null, path)).toBe('9');
      expect(resolvePlanId(testConfig(), null, '/')).toBeNull();
    });
  });

  describe('resolveServiceUrls', () => {
    it('adds a scheme to a bare host', () => {
      expect(resolveServiceUrls(testConfig().services)).toEqual({
        wfs: 'http://maps.test/geoserver/wfs',
        wms: 'http://maps.test/geoserver/gwc/service/wms',
      });
    });

    it('joins custom paths onto a full URL', () => {
      const services = {
        ...testConfig().services,
        mapServer: 'https://gis.test/',
        wfsPath: 'ows',
        wmsPath: '/wms',
      };

      expect(resolveServiceUrls(services)).toEqual({
        wfs: 'https://gis.test/ows',
        wms: 'https://gis.test/wms',
      });
    });
  });
});
