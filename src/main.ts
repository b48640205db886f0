// src/main.ts
// Page entry: defines the editor elements and applies ?config= to every map.

import './components/modules/redist-map';
import './components/modules/redist-toolbar';
import './components/modules/redist-district-picker';
import './components/modules/redist-layer-controls';
import './components/modules/redist-spinner';
import './components/modules/redist-status';
import { loadAppConfig } from './config/loader';

async function boot(): Promise<void> {
  const loaded = await loadAppConfig();
  if (!loaded) {
    // Maps fall back to their own src attribute
    return;
  }
  console.log(`[main] Loaded config from "${loaded.source}"`);
  document.querySelectorAll('redist-map').forEach(map => map.setConfig(loaded.config));
}

boot().catch(error => {
  console.error('[main] Failed to load configuration:', error);
});
