import { RedistMapElement } from './redist-map';

function queryWithSelector(selector: string): RedistMapElement | null {
  try {
    const candidate = document.querySelector(selector);
    if (candidate instanceof RedistMapElement) {
      return candidate;
    }
    return null;
  } catch (error) {
    console.error(`[redist] Invalid selector "${selector}" provided via map attribute.`, error);
    return null;
  }
}

/**
 * Finds the map a control belongs to: the `map` attribute selector, then the
 * enclosing <redist-map>, then the first one in the document.
 */
export function resolveMapElement(host: HTMLElement): RedistMapElement | null {
  const explicitSelector = host.getAttribute('map');
  if (explicitSelector) {
    const explicitMatch = queryWithSelector(explicitSelector);
    if (!explicitMatch) {
      console.error(`[redist] No <redist-map> found for selector "${explicitSelector}" on ${host.tagName.toLowerCase()}.`);
    }
    return explicitMatch;
  }

  const ancestor = host.closest('redist-map');
  if (ancestor) {
    return ancestor;
  }

  const fallback = document.querySelector('redist-map');
  if (fallback) {
    return fallback;
  }

  console.error(`[redist] Unable to locate a <redist-map> for ${host.tagName.toLowerCase()}.`);
  return null;
}
