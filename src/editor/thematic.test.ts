import { describe, it, expect } from 'vitest';
import { collectBaseLayers, thematicLayerName } from './thematic';
import { testConfig } from '../test-utils/fixtures';

describe('thematic layers', () => {
    it('names a thematic layer from the default pattern', () => {
        expect(thematicLayerName('redist', 'county', 'population')).toBe('redist:demo_county_population');
    });

    it('keeps a prefix written into the pattern', () => {
        expect(thematicLayerName('redist', 'tract', 'minority', 'shades:{showBy}_by_{boundary}'))
            .toBe('shades:minority_by_tract');
    });

    it('returns the base layers alone without a thematic section', () => {
        expect(collectBaseLayers(testConfig())).toEqual([{ name: 'redist:roads' }]);
    });

    it('appends every boundary and show-by combination once', () => {
        const config = testConfig({
            thematic: {
                boundaries: [{ value: 'county', label: 'County' }, { value: 'tract', label: 'Tract' }],
                showBy: [{ value: 'population', label: 'Population' }]
            }
        });
        config.layers.base.push({ name: 'redist:demo_county_population', title: 'Counties' });

        expect(collectBaseLayers(config)).toEqual([
            { name: 'redist:roads' },
            { name: 'redist:demo_county_population', title: 'Counties' },
            { name: 'redist:demo_tract_population', title: 'Tract by Population' }
        ]);
    });
});
