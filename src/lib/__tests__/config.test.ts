import { describe, expect, test } from 'vitest';
import { ConfigError, loadConfig } from '../config';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      options: {
        ucsClass: 'R4',
        orientationAdjustment: -5,
        toleranceDeg: 15,
        minFamilySize: 3,
        metric: 'independent',
        scope: 'project'
      },
      dictionaryPath: null,
      stationsPath: null,
      exportDir: 'rmr14-exports'
    });
  });

  test('reads and coerces RMR_* variables', () => {
    const config = loadConfig({
      RMR_UCS_CLASS: ' r5 ',
      RMR_ORIENTATION_ADJUSTMENT: '-12',
      RMR_CLUSTER_TOLERANCE_DEG: '20',
      RMR_MIN_FAMILY_SIZE: '4',
      RMR_CLUSTER_METRIC: 'angular',
      RMR_CLUSTER_SCOPE: 'station',
      RMR_DICTIONARY_PATH: 'tables/codes.csv',
      RMR_STATIONS_PATH: '',
      RMR_EXPORT_DIR: 'out'
    });

    expect(config.options).toEqual({
      ucsClass: 'R5',
      orientationAdjustment: -12,
      toleranceDeg: 20,
      minFamilySize: 4,
      metric: 'angular',
      scope: 'station'
    });
    expect(config.dictionaryPath).toBe('tables/codes.csv');
    expect(config.stationsPath).toBeNull();
    expect(config.exportDir).toBe('out');
  });

  test.each([
    ['RMR_CLUSTER_TOLERANCE_DEG', '0'],
    ['RMR_CLUSTER_TOLERANCE_DEG', '91'],
    ['RMR_ORIENTATION_ADJUSTMENT', '5'],
    ['RMR_MIN_FAMILY_SIZE', '2.5'],
    ['RMR_CLUSTER_METRIC', 'euclidean'],
    ['RMR_CLUSTER_SCOPE', 'global']
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigError);
  });

  test('names the offending variable', () => {
    expect(() => loadConfig({ RMR_MIN_FAMILY_SIZE: 'three' })).toThrow(/^Invalid configuration: RMR_MIN_FAMILY_SIZE: /);
  });
});
