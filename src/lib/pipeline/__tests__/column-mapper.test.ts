import { describe, expect, test } from 'vitest';
import { buildColumnMap, missingFields } from '../utils/column-mapper';
import { TRAVERSE_HEADERS } from './fixtures/records';

describe('buildColumnMap', () => {
  test('maps the standard traverse headers', () => {
    expect(buildColumnMap(TRAVERSE_HEADERS)).toEqual({
      station: 'Station',
      distance_m: 'Distance_m',
      structure_type: 'Type',
      dip_direction: 'Dip_Direction_degrees',
      dip: 'Dip_degrees',
      spacing: 'Spacing_mm',
      persistence: 'Persistence',
      aperture: 'Aperture_mm',
      roughness: 'Roughness',
      infill: 'Infilling_Type',
      weathering: 'Weathering',
      groundwater: 'Groundwater'
    });
  });

  test('accepts Spanish headers with accents', () => {
    const map = buildColumnMap([
      'Estación',
      'Distancia_m',
      'Tipo',
      'Dip Direction',
      'Buzamiento',
      'Espaciado',
      'Persistencia',
      'Apertura',
      'Rugosidad',
      'Relleno',
      'Meteorización',
      'Agua'
    ]);

    expect(map.station).toBe('Estación');
    expect(map.dip).toBe('Buzamiento');
    expect(map.weathering).toBe('Meteorización');
    expect(missingFields(map, ['station', 'dip', 'dip_direction', 'groundwater'])).toEqual([]);
  });

  test('does not let dip steal the dip-direction column', () => {
    const map = buildColumnMap(['Dip_degrees', 'Dip_Direction_degrees']);
    expect(map.dip).toBe('Dip_degrees');
    expect(map.dip_direction).toBe('Dip_Direction_degrees');
  });

  test('tolerates small typos', () => {
    const map = buildColumnMap(['Station', 'Roughnes']);
    expect(map.roughness).toBe('Roughnes');
    expect(map.aperture).toBeNull();
  });
});

test('missingFields lists unmapped required fields in order', () => {
  const map = buildColumnMap(['Station', 'Dip']);
  expect(missingFields(map, ['dip', 'spacing', 'groundwater'])).toEqual(['spacing', 'groundwater']);
});
