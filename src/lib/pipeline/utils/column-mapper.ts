export type CanonicalField =
  | 'station'
  | 'distance_m'
  | 'structure_type'
  | 'dip_direction'
  | 'dip'
  | 'spacing'
  | 'persistence'
  | 'aperture'
  | 'roughness'
  | 'infill'
  | 'weathering'
  | 'groundwater';

export type ColumnMap = Record<CanonicalField, string | null>;

// Header spellings seen on field sheets and in the consolidated station exports.
const KNOWN_HEADERS: Record<CanonicalField, string[]> = {
  station: ['Station', 'Estacion', 'Station ID'],
  distance_m: ['Distance_m', 'Distance [m]', 'Distancia_m', 'Distance'],
  structure_type: ['Type', 'Structure_Type', 'Tipo', 'Structure'],
  dip_direction: ['Dip_Direction_degrees', 'Dip Direction', 'DipDir', 'Dip_Direction'],
  dip: ['Dip_degrees', 'Dip', 'Buzamiento'],
  spacing: ['Spacing_mm', 'Spacing', 'Espaciado'],
  persistence: ['Persistence', 'Persistence_m', 'Persistencia'],
  aperture: ['Aperture_mm', 'Aperture', 'Apertura'],
  roughness: ['Roughness', 'Rugosidad'],
  infill: ['Infilling_Type', 'Infill', 'Infilling', 'Relleno'],
  weathering: ['Weathering', 'Meteorizacion', 'Alteracion'],
  groundwater: ['Groundwater', 'Water', 'Agua']
};

export const CANONICAL_FIELDS = Object.keys(KNOWN_HEADERS) as CanonicalField[];

function normalizeHeader(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[_\s]+/g, ' ')
    .replace(/[^a-z0-9%./\[\]]+/g, ' ')
    .trim();
}

function levenshtein(a: string, b: string): number {
  const dp: number[][] = Array.from({ length: a.length + 1 }, () => Array<number>(b.length + 1).fill(0));

  for (let i = 0; i <= a.length; i += 1) dp[i][0] = i;
  for (let j = 0; j <= b.length; j += 1) dp[0][j] = j;

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(dp[i - 1][j] + 1, dp[i][j - 1] + 1, dp[i - 1][j - 1] + cost);
    }
  }

  return dp[a.length][b.length];
}

/**
 * Resolves every canonical field to one of `headers`: exact alias first,
 * then alias after header normalisation, then the closest header by edit
 * distance (at most 3 edits). A header is never claimed by two fields.
 */
export function buildColumnMap(headers: string[]): ColumnMap {
  const result: ColumnMap = {
    station: null,
    distance_m: null,
    structure_type: null,
    dip_direction: null,
    dip: null,
    spacing: null,
    persistence: null,
    aperture: null,
    roughness: null,
    infill: null,
    weathering: null,
    groundwater: null
  };

  const claimed = new Set<string>();
  const rawToActual = new Map(headers.map((h) => [normalizeHeader(h), h]));

  // Exact and normalised matches first, so fuzzy matching cannot steal a header
  // another field names outright (e.g. "Dip" vs "Dip_Direction_degrees").
  for (const field of CANONICAL_FIELDS) {
    for (const alias of KNOWN_HEADERS[field]) {
      const actual = headers.includes(alias) ? alias : rawToActual.get(normalizeHeader(alias));
      if (actual && !claimed.has(actual)) {
        result[field] = actual;
        claimed.add(actual);
        break;
      }
    }
  }

  for (const field of CANONICAL_FIELDS) {
    if (result[field]) continue;

    const candidates = headers
      .filter((header) => !claimed.has(header))
      .map((header) => ({
        header,
        distance: Math.min(
          ...KNOWN_HEADERS[field].map((alias) => levenshtein(normalizeHeader(header), normalizeHeader(alias)))
        )
      }))
      .sort((a, b) => a.distance - b.distance);

    if (candidates.length > 0 && candidates[0].distance <= 3) {
      result[field] = candidates[0].header;
      claimed.add(candidates[0].header);
    }
  }

  return result;
}

export function missingFields(map: ColumnMap, required: readonly CanonicalField[]): CanonicalField[] {
  return required.filter((field) => map[field] == null);
}
