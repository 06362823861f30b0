import type { ClusterMetric } from './utils/clustering';
import type { Classification } from './utils/classification';
import type { RecordIssue } from './utils/errors';
import type { RqdEstimate } from './utils/rqd';

export type StageName =
  | 'ingest'
  | 'normalize'
  | 'station-score'
  | 'cluster'
  | 'family-score'
  | 'export';

export type ParsedSheet = {
  label: string;
  headers: string[];
  rows: Record<string, unknown>[];
};

export type Discontinuity = {
  readonly id: string;
  readonly stationId: string;
  readonly sheet: string;
  /** 1-based data row within its sheet */
  readonly rowIndex: number;
  readonly distanceM: number;
  readonly structureType: string;
  readonly dipDirection: number;
  readonly dip: number;
  readonly spacing: string;
  readonly persistence: string;
  readonly aperture: string;
  readonly roughness: string;
  readonly infill: string;
  readonly weathering: string;
  readonly groundwater: string;
};

export type StationOverride = {
  ucsClass?: string;
  rqd?: number;
  traverseLengthM?: number;
};

export type Station = {
  readonly id: string;
  readonly discontinuities: readonly Discontinuity[];
  readonly ucsClass: string;
  readonly rqd: number | null;
  /** Supplied length, else the furthest recorded distance */
  readonly traverseLengthM: number | null;
};

export type ConditionRatings = {
  persistence: number;
  aperture: number;
  roughness: number;
  infill: number;
  weathering: number;
};

export type PartialRatings = {
  strength: number;
  rqd: number;
  spacing: number;
  condition: number;
  groundwater: number;
  orientation: number;
};

export type ScoredUnit = { kind: 'station' | 'family'; id: string };

export type RmrScore = {
  readonly unit: ScoredUnit;
  readonly memberCount: number;
  readonly ucsClass: string;
  readonly ratings: Readonly<PartialRatings>;
  readonly condition: Readonly<ConditionRatings>;
  readonly rqd: Readonly<RqdEstimate>;
  readonly spacingMm: number;
  readonly dominantGroundwater: string;
  readonly total: number;
  readonly classification: Readonly<Classification>;
};

export type Family = {
  readonly id: string;
  readonly members: readonly Discontinuity[];
  readonly meanDipDirection: number;
  readonly meanDip: number;
  /** Mean resultant length of member dip directions */
  readonly resultantLength: number;
  readonly toleranceDeg: number;
  readonly metric: ClusterMetric;
};

export type FamilySummary = {
  readonly family: Family;
  readonly memberCount: number;
  readonly dominantStructureType: string;
  readonly stationIds: readonly string[];
  /** Largest member deviation from the family mean under the family's metric */
  readonly maxDeviationDeg: number;
  readonly score: RmrScore | null;
};

export type UnitFailure = {
  unit: ScoredUnit;
  issue: RecordIssue;
};

export type AnalysisOptions = {
  ucsClass: string;
  orientationAdjustment: number;
  toleranceDeg: number;
  minFamilySize: number;
  metric: ClusterMetric;
  scope: 'project' | 'station';
  stations?: Record<string, StationOverride>;
};

/** count/mean/min/max of one numeric field over the valid records; dip direction uses the circular mean */
export type FieldStatistics = {
  field: 'distance_m' | 'dip_direction' | 'dip';
  count: number;
  mean: number | null;
  min: number | null;
  max: number | null;
};

export type DatasetOverview = {
  stationCount: number;
  totalRecords: number;
  validRecords: number;
  rejectedRecords: number;
  meanRmr: number | null;
  dominantClassification: string | null;
  familyCount: number;
  unclusteredCount: number;
  statistics: FieldStatistics[];
};

export type AnalysisResult = {
  stations: Station[];
  stationScores: RmrScore[];
  families: FamilySummary[];
  unclustered: Discontinuity[];
  issues: RecordIssue[];
  failures: UnitFailure[];
  overview: DatasetOverview;
};
