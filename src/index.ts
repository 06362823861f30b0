export { loadConfig, ConfigError, type RmrConfig } from './lib/config';
export {
  analyzeDataset,
  buildOverview,
  describeDiscontinuities,
  runRmrPipeline,
  type PipelineInput,
  type PipelineRun,
  type StageListener
} from './lib/pipeline';
export {
  parseDatasetFile,
  readTableFile,
  loadCodeDictionary,
  loadStationTable,
  parseStationTable,
  locateDataFile
} from './lib/pipeline/01-ingest';
export { normalizeSheets, buildStations } from './lib/pipeline/02-normalize';
export { scoreStation, scoreStations } from './lib/pipeline/03-station-score';
export { formFamilies } from './lib/pipeline/04-cluster';
export { familyStatistics, scoreFamily, summarizeFamilies } from './lib/pipeline/05-family-score';
export { buildExportTables, toCsvString, writeExports, type ExportRow, type ExportTables } from './lib/pipeline/06-export';
export * from './lib/pipeline/types';
export { classify, formatClassification, type Classification, type RockClass, type QualityDescriptor } from './lib/pipeline/utils/classification';
export { clusterOrientations, isJoinable, orientationDeviation, type ClusterMetric, type ClusterOptions } from './lib/pipeline/utils/clustering';
export {
  createCodeDictionary,
  normalizeCode,
  CODED_PARAMETERS,
  RATED_PARAMETERS,
  type CodeDictionary,
  type CodeEntry,
  type CodedParameter,
  type RatedParameter
} from './lib/pipeline/utils/code-dictionary';
export * from './lib/pipeline/utils/errors';
export { angleBetweenPlanes, circularDistance, circularMean, meanOrientation, normalizeAzimuth, type Orientation } from './lib/pipeline/utils/orientation';
export { calculateRmr, rqdRating, spacingRating, worstRating } from './lib/pipeline/utils/ratings';
export { estimateRqd, rqdFromFrequency, type RqdEstimate, type RqdInput } from './lib/pipeline/utils/rqd';
