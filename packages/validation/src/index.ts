/**
 * @drive-verify/validation
 *
 * Drive verification layer.
 *
 * Responsibilities:
 * - Walk the drive and check its structure
 * - Turn probe results and the volume profile into issue records
 * - Collect records from concurrent workers
 * - Run the scan and build the report
 * - Write and read the CSV report
 *
 * Only an unreadable scan root fails a scan.
 */

// Scan
export {
  ScanCoordinator,
  defaultWorkerCount,
  hasErrors,
  type ScanCoordinatorOptions,
  type ScanOptions,
  type ScanPhase,
  type ScanProgress,
  type ScanReport,
  type ScanSummary,
} from './scanCoordinator.js';

// Tree walk
export {
  TreeWalker,
  findInvalidCharacters,
  type TreeStats,
  type TreeWalkResult,
  type TreeWalkerOptions,
} from './treeWalker.js';

// Issue collection
export {
  IssueCollector,
  IssueBuffer,
  type CategoryCounts,
  type SeverityCounts,
} from './issueCollector.js';

// Worker pool
export { runPool, type PoolOptions, type PoolOutcome, type PoolTask } from './workerPool.js';

// Rules
export { AUDIO_RULES, evaluateAudio, type AudioRule, type RuleFinding } from './rules/audioRules.js';
export { evaluateVolume } from './rules/volumeRules.js';

// CSV report
export {
  CSV_COLUMNS,
  formatCsvReport,
  parseCsvReport,
  readCsvReport,
  reportFileName,
  writeCsvReport,
  type CsvReport,
  type CsvReportRow,
  type CsvSeverity,
} from './report/csv.js';
