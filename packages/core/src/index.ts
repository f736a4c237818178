/**
 * @drive-verify/core
 * 
 * Shared domain package containing:
 * - Issue records and report ordering
 * - Volume and scan types
 * - Configurable limits
 * - Error handling
 */

// Issues
export {
  ISSUE_CATEGORIES,
  ISSUE_TYPE_LABELS,
  ROOT_PATH,
  categoryFromLabel,
  createIssue,
  compareIssues,
  emptyCategoryCounts,
} from './types/issue.js';

export type {
  IssueCategory,
  IssueSeverity,
  IssueRecord,
} from './types/issue.js';

// Volume and scan types
export type {
  FilesystemKind,
  PartitionScheme,
  VolumeProfile,
} from './types/volume.js';

export type { FileNode } from './types/scan.js';

// Limits
export {
  limitsSchema,
  DEFAULT_LIMITS,
  resolveLimits,
  type VerifierLimits,
  type VerifierLimitsInput,
} from './config/limits.js';

// Errors
export {
  DriveVerifyError,
  RootUnreadableError,
  VolumeIntrospectionError,
  CommandExecutionError,
  MalformedHeaderError,
  CollectorStateError,
  ConfigurationError,
} from './errors/index.js';
