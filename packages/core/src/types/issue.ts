/**
 * Issue Types
 * 
 * One IssueRecord per detected incompatibility. Records are created once by
 * the stage that detects the condition and are never mutated afterwards.
 */

/**
 * Issue categories in report order.
 * finalize() sorts by path, then by the position of the category in this list.
 */
export const ISSUE_CATEGORIES = [
  'FilesystemType',
  'PartitionScheme',
  'ClusterSize',
  'TotalFileCount',
  'RootFolderCount',
  'FilesPerFolder',
  'NestingDepth',
  'PathLength',
  'FilenameLength',
  'InvalidCharacters',
  'UnsupportedFormat',
  'EncodingMode',
  'Bitrate',
  'SampleRate',
  'TagVersion',
  'AlbumArtSize',
  'ReadError',
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export type IssueSeverity = 'error' | 'warning' | 'info';

export interface IssueRecord {
  readonly path: string;
  readonly category: IssueCategory;
  readonly severity: IssueSeverity;
  readonly description: string;
}

/**
 * Path used for records about the volume or the tree as a whole
 */
export const ROOT_PATH = '.';

/**
 * `issue_type` column values of the CSV report.
 * Remediation tools match on these strings; do not rename them.
 */
export const ISSUE_TYPE_LABELS: Record<IssueCategory, string> = {
  FilesystemType: 'Filesystem',
  PartitionScheme: 'Partition Scheme',
  ClusterSize: 'Cluster Size',
  TotalFileCount: 'Total Files',
  RootFolderCount: 'Root Folders',
  FilesPerFolder: 'Files Per Folder',
  NestingDepth: 'Nesting Depth',
  PathLength: 'Path Length',
  FilenameLength: 'Filename Length',
  InvalidCharacters: 'Invalid Characters',
  UnsupportedFormat: 'Unsupported Formats',
  EncodingMode: 'Encoding',
  Bitrate: 'Bitrate',
  SampleRate: 'Sample Rate',
  TagVersion: 'ID3 Tags',
  AlbumArtSize: 'Album Art',
  ReadError: 'Read Error',
};

const CATEGORY_ORDER = new Map<IssueCategory, number>(
  ISSUE_CATEGORIES.map((category, index) => [category, index])
);

export function categoryFromLabel(label: string): IssueCategory | undefined {
  return ISSUE_CATEGORIES.find((category) => ISSUE_TYPE_LABELS[category] === label);
}

/**
 * Create an immutable issue record
 */
export function createIssue(
  path: string,
  category: IssueCategory,
  severity: IssueSeverity,
  description: string
): IssueRecord {
  return Object.freeze({ path, category, severity, description });
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Report order: path, then category, then severity name, then description.
 * Plain code-unit comparison keeps the order independent of the host locale.
 */
export function compareIssues(a: IssueRecord, b: IssueRecord): number {
  return (
    compareStrings(a.path, b.path) ||
    (CATEGORY_ORDER.get(a.category) ?? 0) - (CATEGORY_ORDER.get(b.category) ?? 0) ||
    compareStrings(a.severity, b.severity) ||
    compareStrings(a.description, b.description)
  );
}

export function emptyCategoryCounts(): Record<IssueCategory, number> {
  return {
    FilesystemType: 0,
    PartitionScheme: 0,
    ClusterSize: 0,
    TotalFileCount: 0,
    RootFolderCount: 0,
    FilesPerFolder: 0,
    NestingDepth: 0,
    PathLength: 0,
    FilenameLength: 0,
    InvalidCharacters: 0,
    UnsupportedFormat: 0,
    EncodingMode: 0,
    Bitrate: 0,
    SampleRate: 0,
    TagVersion: 0,
    AlbumArtSize: 0,
    ReadError: 0,
  };
}
