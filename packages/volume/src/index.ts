/**
 * @drive-verify/volume
 * 
 * Filesystem, partition scheme and cluster size of the mount point.
 * Subprocess backends per platform with a native statfs fallback.
 */

export {
  VolumeInspector,
  defaultBackends,
  type VolumeInspection,
  type VolumeInspectorOptions,
} from './inspector.js';

export { LinuxBackend, parseLsblkPairs } from './backends/linux.js';
export { DarwinBackend } from './backends/darwin.js';
export { WindowsBackend, driveLetterOf, buildVolumeScript } from './backends/windows.js';
export { NativeBackend, filesystemFromMagic, type StatFsFunction } from './backends/native.js';

export { normalizeFilesystem, normalizePartitionScheme, parseByteCount } from './normalize.js';

export type { VolumeBackend, VolumeFacts } from './types.js';
