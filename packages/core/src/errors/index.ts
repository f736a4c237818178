/**
 * Custom Error Classes
 */

/**
 * Base error class for all drive-verify errors
 */
export class DriveVerifyError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DriveVerifyError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The scan root is missing, not a directory, or cannot be listed.
 * This is the only condition that aborts a scan.
 */
export class RootUnreadableError extends DriveVerifyError {
  constructor(rootPath: string, reason: string) {
    super(
      `Cannot read scan root ${rootPath}: ${reason}`,
      'ROOT_UNREADABLE',
      { rootPath, reason }
    );
    this.name = 'RootUnreadableError';
  }
}

/**
 * The platform could not tell us about the volume
 */
export class VolumeIntrospectionError extends DriveVerifyError {
  constructor(mountPath: string, reason: string) {
    super(
      `Volume introspection unavailable for ${mountPath}: ${reason}`,
      'VOLUME_INTROSPECTION_UNAVAILABLE',
      { mountPath, reason }
    );
    this.name = 'VolumeIntrospectionError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends DriveVerifyError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${command} failed with exit code ${exitCode}${stderr ? `: ${stderr.trim().substring(0, 200)}` : ''}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * An audio header could not be parsed
 */
export class MalformedHeaderError extends DriveVerifyError {
  public readonly reason: string;

  constructor(filePath: string, reason: string) {
    super(
      `Malformed audio header in ${filePath}: ${reason}`,
      'MALFORMED_AUDIO_HEADER',
      { filePath, reason }
    );
    this.name = 'MalformedHeaderError';
    this.reason = reason;
  }
}

/**
 * IssueCollector used out of order
 */
export class CollectorStateError extends DriveVerifyError {
  constructor(message: string) {
    super(message, 'COLLECTOR_STATE');
    this.name = 'CollectorStateError';
  }
}

/**
 * Validation error for configuration values
 */
export class ConfigurationError extends DriveVerifyError {
  constructor(field: string, message: string) {
    super(
      `Invalid configuration for ${field}: ${message}`,
      'CONFIGURATION_ERROR',
      { field, message }
    );
    this.name = 'ConfigurationError';
  }
}
