/**
 * Error taxonomy for provisioning runs
 *
 * Inconclusive probe results are not errors and never appear here;
 * they are modelled as a ProbeOutcome.
 */

export class ProvisionError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ProvisionError';
  }
}

/**
 * A probe failed unexpectedly (malformed output, spawn failure).
 * Logged and treated as inconclusive by the resolver.
 */
export class ProbeError extends ProvisionError {
  constructor(public readonly probe: string, message: string) {
    super(`${probe} probe failed: ${message}`, 'PROBE_FAILED');
    this.name = 'ProbeError';
  }
}

/**
 * Install returned non-success for every candidate, or the
 * post-install confirmation still reports the tool as missing.
 */
export class InstallError extends ProvisionError {
  constructor(public readonly toolName: string, message: string) {
    super(`Failed to install ${toolName}: ${message}`, 'INSTALL_FAILED');
    this.name = 'InstallError';
  }
}

/**
 * The package manager or module gallery itself is missing or unusable.
 * Fatal for the whole run.
 */
export class EnvironmentError extends ProvisionError {
  constructor(message: string, public readonly hint?: string) {
    super(message, 'ENVIRONMENT_FAILURE');
    this.name = 'EnvironmentError';
  }
}

export class ConfigurationError extends ProvisionError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class ProcessTimeoutError extends ProvisionError {
  constructor(public readonly command: string, public readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`, 'PROCESS_TIMEOUT');
    this.name = 'ProcessTimeoutError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * True for the error Node raises when a binary cannot be found
 */
export function isCommandNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
