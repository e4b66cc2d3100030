/**
 * Raised when a {@link DrawerConfig} is built from options that break one of
 * its rules. Construction is all-or-nothing: fix the options and build again.
 */
export class InvalidDrawerConfigError extends Error {
  readonly code = 'invalid_configuration';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid drawer configuration: ${issues.join('; ')}`);
    this.name = 'InvalidDrawerConfigError';
    this.issues = issues;
  }
}

export function isInvalidDrawerConfigError(error: unknown): error is InvalidDrawerConfigError {
  return error instanceof InvalidDrawerConfigError;
}
