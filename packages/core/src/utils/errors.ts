/**
 * Error types for input problems
 * External-command failures are reported as OperationResult values instead
 */

export class ServiceWizardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Template identifier is not in the registry
 */
export class UnknownTemplateError extends ServiceWizardError {
  constructor(public readonly templateId: string) {
    super(`Unknown template: ${templateId}`);
  }
}

/**
 * A field the chosen template needs has no value
 */
export class MissingFieldError extends ServiceWizardError {
  constructor(
    public readonly field: string,
    message = `Missing required field: ${field}`
  ) {
    super(message);
  }
}

/**
 * A configuration record (from flags, prompts or disk) breaks an invariant
 */
export class InvalidConfigError extends ServiceWizardError {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${message} (${source})` : message);
  }
}
