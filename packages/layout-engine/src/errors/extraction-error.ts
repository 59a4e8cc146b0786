/**
 * Single problem found while validating input or configuration
 */
export interface ValidationIssue {
  /**
   * Dotted path to the offending value (e.g., "pages.2.tokens.14.bbox")
   */
  path: string;

  /**
   * Human-readable error message
   */
  message: string;
}

/**
 * ExtractionError
 *
 * Base error class for fatal extraction failures.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * MalformedTokenStreamError
 *
 * Thrown when the upstream parser output does not match the token schema.
 */
export class MalformedTokenStreamError extends ExtractionError {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[]) {
    super(message);
    this.name = 'MalformedTokenStreamError';
    this.issues = issues;
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const lines = [`Malformed token stream: ${this.issues.length} issue(s)`];
    for (const issue of this.issues) {
      lines.push(`  ${issue.path || '(root)'}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * EmptyDocumentError
 *
 * Thrown when no page of the document holds a single token.
 */
export class EmptyDocumentError extends ExtractionError {
  readonly documentId: string;

  constructor(documentId: string) {
    super(`Document "${documentId}" contains no tokens`);
    this.name = 'EmptyDocumentError';
    this.documentId = documentId;
  }
}

/**
 * InvalidConfigError
 *
 * Thrown when extraction configuration overrides fail validation.
 */
export class InvalidConfigError extends ExtractionError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(
      `Invalid extraction config: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

/**
 * CollaboratorError
 *
 * Wraps a failure of an optional OCR or LLM collaborator. Never fatal: the
 * pipeline records it as a page issue.
 */
export class CollaboratorError extends ExtractionError {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, options?: ErrorOptions) {
    super(`[${collaborator}] ${message}`, options);
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
  }

  static wrap(collaborator: string, error: unknown): CollaboratorError {
    return new CollaboratorError(
      collaborator,
      ExtractionError.getErrorMessage(error),
      { cause: error },
    );
  }
}
