// src/services/letters/errors.ts

/**
 * Structured error raised by the letter pipeline.
 * `details` is for server-side logs only and never leaves the process.
 */
export class LetterServiceError extends Error {
  public readonly code: string;
  public readonly details: string;
  public readonly userAction: string;
  public readonly statusCode: number;
  public readonly traceId?: string;

  constructor(
    message: string,
    code: string,
    details: string,
    userAction: string,
    statusCode: number = 500,
    traceId?: string
  ) {
    super(message);
    this.name = 'LetterServiceError';
    this.code = code;
    this.details = details;
    this.userAction = userAction;
    this.statusCode = statusCode;
    this.traceId = traceId;
  }
}

export class InvalidFilenameError extends LetterServiceError {
  constructor(details: string, traceId?: string) {
    super(
      'Invalid filename',
      'INVALID_FILENAME',
      details,
      'Use only letters, digits, spaces, underscores, hyphens and dots in file names',
      400,
      traceId
    );
    this.name = 'InvalidFilenameError';
  }
}

export class PayloadTooLargeError extends LetterServiceError {
  constructor(sizeBytes: number, limitBytes: number, traceId?: string) {
    super(
      'Generated document exceeds the maximum allowed size',
      'PAYLOAD_TOO_LARGE',
      `PDF size (${sizeBytes} bytes) exceeds maximum allowed size (${limitBytes} bytes)`,
      'Reduce the amount of content in the letter',
      413,
      traceId
    );
    this.name = 'PayloadTooLargeError';
  }
}

export class UnknownTemplateError extends LetterServiceError {
  constructor(templateId: string, supported: readonly string[], traceId?: string) {
    super(
      `Template '${templateId}' is not supported`,
      'UNKNOWN_TEMPLATE',
      `Supported templates: ${supported.join(', ')}`,
      `Use one of: ${supported.join(', ')}`,
      400,
      traceId
    );
    this.name = 'UnknownTemplateError';
  }
}

export class TemplateMissingError extends LetterServiceError {
  constructor(templateId: string, templatePath: string, traceId?: string) {
    super(
      `Template '${templateId}' is not available`,
      'TEMPLATE_MISSING',
      `Template file not found: ${templatePath}`,
      'Contact the system administrator to install the template',
      400,
      traceId
    );
    this.name = 'TemplateMissingError';
  }
}

export class DocumentNotFoundError extends LetterServiceError {
  constructor(reference: string, traceId?: string) {
    super(
      'Document not found',
      'NOT_FOUND',
      `No document for reference '${reference}'`,
      'Generate the letter again; generated files expire after a while',
      404,
      traceId
    );
    this.name = 'DocumentNotFoundError';
  }
}

export class RenderFailureError extends LetterServiceError {
  constructor(details: string, traceId?: string) {
    super(
      'Failed to generate PDF',
      'RENDER_FAILED',
      details,
      'Try again later or contact support with the trace id',
      500,
      traceId
    );
    this.name = 'RenderFailureError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class RequestValidationError extends LetterServiceError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], traceId?: string) {
    super(
      'Request validation failed',
      'VALIDATION_ERROR',
      issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '),
      'Check your request format and ensure all required fields are provided',
      422,
      traceId
    );
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}
