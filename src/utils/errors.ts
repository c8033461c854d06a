export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DocumentUnavailableError extends Error {
  code = 'DOCUMENT_UNAVAILABLE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentUnavailableError';
  }
}

export class PageExtractionError extends Error {
  code = 'PAGE_EXTRACTION_ERROR';
  constructor(message: string, public pageNumber: number, public details?: unknown) {
    super(message);
    this.name = 'PageExtractionError';
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details: FieldIssue[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
