export interface ValidationIssue {
  index: number;
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ComputationInvariantError extends Error {
  code = 'COMPUTATION_INVARIANT';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ComputationInvariantError';
  }
}

export type NarrativeFailureReason = 'timeout' | 'provider_error' | 'empty_response';

export class NarrativeUnavailableError extends Error {
  code = 'NARRATIVE_UNAVAILABLE';
  constructor(
    message: string,
    public reason: NarrativeFailureReason,
    public transient: boolean,
    public details?: unknown
  ) {
    super(message);
    this.name = 'NarrativeUnavailableError';
  }
}

export class TemplateError extends Error {
  code = 'TEMPLATE_ERROR';
  constructor(message: string, public placeholder?: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class DocumentRenderError extends Error {
  code = 'DOCUMENT_RENDER_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentRenderError';
  }
}

export class ReportStorageError extends Error {
  code = 'REPORT_STORAGE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ReportStorageError';
  }
}

export class ArtifactNotFoundError extends Error {
  code = 'NOT_FOUND';
  constructor(message: string, public artifactName: string) {
    super(message);
    this.name = 'ArtifactNotFoundError';
  }
}
