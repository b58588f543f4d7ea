import { ServiceError } from '@arec/common';

export class InvalidQueryError extends ServiceError {
  constructor(message = 'Query text must not be empty.', details?: Record<string, unknown>) {
    super(message, { statusCode: 400, code: 'invalid_query', details });
    this.name = 'InvalidQueryError';
  }
}

export class EmptyCatalogError extends ServiceError {
  constructor(message = 'No assessment catalog has been loaded.') {
    super(message, { statusCode: 503, code: 'catalog_empty' });
    this.name = 'EmptyCatalogError';
  }
}

export class EmbeddingUnavailableError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 503, code: 'embedding_unavailable', cause });
    this.name = 'EmbeddingUnavailableError';
  }
}

/** Raised inside extractors; never leaves the composite extractor. */
export class ConstraintExtractionFailure extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, { statusCode: 500, code: 'constraint_extraction_failed', cause });
    this.name = 'ConstraintExtractionFailure';
  }
}

export class CatalogLoadError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { statusCode: 422, code: 'catalog_invalid', details });
    this.name = 'CatalogLoadError';
  }
}

export class LabeledSetError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { statusCode: 422, code: 'labeled_set_invalid', details });
    this.name = 'LabeledSetError';
  }
}
