import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}

/**
 * Upstream text extraction produced nothing usable. Re-running the same
 * extraction yields the same result, so it is never retried.
 */
export class ExtractionFailureError extends AppError {
  public readonly documentId: string;

  constructor(documentId: string, message = "Could not extract text from document", options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "EXTRACTION_FAILED",
      ...options,
      details: { documentId, ...options?.details },
    });
    this.documentId = documentId;
  }
}

export type RetrievalStage = "terms" | "retrieval" | "generation";

export class NoRetrievableContextError extends AppError {
  public readonly topic: string;
  public readonly stage: RetrievalStage;

  constructor(topic: string, stage: RetrievalStage, options?: ErrorExtras) {
    super({
      message: `No relevant information found for topic: ${topic}`,
      statusCode: 404,
      code: "NO_RETRIEVABLE_CONTEXT",
      ...options,
      details: { topic, stage, ...options?.details },
    });
    this.topic = topic;
    this.stage = stage;
  }
}

export class InsufficientContextError extends AppError {
  public readonly topic: string;

  constructor(topic: string, options?: ErrorExtras) {
    super({
      message: `Insufficient context available for topic: ${topic}`,
      statusCode: 404,
      code: "INSUFFICIENT_CONTEXT",
      ...options,
      details: { topic, ...options?.details },
    });
    this.topic = topic;
  }
}

export class GenerationCapabilityError extends AppError {
  public readonly provider: string;

  constructor(message: string, provider: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "GENERATION_FAILED",
      ...options,
      details: { provider, ...options?.details },
    });
    this.provider = provider;
  }
}
