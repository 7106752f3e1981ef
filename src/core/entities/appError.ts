/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "unavailable"
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "invalid_response"
  | "invalid_json"
  | "invalid_yaml"
  | "validation_error"
  | "dimension_mismatch"
  | "not_found"
  | "conflict";

export type AppBoundarySource =
  | "documents"
  | "model"
  | "embedding"
  | "vector_index"
  | "classifier"
  | "storage"
  | "workflow";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Failure modes a model gateway may report; transport detail stays inside the adapter.
 */
export type ModelGatewayErrorCode = Extract<
  AppBoundaryErrorCode,
  "unavailable" | "rate_limited" | "timeout" | "invalid_response"
>;

export type ModelGatewayError = AppBoundaryError & {
  source: "model";
  code: ModelGatewayErrorCode;
};

/**
 * Raised for corrupt artifacts and invalid configuration; a run hitting one aborts without retry.
 */
export class FatalConfigurationError extends Error {
  override readonly name = "FatalConfigurationError";

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

export const describeBoundaryError = (error: AppBoundaryError): string =>
  `${error.source}/${error.provider}: ${error.code}: ${error.message}`;

export const stageFailureFrom = (error: AppBoundaryError) => ({
  code: error.code,
  message: describeBoundaryError(error),
  retryable: error.retryable,
});
