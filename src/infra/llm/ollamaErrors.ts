import type { ModelGatewayErrorCode } from "../../core/entities/appError";
import type { HttpClientError } from "../http/httpJsonClient";

/**
 * Ollama answers 404 for a model that was never pulled; that is a setup fault, not an outage.
 */
export const ollamaErrorCode = (error: HttpClientError): ModelGatewayErrorCode => {
  switch (error.code) {
    case "timeout":
      return "timeout";
    case "invalid_json":
      return "invalid_response";
    case "transport_error":
      return "unavailable";
    case "non_success_status":
      if (error.httpStatus === 429) {
        return "rate_limited";
      }
      return error.httpStatus !== undefined && error.httpStatus < 500
        ? "invalid_response"
        : "unavailable";
  }
};
