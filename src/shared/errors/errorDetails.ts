import { FatalConfigurationError } from "../../core/entities/appError";

export const toErrorDetails = (error: unknown) => {
  if (error instanceof FatalConfigurationError) {
    return {
      name: error.name,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
