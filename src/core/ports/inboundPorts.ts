import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  ClassifierLoadError,
  ClassifierModel,
} from "../entities/contentFilter";
import type { DocumentEntity } from "../entities/document";

/**
 * Read side of the document store; the workflow never writes documents back.
 */
export interface DocumentStorePort {
  fetchById(
    documentId: string,
  ): Promise<Result<DocumentEntity | null, AppBoundaryError>>;
}

/**
 * Supplies the trained relevance classifier. A missing artifact is `unavailable`; an unreadable one is `corrupt`.
 */
export interface ClassifierArtifactPort {
  load(): Promise<Result<ClassifierModel, ClassifierLoadError>>;
}
