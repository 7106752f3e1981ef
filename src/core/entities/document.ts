export type Platform = "windows" | "linux" | "macos" | "multiple" | "unknown";

/**
 * Read-only view of an ingested threat-intelligence document; the document store owns its lifecycle.
 */
export type DocumentEntity = {
  id: string;
  title: string;
  content: string;
  platformHints: string[];
  url?: string;
  source?: string;
  publishedAt?: Date;
};
