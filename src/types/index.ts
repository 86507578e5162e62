/**
 * Types and interfaces for the application
 */

/**
 * A repository owned by the tracked user
 */
export interface RepositoryRef {
  owner: string;
  name: string;
  fullName: string;
}

export type FileStatus =
  | "added"
  | "removed"
  | "modified"
  | "renamed"
  | "copied"
  | "changed"
  | "unchanged";

/**
 * Represents a file changed in a commit
 */
export interface FileChange {
  readonly filename: string;
  readonly status: FileStatus;
  readonly additions: number;
  readonly deletions: number;
  readonly changes: number;
  readonly patch?: string;
}

export interface CommitStats {
  readonly additions: number;
  readonly deletions: number;
  readonly total: number;
}

/**
 * A commit from the lookback window, with its diff detail
 */
export interface CommitRecord {
  /** owner/name */
  readonly repository: string;
  /** Short (7 character) SHA */
  readonly sha: string;
  readonly message: string;
  readonly author: string;
  readonly date: string;
  readonly url: string;
  readonly files: readonly FileChange[];
  readonly stats: CommitStats;
}

export interface GenerationMetrics {
  inputLength: number;
  outputLength: number;
  wordCount: number;
  timestamp: string;
}

/**
 * One entry of the post history log
 */
export interface GeneratedExample {
  timestamp: string;
  commitsSummary: string;
  generatedPost: string;
  metrics: GenerationMetrics;
}

/**
 * An image as it arrives from a generator or the command line. The form is
 * decided once, where the payload is received.
 */
export type ImagePayload =
  | { kind: "url"; url: string }
  | { kind: "dataUri"; mimeType: string; base64: string }
  | { kind: "base64"; base64: string };

/**
 * Result of a stage that is allowed to degrade
 */
export type StageOutcome<T> =
  | { status: "produced"; value: T }
  | { status: "degraded"; reason: string }
  | { status: "fatal"; error: Error };

/**
 * HTTP fetch signature, injectable for tests
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Type for the app logger
 */
export type Logger = {
  info: (message: string) => void;
  error: (message: string) => void;
  warn: (message: string) => void;
  debug: (message: string) => void;
};
