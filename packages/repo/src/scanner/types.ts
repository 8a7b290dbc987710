/**
 * A file or directory as seen by the scanner. Nodes are supplied by the host
 * file system and never mutated by the scanner.
 */
export interface FileNode {
  readonly name: string;
  /** Absolute path */
  readonly path: string;
  readonly isDirectory: boolean;
  /** Extension without the leading dot; empty when the name has none */
  readonly extension: string;
  /** Children in display order; empty for files. */
  children(): Promise<FileNode[]>;
  /** Reads the file as UTF-8; rejects for unreadable or binary content. */
  readText(): Promise<string>;
}

/**
 * Read-only snapshot of the exclusion settings taken at the start of a scan.
 */
export interface ExclusionConfig {
  readonly excludedDirectoryNames: ReadonlySet<string>;
  /** Lowercase extensions without the leading dot */
  readonly includedFileExtensions: ReadonlySet<string>;
  readonly useGitignore: boolean;
  readonly excludeDocComments: boolean;
}

export interface IgnoreMatcher {
  matches(filePath: string, isDirectory?: boolean): boolean;
}

/**
 * The logical project a scan runs against.
 */
export interface Project {
  readonly name: string;
  /** Directory holding the project-level ignore file */
  readonly baseDir: string;
  /** Top-level directories the project's modules live in */
  readonly contentRoots: readonly string[];
  /** Whether a file belongs to the project itself rather than build output or libraries. */
  isInContent(filePath: string): boolean;
}

/**
 * User-visible feedback channel. Fire-and-forget.
 */
export interface NotificationSink {
  notify(project: Project, message: string): void;
}

export interface ScanContentResult {
  readonly content: string;
  readonly tokenCount: number;
  readonly fileCount: number;
  readonly skippedFileCount: number;
  readonly skippedDirectoryCount: number;
}

export interface ScanRequest {
  /** Directory to scan; the common root of the project's content roots when omitted */
  startDirectory?: string;
  /** Token budget (window context) for the assembled text */
  maxTokens: number;
  /** Measure only: no truncation marker, no notification */
  isTokenCalculation?: boolean;
}
