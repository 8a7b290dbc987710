/**
 * Base interface for all promptctx events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the scan or prompt run the event belongs to */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a project scan begins walking the tree */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    /** Directory the scan starts from */
    rootDir: string;
    /** Token budget for the assembled content */
    maxTokens: number;
    /** True when the scan only measures tokens */
    isTokenCalculation: boolean;
  };
}

/** Emitted when a project scan produced its result */
export interface ScanCompleted extends BaseEvent {
  type: 'ScanCompleted';
  payload: {
    rootDir: string;
    tokenCount: number;
    fileCount: number;
    skippedFileCount: number;
    skippedDirectoryCount: number;
    durationMs: number;
  };
}

/** Emitted when a project scan failed */
export interface ScanFailed extends BaseEvent {
  type: 'ScanFailed';
  payload: {
    error: string;
  };
}

/** Emitted when a prompt is handed to the generation worker */
export interface PromptSubmitted extends BaseEvent {
  type: 'PromptSubmitted';
  payload: {
    /** Number of messages sent, including the new user turn */
    messageCount: number;
    hasSelection: boolean;
    hasContext: boolean;
  };
}

/** Emitted when a second submit stopped the in-flight prompt */
export interface PromptCancelled extends BaseEvent {
  type: 'PromptCancelled';
  payload: Record<string, never>;
}

/** Emitted when the assistant reply was appended to the conversation */
export interface PromptCompleted extends BaseEvent {
  type: 'PromptCompleted';
  payload: {
    durationMs: number;
    replyChars: number;
  };
}

/** Emitted when the generation capability failed */
export interface PromptFailed extends BaseEvent {
  type: 'PromptFailed';
  payload: {
    error: string;
  };
}

/** Emitted when a provider request is initiated */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    /** Provider identifier */
    provider: string;
    /** Model being used */
    model: string;
  };
}

/** Emitted when a provider request completes (success or failure) */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    model: string;
    /** Total request duration in milliseconds */
    durationMs: number;
    /** Whether the request succeeded */
    success: boolean;
    /** Number of retry attempts */
    retries: number;
    /** Error message if failed */
    error?: string;
  };
}

/**
 * Union type of all promptctx events.
 * Use the `type` field to discriminate between event types.
 */
export type PromptCtxEvent =
  | ScanStarted
  | ScanCompleted
  | ScanFailed
  | PromptSubmitted
  | PromptCancelled
  | PromptCompleted
  | PromptFailed
  | ProviderRequestStarted
  | ProviderRequestFinished;

/**
 * Common envelope fields for a new event in the given run.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventEnvelope(runId), type: 'PromptCancelled', payload: {} });
 * ```
 */
export function eventEnvelope(runId: string): Pick<BaseEvent, 'schemaVersion' | 'timestamp' | 'runId'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
