/**
 * A single top-level comment as written to the sink.
 */
export interface CommentRecord {
  readonly authorDisplayName: string;
  readonly text: string;
}

export interface ListCommentsRequest {
  videoId: string;
  maxResults: number;
  apiKey: string;
  signal?: AbortSignal;
}

/**
 * Remote comment-listing capability. Implement for each comment provider.
 */
export interface CommentSource {
  readonly name: string;
  list(request: ListCommentsRequest): Promise<CommentRecord[]>;
}

/**
 * Gate every outbound call passes before an attempt.
 */
export interface PermitGate {
  acquire(signal?: AbortSignal): Promise<void>;
}

export type TaskStatus = 'succeeded' | 'exhausted' | 'cancelled';

/**
 * Terminal state of one fetch task.
 */
export interface TaskOutcome {
  locator: string;
  videoId?: string;
  status: TaskStatus;
  attempts: number;
  commentsWritten: number;
  outputPath?: string;
  error?: string;
}

export interface TaskFailure {
  locator: string;
  videoId?: string;
  attempts: number;
  error: unknown;
}

export interface FetchReport {
  tasks: TaskOutcome[];
  succeeded: number;
  failed: number;
  cancelled: number;
  commentsWritten: number;
  durationMs: number;
}
