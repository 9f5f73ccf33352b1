/**
 * Reasoning effort selected through a model-name suffix
 */
export type ReasoningEffort = 'none' | 'low' | 'medium' | 'high' | 'xhigh';

/**
 * Result of routing a client model identifier
 */
export interface ModelSpec {
  /** Allowlisted backend model without any suffix */
  baseModel: string;
  /** Reasoning effort; 'none' means no override is sent */
  effort: ReasoningEffort;
}

/**
 * Message content resolved once at the request boundary
 */
export type MessageContent =
  | { kind: 'plain_text'; text: string }
  | { kind: 'part_list'; parts: unknown[] };

/**
 * Phase of a streamed response
 */
export type StreamPhase = 'started' | 'streaming' | 'completed' | 'failed';

/**
 * Per-response streaming state, owned by exactly one request
 */
export interface StreamState {
  responseId: string;
  accumulatedText: string;
  terminated: boolean;
  finishReason: 'unset' | 'stop' | 'length' | 'error';
  phase: StreamPhase;
}

/**
 * Credentials handed to the backend dispatcher
 */
export type BackendCredentials =
  | { kind: 'chatgpt'; accessToken: string; accountId: string }
  | { kind: 'api_key'; apiKey: string };

/**
 * Health check response
 */
export interface HealthResponse {
  /** Server status */
  status: 'ok' | 'degraded';
  /** Fixed service name */
  service: string;
  /** Server uptime in seconds */
  uptime: number;
  /** Dispatch queue statistics */
  queue?: {
    /** Requests waiting for a free upstream slot */
    pending: number;
    /** Requests currently talking to the backend */
    processing: number;
    /** Maximum concurrent upstream requests */
    concurrency: number;
  };
}

/**
 * Dispatch pool statistics
 */
export interface DispatchPoolStats {
  /** Requests waiting in queue */
  pending: number;
  /** Requests currently being processed */
  processing: number;
  /** Maximum concurrent upstream requests */
  concurrency: number;
  /** Maximum queue size */
  maxQueueSize: number;
  /** Whether the pool is paused */
  isPaused: boolean;
}

/**
 * Options for a job submitted to the dispatch pool
 */
export interface DispatchJobOptions {
  /** Request ID for logging */
  requestId: string;
  /** Retry transient failures (non-streaming requests only) */
  retry?: boolean;
  /** Abort signal tied to the client connection */
  abortSignal?: AbortSignal;
}
