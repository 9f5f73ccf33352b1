import { v4 as uuidv4 } from 'uuid';
import type { BackendRequest } from '../types/backend.js';
import type { BackendCredentials } from '../types/index.js';
import type { Logger } from '../config.js';
import { Errors } from './errors.js';

/**
 * Authenticated capability to send one request to the backend.
 * Resolves with the raw response once headers arrive; the body is left unread.
 */
export interface BackendDispatcher {
  dispatch(request: BackendRequest, signal?: AbortSignal): Promise<Response>;
}

export interface HttpBackendDispatcherOptions {
  backendUrl: string;
  credentials: BackendCredentials;
  logger: Logger;
  /** Override for tests */
  fetchImpl?: typeof fetch;
}

/** Value of the "originator" header the Codex backend expects */
const ORIGINATOR = 'codex_cli_rs';

const ERROR_BODY_EXCERPT = 500;

/**
 * Describe a fetch failure, including the socket-level cause when undici provides one
 */
function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);

  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code}: ` : '';
    return `${err.message} (${code}${cause.message})`;
  }
  return err.message;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).substring(0, ERROR_BODY_EXCERPT);
  } catch (err) {
    return `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`;
  }
}

/**
 * Dispatcher that talks to the Responses API over HTTP
 */
export class HttpBackendDispatcher implements BackendDispatcher {
  private readonly backendUrl: string;
  private readonly credentials: BackendCredentials;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpBackendDispatcherOptions) {
    this.backendUrl = options.backendUrl;
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Headers sent with every backend request
   */
  buildHeaders(request: BackendRequest): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: request.stream ? 'text/event-stream' : 'application/json, text/event-stream',
      'OpenAI-Beta': 'responses=experimental',
      originator: ORIGINATOR,
      session_id: uuidv4(),
    };

    if (this.credentials.kind === 'chatgpt') {
      headers.Authorization = `Bearer ${this.credentials.accessToken}`;
      headers['chatgpt-account-id'] = this.credentials.accountId;
    } else {
      headers.Authorization = `Bearer ${this.credentials.apiKey}`;
    }

    return headers;
  }

  async dispatch(request: BackendRequest, signal?: AbortSignal): Promise<Response> {
    this.logger.debug('Dispatching to backend', {
      model: request.model,
      inputItems: request.input.length,
      stream: request.stream,
      reasoning: request.reasoning?.effort ?? 'none',
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.backendUrl, {
        method: 'POST',
        headers: this.buildHeaders(request),
        body: JSON.stringify(request),
        signal,
      });
    } catch (err) {
      // Aborts are the caller's own doing; let them through unchanged
      if (signal?.aborted) throw err;
      throw Errors.upstreamUnreachable(describeFetchError(err));
    }

    if (response.ok) {
      return response;
    }

    const status = response.status;
    const body = await readErrorBody(response);
    this.logger.warn('Backend returned an error status', {
      status,
      bodyExcerpt: body,
    });

    if (status === 401 || status === 403) {
      throw Errors.upstreamAuthRejected(status, body);
    }

    if (status === 429) {
      throw Errors.rateLimit();
    }

    throw Errors.upstreamError(`Backend returned ${status}`, {
      status,
      bodyExcerpt: body,
    });
  }
}
