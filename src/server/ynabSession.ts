import * as ynab from 'ynab';
import { RequestCancelledError, RequestTimeoutError } from '../utils/errors.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';

export type YnabApiFactory = (accessToken: string) => ynab.API;

/**
 * A YNAB client handle scoped to one tool call. `signal` aborts when the call
 * times out or the MCP client cancels it; work that mutates local state must
 * check it first.
 */
export interface YnabSession {
  api: ynab.API;
  signal: AbortSignal;
}

export interface YnabSessionOptions {
  accessToken: string;
  timeoutMs: number;
  createApi?: YnabApiFactory;
  logger?: Logger;
}

export class YnabSessionFactory {
  private readonly createApi: YnabApiFactory;
  private readonly logger: Logger;
  private active = 0;

  constructor(private readonly options: YnabSessionOptions) {
    this.createApi = options.createApi ?? ((accessToken) => new ynab.API(accessToken));
    this.logger = options.logger ?? globalRequestLogger;
  }

  get activeSessions(): number {
    return this.active;
  }

  /**
   * Acquire a session, run `fn` with it and release it on every exit path.
   *
   * @throws RequestTimeoutError when `fn` outlives the configured timeout
   * @throws RequestCancelledError when `parentSignal` aborts first
   */
  async use<T>(fn: (session: YnabSession) => Promise<T>, parentSignal?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const startedAt = Date.now();
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = new RequestTimeoutError(this.options.timeoutMs);
        controller.abort(error);
        reject(error);
      }, this.options.timeoutMs);

      onParentAbort = () => {
        const error = new RequestCancelledError();
        controller.abort(error);
        reject(error);
      };
      if (parentSignal?.aborted) {
        onParentAbort();
      } else {
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });
      }
    });

    const session: YnabSession = {
      api: this.createApi(this.options.accessToken),
      signal: controller.signal,
    };
    this.active += 1;

    // Promise.race subscribes to both sides, so whichever loses settles handled.
    try {
      return await Promise.race([fn(session), interrupted]);
    } finally {
      clearTimeout(timer);
      if (onParentAbort) {
        parentSignal?.removeEventListener('abort', onParentAbort);
      }
      this.active -= 1;
      this.logger.debug('YNAB session released', {
        durationMs: Date.now() - startedAt,
        aborted: controller.signal.aborted,
      });
    }
  }
}
