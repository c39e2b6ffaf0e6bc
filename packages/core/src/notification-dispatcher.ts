import { DeliveryError, describeError } from "./errors.js";
import { exponentialBackoff, retry, type BackoffFn } from "./retry.js";
import { DEFAULTS, type Notification, type PushChannel, type QuakeLogger } from "./types.js";

export type DeliveryOutcome =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: DeliveryError };

export type NotificationDispatcherOptions = {
  channel: PushChannel;
  logger?: QuakeLogger;
  logPrefix?: string;
  maxAttempts?: number;
  backoff?: BackoffFn;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * A 4xx answer means the server rejected the request itself (bad token, bad
 * payload); sending it again cannot help. Timeouts and rate limits can.
 */
export function isRetryableDelivery(err: unknown): boolean {
  if (!(err instanceof DeliveryError) || err.status === undefined) return true;
  if (err.status === 408 || err.status === 429) return true;
  return err.status < 400 || err.status >= 500;
}

/**
 * Best-effort push delivery. Each notification gets a fixed attempt budget;
 * once it is spent the failure is logged and the notification is gone.
 */
export class NotificationDispatcher {
  private readonly channel: PushChannel;
  private readonly logger: QuakeLogger;
  private readonly logPrefix: string;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffFn;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(opts: NotificationDispatcherOptions) {
    this.channel = opts.channel;
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "quakewatch";
    this.maxAttempts = opts.maxAttempts ?? DEFAULTS.deliveryMaxAttempts;
    this.backoff =
      opts.backoff ??
      exponentialBackoff({ baseMs: DEFAULTS.deliveryBackoffBaseMs, capMs: DEFAULTS.deliveryBackoffCapMs });
    this.sleep = opts.sleep;
  }

  /** Push one notification. Never rejects. */
  async deliver(notification: Notification): Promise<DeliveryOutcome> {
    let attempts = 0;
    try {
      await retry(
        async (attempt) => {
          attempts = attempt;
          await this.channel.push(notification);
        },
        {
          maxAttempts: this.maxAttempts,
          backoff: this.backoff,
          sleep: this.sleep,
          shouldRetry: isRetryableDelivery,
          onRetry: (err, attempt, delayMs) => {
            this.logger.warn(
              `${this.logPrefix}: ${this.channel.name} push attempt ${attempt}/${this.maxAttempts} failed: ${describeError(err)}; retrying in ${delayMs}ms`,
            );
          },
        },
      );
    } catch (err) {
      const error =
        err instanceof DeliveryError ? err : new DeliveryError(describeError(err), { cause: err });
      this.logger.error(
        `${this.logPrefix}: ${this.channel.name} push failed after ${attempts} attempt(s): ${error.message}`,
      );
      return { ok: false, attempts, error };
    }

    this.logger.info(`${this.logPrefix}: notification pushed via ${this.channel.name}`);
    return { ok: true, attempts };
  }
}
