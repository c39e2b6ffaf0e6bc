import { DEFAULTS, DeliveryError, describeError, type Notification, type PushChannel } from "@quakewatch/core";

/**
 * Gotify push channel — `POST {baseUrl}/message?token={token}`.
 *
 * ```ts
 * new GotifyPushChannel("https://push.example.com", "test-token")
 * ```
 *
 * Any transport failure, timeout or non-2xx answer rejects with a
 * DeliveryError carrying the HTTP status, if any, so the dispatcher can
 * tell a rejected request from a transient failure.
 */
export class GotifyPushChannel implements PushChannel {
  readonly name: string;
  private url: string;
  private timeoutMs: number;

  constructor(baseUrl: string, token: string, opts?: { name?: string; timeoutMs?: number }) {
    const base = baseUrl.replace(/\/+$/, "");
    this.url = `${base}/message?token=${encodeURIComponent(token)}`;
    this.name = opts?.name ?? "gotify";
    this.timeoutMs = opts?.timeoutMs ?? DEFAULTS.pushTimeoutMs;
  }

  async push(notification: Notification): Promise<void> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          title: notification.title,
          message: notification.message,
          priority: notification.priority,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DeliveryError(`Gotify request failed: ${describeError(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new DeliveryError(`Gotify ${res.status}`, { status: res.status });
    }
  }
}
