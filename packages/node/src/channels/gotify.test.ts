import { DeliveryError } from "@quakewatch/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { GotifyPushChannel } from "./gotify.js";

const notification = { title: "⚠️ Strong earthquake alert", message: "Source: Manual test", priority: 10 };

describe("GotifyPushChannel", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("POSTs the notification to /message with the app token", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await new GotifyPushChannel("https://push.example.com/", "test-token").push(notification);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://push.example.com/message?token=test-token",
      expect.objectContaining({ method: "POST", headers: { "Content-Type": "application/json" } }),
    );
    const init = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({
      title: "⚠️ Strong earthquake alert",
      message: "Source: Manual test",
      priority: 10,
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("escapes the token in the query string", async () => {
    const fetchMock = vi.fn(async (_url: string) => new Response(null, { status: 204 }));
    vi.stubGlobal("fetch", fetchMock);

    await new GotifyPushChannel("https://push.example.com", "a&b").push(notification);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://push.example.com/message?token=a%26b");
  });

  it("rejects with the status on a non-2xx answer", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("unauthorized", { status: 401 })));

    const push = new GotifyPushChannel("https://push.example.com", "test-token").push(notification);
    await expect(push).rejects.toBeInstanceOf(DeliveryError);
    await expect(push).rejects.toMatchObject({ message: "Gotify 401", status: 401 });
  });

  it("rejects with a DeliveryError when the request itself fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(new GotifyPushChannel("https://push.example.com", "test-token").push(notification)).rejects.toThrow(
      "Gotify request failed: fetch failed",
    );
  });

  it("is named gotify unless told otherwise", () => {
    expect(new GotifyPushChannel("https://push.example.com", "test-token").name).toBe("gotify");
    expect(new GotifyPushChannel("https://push.example.com", "test-token", { name: "phone" }).name).toBe("phone");
  });
});
