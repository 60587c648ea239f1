import { describe, it, expect, vi, afterEach } from "vitest";
import { ReadableStream } from "node:stream/web";
import { NtfyFeed, parseFeedLine, readFeedEvents } from "../deploy/progress-feed";
import type { FeedEvent } from "../deploy/progress-feed";

const encoder = new TextEncoder();

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

async function collect(iterable: AsyncIterable<FeedEvent>): Promise<FeedEvent[]> {
  const events: FeedEvent[] = [];
  for await (const event of iterable) {
    events.push(event);
  }
  return events;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseFeedLine", () => {
  it("should parse ntfy JSON lines", () => {
    expect(parseFeedLine('{"id":"a1","time":1792324800,"event":"message","topic":"t","message":"Installing Docker"}')).toEqual({
      id: "a1",
      time: 1792324800,
      event: "message",
      message: "Installing Docker",
    });
  });

  it("should skip blank and malformed lines", () => {
    expect(parseFeedLine("   ")).toBeNull();
    expect(parseFeedLine("{not json")).toBeNull();
    expect(parseFeedLine('{"message":"no event field"}')).toBeNull();
  });
});

describe("readFeedEvents", () => {
  it("should reassemble lines split across chunks", async () => {
    const stream = streamOf(['{"event":"open"}\n{"event":"mes', 'sage","message":"hi"}\n\ngarbage\n{"event":"keepalive"}']);
    const events = await collect(readFeedEvents(stream, new AbortController().signal));
    expect(events).toEqual([
      {
        event: "open",
      },
      {
        event: "message",
        message: "hi",
      },
      {
        event: "keepalive",
      },
    ]);
  });

  it("should end quietly when the subscription is aborted", async () => {
    const cancel = new AbortController();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"event":"message","message":"first"}\n'));
        cancel.signal.addEventListener("abort", () => controller.error(new Error("aborted")));
      },
    });
    const iterator = readFeedEvents(stream, cancel.signal);
    expect((await iterator.next()).value).toEqual({
      event: "message",
      message: "first",
    });
    const pending = iterator.next();
    cancel.abort();
    expect(await pending).toEqual({
      done: true,
      value: undefined,
    });
  });

  it("should surface stream errors that are not aborts", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error("connection reset"));
      },
    });
    await expect(collect(readFeedEvents(stream, new AbortController().signal))).rejects.toThrow("connection reset");
  });
});

describe("NtfyFeed", () => {
  it("should subscribe to the topic's JSON stream from the given point", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"event":"message","message":"Starting vLLM"}\n'));
    vi.stubGlobal("fetch", fetchMock);
    const events = await collect(
      new NtfyFeed("https://ntfy.test").subscribe("ai-quickstart-test", {
        since: "1792324800",
        signal: new AbortController().signal,
      }),
    );
    expect(fetchMock.mock.calls[0][0]).toBe("https://ntfy.test/ai-quickstart-test/json?since=1792324800");
    expect(events).toEqual([
      {
        event: "message",
        message: "Starting vLLM",
      },
    ]);
  });

  it("should fail on a non-2xx subscription", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        new Response("rate limited", {
          status: 429,
        }),
      ),
    );
    await expect(
      collect(
        new NtfyFeed("https://ntfy.test").subscribe("t", {
          since: "all",
          signal: new AbortController().signal,
        }),
      ),
    ).rejects.toThrow("Progress feed returned HTTP 429");
  });

  it("should yield nothing when aborted before connecting", async () => {
    const cancel = new AbortController();
    cancel.abort();
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("This operation was aborted");
      }),
    );
    expect(
      await collect(
        new NtfyFeed("https://ntfy.test").subscribe("t", {
          since: "all",
          signal: cancel.signal,
        }),
      ),
    ).toEqual([]);
  });
});
