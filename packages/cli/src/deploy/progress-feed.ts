// deploy/progress-feed.ts — ntfy JSON-lines subscription (one JSON object per line)

import * as v from "valibot";
import { parseJsonWith } from "@llm-quickstart/shared";
import type { ReadableStream } from "node:stream/web";
import { NTFY_BASE } from "../config";

const FeedEventSchema = v.object({
  id: v.optional(v.string()),
  time: v.optional(v.number()),
  event: v.string(),
  message: v.optional(v.string()),
});

export type FeedEvent = v.InferOutput<typeof FeedEventSchema>;

export interface SubscribeOptions {
  /** ntfy `since`: a unix timestamp in seconds or a message id. */
  since: string;
  signal: AbortSignal;
}

export interface ProgressFeed {
  /** Ends (without throwing) when `signal` aborts; other stream failures throw. */
  subscribe(topic: string, opts: SubscribeOptions): AsyncIterable<FeedEvent>;
}

/** Parse a line; blank and malformed lines yield null. */
export function parseFeedLine(line: string): FeedEvent | null {
  const trimmed = line.trim();
  return trimmed ? parseJsonWith(trimmed, FeedEventSchema) : null;
}

/** Split a byte stream into parsed events. */
export async function* readFeedEvents(
  stream: ReadableStream<Uint8Array>,
  signal: AbortSignal,
): AsyncGenerator<FeedEvent, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  try {
    while (true) {
      const chunk = await reader.read().catch((err: unknown) => {
        if (signal.aborted) {
          return null;
        }
        throw err;
      });
      if (chunk === null) {
        return;
      }
      if (chunk.done) {
        break;
      }
      buffer += decoder.decode(chunk.value, {
        stream: true,
      });
      let nl = buffer.indexOf("\n");
      while (nl !== -1) {
        const event = parseFeedLine(buffer.slice(0, nl));
        buffer = buffer.slice(nl + 1);
        if (event) {
          yield event;
        }
        nl = buffer.indexOf("\n");
      }
    }
    const tail = parseFeedLine(buffer + decoder.decode());
    if (tail) {
      yield tail;
    }
  } finally {
    reader.releaseLock();
  }
}

export class NtfyFeed implements ProgressFeed {
  constructor(private readonly base = NTFY_BASE) {}

  async *subscribe(topic: string, opts: SubscribeOptions): AsyncGenerator<FeedEvent, void, undefined> {
    const url = `${this.base}/${encodeURIComponent(topic)}/json?since=${encodeURIComponent(opts.since)}`;
    let resp: Response;
    try {
      resp = await fetch(url, {
        signal: opts.signal,
      });
    } catch (err) {
      if (opts.signal.aborted) {
        return;
      }
      throw err;
    }
    if (!resp.ok || !resp.body) {
      throw new Error(`Progress feed returned HTTP ${resp.status}`);
    }
    yield* readFeedEvents(resp.body, opts.signal);
  }
}
