// linode/linode.ts — Control-plane REST client (single attempt per request, no retries)

import * as v from "valibot";
import { type AnySchema, errorMessage, parseJsonWith } from "@llm-quickstart/shared";
import { ApiError } from "../errors";

// ─── Schemas ────────────────────────────────────────────────────────────────

const ErrorBodySchema = v.object({
  errors: v.array(
    v.object({
      reason: v.string(),
      field: v.optional(v.string()),
    }),
  ),
});

export const ProfileSchema = v.object({
  username: v.string(),
});

export const AvailabilityRecordSchema = v.object({
  region: v.string(),
  /** Null on some records; those are dropped when pages are merged. */
  plan: v.nullable(v.string()),
  available: v.boolean(),
});

export const AvailabilityPageSchema = v.object({
  data: v.array(AvailabilityRecordSchema),
  page: v.number(),
  pages: v.number(),
});

const Price = v.optional(v.nullable(v.number()), null);

export const InstanceTypeSchema = v.object({
  id: v.string(),
  label: v.string(),
  vcpus: v.number(),
  memory: v.number(),
  gpus: v.optional(v.number(), 0),
  price: v.object({
    hourly: Price,
    monthly: Price,
  }),
});

export const TypesSchema = v.object({
  data: v.array(InstanceTypeSchema),
});

export const RegionSchema = v.object({
  id: v.string(),
  label: v.string(),
});

export const RegionsSchema = v.object({
  data: v.array(RegionSchema),
});

export const InstanceSchema = v.object({
  id: v.number(),
  label: v.string(),
  status: v.string(),
  region: v.string(),
  type: v.nullable(v.string()),
  ipv4: v.optional(v.array(v.string()), []),
});

const EmptySchema = v.object({});

export type AvailabilityRecord = v.InferOutput<typeof AvailabilityRecordSchema>;
export type AvailabilityPage = v.InferOutput<typeof AvailabilityPageSchema>;
export type LinodeType = v.InferOutput<typeof InstanceTypeSchema>;
export type LinodeRegion = v.InferOutput<typeof RegionSchema>;
export type LinodeInstance = v.InferOutput<typeof InstanceSchema>;

export interface CreateInstanceBody {
  label: string;
  region: string;
  type: string;
  image: string;
  root_pass: string;
  authorized_keys?: string[];
  metadata: {
    user_data: string;
  };
  booted: boolean;
  backups_enabled: boolean;
  private_ip: boolean;
}

// ─── Client ─────────────────────────────────────────────────────────────────

/** First `errors[].reason` of a Linode error body, if it has one. */
export function errorReason(body: string): string | null {
  return parseJsonWith(body, ErrorBodySchema)?.errors[0]?.reason ?? null;
}

export interface LinodeClientOptions {
  apiBase: string;
  timeoutMs: number;
}

export class LinodeClient {
  constructor(
    private readonly token: string,
    private readonly opts: LinodeClientOptions,
  ) {}

  /**
   * One authenticated request. Non-2xx, empty bodies, transport failures and
   * bodies that fail `schema` all raise ApiError with the raw body attached.
   */
  async request<S extends AnySchema>(
    method: "GET" | "POST" | "DELETE",
    endpoint: string,
    schema: S,
    body?: unknown,
  ): Promise<v.InferOutput<S>> {
    const init: RequestInit = {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let resp: Response;
    let text: string;
    try {
      resp = await fetch(`${this.opts.apiBase}${endpoint}`, init);
      text = await resp.text();
    } catch (err) {
      throw new ApiError(0, "", `${method} ${endpoint} failed: ${errorMessage(err)}`, endpoint);
    }

    if (!resp.ok) {
      const reason = errorReason(text);
      throw new ApiError(
        resp.status,
        text,
        reason ? `${method} ${endpoint}: ${reason}` : `${method} ${endpoint} failed with ${resp.status}`,
        endpoint,
      );
    }
    if (text.trim() === "") {
      throw new ApiError(resp.status, text, `${method} ${endpoint} returned an empty body`, endpoint);
    }
    const data = parseJsonWith(text, schema);
    if (data === null) {
      throw new ApiError(resp.status, text, `${method} ${endpoint} returned an unexpected response`, endpoint);
    }
    return data;
  }

  getProfile() {
    return this.request("GET", "/profile", ProfileSchema);
  }

  getAvailabilityPage(page: number, pageSize = 500) {
    return this.request("GET", `/regions/availability?page_size=${pageSize}&page=${page}`, AvailabilityPageSchema);
  }

  getTypes() {
    return this.request("GET", "/linode/types", TypesSchema);
  }

  getRegions() {
    return this.request("GET", "/regions", RegionsSchema);
  }

  createInstance(body: CreateInstanceBody) {
    return this.request("POST", "/linode/instances", InstanceSchema, body);
  }

  getInstance(id: number) {
    return this.request("GET", `/linode/instances/${id}`, InstanceSchema);
  }

  async deleteInstance(id: number): Promise<void> {
    await this.request("DELETE", `/linode/instances/${id}`, EmptySchema);
  }
}
