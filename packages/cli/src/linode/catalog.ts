// linode/catalog.ts — Availability catalog: parallel fetch, merge, filter, sort

import { type Result, settle, unwrap } from "@llm-quickstart/shared";
import { ApiError } from "../errors";
import { logWarn } from "../shared/ui";
import type { AvailabilityPage, AvailabilityRecord, LinodeClient, LinodeRegion, LinodeType } from "./linode";

export interface InstanceTypeInfo {
  id: string;
  label: string;
  vcpus: number;
  /** MB */
  memory: number;
  gpuCount: number;
  priceHourly: number;
  priceMonthly: number;
}

export interface RegionAvailability {
  id: string;
  label: string;
  availableInstanceTypeIds: ReadonlySet<string>;
}

export interface AvailabilityCatalog {
  readonly instanceTypes: readonly InstanceTypeInfo[];
  readonly regions: readonly RegionAvailability[];
}

/** An availability record that names a plan. */
export interface PlanAvailability {
  region: string;
  plan: string;
  available: boolean;
}

export interface CatalogOptions {
  familyPrefix: string;
  /** Availability pages requested concurrently. */
  pages: number;
}

// ─── Sort keys ──────────────────────────────────────────────────────────────

const SIZE_RANKS: [suffix: string, rank: number][] = [
  ["-s", 1],
  ["-m", 2],
  ["-l", 3],
  ["-xl", 4],
  ["-hs", 5],
];

/** Parallel GPU count encoded as `a<N>` in the plan id (`g2-gpu-rtx4000a2-m` → 2). */
export function gpuCountOf(id: string): number {
  const m = /a(\d+)/.exec(id);
  return m ? Number(m[1]) : 0;
}

/** Size rank from the suffix token; unknown suffixes sort last. */
export function sizeRankOf(id: string): number {
  return SIZE_RANKS.find(([suffix]) => id.endsWith(suffix))?.[1] ?? 9;
}

export function compareInstanceTypes(a: { id: string }, b: { id: string }): number {
  return (
    gpuCountOf(a.id) - gpuCountOf(b.id) ||
    sizeRankOf(a.id) - sizeRankOf(b.id) ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

// ─── Merge ──────────────────────────────────────────────────────────────────

/**
 * Union of availability records across pages, one per (region, plan).
 * A pair is available when any copy says so. Records without a plan are
 * skipped. Output is sorted by region, then plan.
 */
export function mergeAvailability(pages: readonly (readonly AvailabilityRecord[])[]): PlanAvailability[] {
  const byPair = new Map<string, PlanAvailability>();
  for (const page of pages) {
    for (const rec of page) {
      if (rec.plan === null) {
        continue;
      }
      const key = `${rec.region}\u0000${rec.plan}`;
      const seen = byPair.get(key);
      byPair.set(key, {
        region: rec.region,
        plan: rec.plan,
        available: rec.available || (seen?.available ?? false),
      });
    }
  }
  return [...byPair.values()].sort((a, b) =>
    a.region === b.region ? (a.plan < b.plan ? -1 : a.plan > b.plan ? 1 : 0) : a.region < b.region ? -1 : 1,
  );
}

function toInstanceType(t: LinodeType): InstanceTypeInfo {
  return {
    id: t.id,
    label: t.label,
    vcpus: t.vcpus,
    memory: t.memory,
    gpuCount: t.gpus > 0 ? t.gpus : gpuCountOf(t.id),
    priceHourly: t.price.hourly ?? 0,
    priceMonthly: t.price.monthly ?? 0,
  };
}

/** Join the three datasets into a frozen catalog. Pure; used by fetchCatalog. */
export function buildCatalog(
  availability: readonly PlanAvailability[],
  types: readonly LinodeType[],
  regions: readonly LinodeRegion[],
  familyPrefix: string,
): AvailabilityCatalog {
  const instanceTypes = types
    .filter((t) => t.id.startsWith(familyPrefix))
    .map(toInstanceType)
    .sort(compareInstanceTypes);
  const known = new Set(instanceTypes.map((t) => t.id));

  const availableByRegion = new Map<string, Set<string>>();
  for (const rec of availability) {
    if (!rec.available || !known.has(rec.plan)) {
      continue;
    }
    const set = availableByRegion.get(rec.region) ?? new Set<string>();
    set.add(rec.plan);
    availableByRegion.set(rec.region, set);
  }

  const regionList: RegionAvailability[] = [...regions]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .flatMap((r) => {
      const ids = availableByRegion.get(r.id);
      if (!ids || ids.size === 0) {
        return [];
      }
      const sorted = new Set([...ids].sort((a, b) => compareInstanceTypes({ id: a }, { id: b })));
      return [
        Object.freeze({
          id: r.id,
          label: r.label,
          availableInstanceTypeIds: sorted,
        }),
      ];
    });

  return Object.freeze({
    instanceTypes: Object.freeze(instanceTypes.map((t) => Object.freeze(t))),
    regions: Object.freeze(regionList),
  });
}

// ─── Fetch ──────────────────────────────────────────────────────────────────

type CatalogSource = Pick<LinodeClient, "getAvailabilityPage" | "getTypes" | "getRegions">;

/**
 * Fire every read concurrently, join once, and fail if any slot failed.
 * A partial catalog is never returned.
 */
export async function fetchCatalog(client: CatalogSource, opts: CatalogOptions): Promise<AvailabilityCatalog> {
  const pageNumbers = Array.from(
    {
      length: opts.pages,
    },
    (_, i) => i + 1,
  );

  const [pageSlots, typesSlot, regionsSlot] = await Promise.all([
    Promise.all(pageNumbers.map((n) => settle(() => client.getAvailabilityPage(n)))),
    settle(() => client.getTypes()),
    settle(() => client.getRegions()),
  ]);

  const failed: Result<unknown>[] = [...pageSlots, typesSlot, regionsSlot].filter((r) => !r.ok);
  if (failed.length > 0) {
    const first = failed[0];
    if (!first.ok && first.error instanceof ApiError) {
      throw first.error;
    }
    const detail = failed.map((r) => (r.ok ? "" : r.error.message)).join("; ");
    throw new ApiError(0, "", `Catalog fetch failed (${failed.length} of ${pageSlots.length + 2} calls): ${detail}`);
  }

  const pages: AvailabilityPage[] = pageSlots.map(unwrap);
  const reported = pages[0]?.pages ?? 0;
  if (reported > opts.pages) {
    logWarn(`Availability has ${reported} pages but only ${opts.pages} were fetched; some regions may be missing`);
  }

  return buildCatalog(
    mergeAvailability(pages.map((p) => p.data)),
    unwrap(typesSlot).data,
    unwrap(regionsSlot).data,
    opts.familyPrefix,
  );
}

/** Plain-JSON view of a catalog (sets become sorted arrays). */
export function catalogToJson(catalog: AvailabilityCatalog): unknown {
  return {
    instance_types: catalog.instanceTypes,
    regions: catalog.regions.map((r) => ({
      id: r.id,
      label: r.label,
      available_instance_type_ids: [...r.availableInstanceTypeIds],
    })),
  };
}
