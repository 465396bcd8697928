import { CatalogError, normalizeFacility } from "./converters";
import type { AppConfig, Facility, FacilityRaw } from "./types";

export async function fetchJson<T>(url: string): Promise<T> {
  const res = await fetch(url);
  if (!res.ok) throw new Error(`Failed to load ${url}: ${res.status}`);
  return res.json() as Promise<T>;
}

export async function loadConfig(base: string): Promise<AppConfig> {
  try {
    return await fetchJson<AppConfig>(`${base}data/config.json`);
  } catch (err: unknown) {
    console.warn("No data/config.json, using defaults:", err);
    return {};
  }
}

/**
 * Read-only facility catalog. Records are frozen on construction and the
 * store never changes afterwards.
 */
export class FacilityStore {
  readonly all: readonly Facility[];
  private readonly byId: ReadonlyMap<number, Facility>;

  constructor(facilities: readonly Facility[]) {
    const byId = new Map<number, Facility>();
    for (const f of facilities) {
      if (byId.has(f.id)) throw new CatalogError(`Duplicate facility id ${f.id}`);
      byId.set(f.id, Object.freeze(f));
    }
    this.byId = byId;
    this.all = Object.freeze([...byId.values()]);
  }

  static fromRaw(records: readonly FacilityRaw[]): FacilityStore {
    return new FacilityStore(records.map((r, i) => normalizeFacility(r, i)));
  }

  get size(): number {
    return this.all.length;
  }

  get(id: number): Facility | undefined {
    return this.byId.get(id);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }
}

export async function loadCatalog(base: string): Promise<FacilityStore> {
  const records = await fetchJson<unknown>(`${base}data/facilities.json`);
  if (!Array.isArray(records)) throw new CatalogError("data/facilities.json must contain an array");
  return FacilityStore.fromRaw(records);
}
