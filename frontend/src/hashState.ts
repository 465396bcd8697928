import { INITIAL_CRITERIA } from "./filters";
import {
  FACILITY_FLAGS,
  type ConfirmationTier,
  type FacilityFlag,
  type FilterCriteria,
  type ViewTab,
} from "./types";

export interface HashState {
  zoom?: number;
  lat?: number;
  lng?: number;
  filters?: Partial<FilterCriteria>;
  detail?: number;
  tab?: ViewTab;
}

/** Multi-select criteria and their repeated query keys. */
const LIST_PARAMS = {
  regions: "bl",
  subRegions: "lk",
  intakeTypes: "aufn",
  careForms: "hilfe",
  genders: "geschl",
  schoolForms: "sf",
  facilityTypes: "etyp",
  operators: "traeg",
  contactWindows: "kontakt",
} as const satisfies Partial<Record<keyof FilterCriteria, string>>;

type ListKey = keyof typeof LIST_PARAMS;

const LIST_KEYS = Object.keys(LIST_PARAMS).filter((k): k is ListKey => k in LIST_PARAMS);

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const TIERS: readonly ConfirmationTier[] = ["any", "24h", "3d", "7d"];
const TABS: readonly ViewTab[] = ["cards", "map", "table"];

function isFlag(value: string): value is FacilityFlag {
  return FACILITY_FLAGS.some((f) => f === value);
}

function isTier(value: string): value is ConfirmationTier {
  return TIERS.some((t) => t === value);
}

function isTab(value: string): value is ViewTab {
  return TABS.some((t) => t === value);
}

/**
 * Hash format:  #z/lat/lng?key=val&key=val
 * Map portion is optional; if absent the app uses its default view.
 * Filters equal to their initial value are left out.
 */
export function parseHash(hash: string): HashState {
  const raw = hash.replace(/^#/, "");
  if (!raw) return {};

  const [pathPart, queryPart] = splitOnce(raw, "?");
  const state: HashState = {};

  if (pathPart) {
    const [zStr, latStr, lngStr] = pathPart.split("/");
    const z = safeNum(zStr ?? null);
    const lat = safeNum(latStr ?? null);
    const lng = safeNum(lngStr ?? null);
    if (z != null && lat != null && lng != null) {
      state.zoom = z;
      state.lat = lat;
      state.lng = lng;
    }
  }

  if (!queryPart) return state;

  const params = new URLSearchParams(queryPart);
  const filters: Partial<Mutable<FilterCriteria>> = {};
  const assign = <K extends keyof FilterCriteria>(key: K, value: FilterCriteria[K]): void => {
    filters[key] = value;
  };

  if (params.has("frei")) assign("freeNow", params.get("frei") === "1");

  const availableBy = params.get("ab");
  if (availableBy) assign("availableBy", availableBy);

  const minMonths = safeNum(params.get("mon"));
  if (minMonths != null) assign("minMonths", minMonths);

  for (const key of LIST_KEYS) {
    const values = params.getAll(LIST_PARAMS[key]).filter(Boolean);
    if (values.length) assign(key, values);
  }

  const radius = params.get("umkreis")?.split(",").map((s) => safeNum(s));
  if (radius?.length === 3) {
    const [lat, lng, km] = radius;
    if (lat != null && lng != null && km != null) assign("radius", { center: { lat, lng }, km });
  }

  const age = params.get("alter")?.split("-").map((s) => safeNum(s));
  if (age?.length === 2) {
    const [min, max] = age;
    if (min != null && max != null && min <= max) assign("ageRange", { min, max });
  }

  if (params.get("krise") === "1") assign("crisisPlacement", true);

  const tier = params.get("best");
  if (tier && isTier(tier)) assign("confirmation", tier);

  const flags = params.getAll("flag").filter(isFlag);
  if (flags.length) assign("requiredFlags", flags);

  if (Object.keys(filters).length) state.filters = filters;

  const detail = safeNum(params.get("detail"));
  if (detail != null && Number.isInteger(detail)) state.detail = detail;

  const tab = params.get("tab");
  if (tab && isTab(tab)) state.tab = tab;

  return state;
}

export function formatHash(state: HashState): string {
  const mapPart =
    state.zoom != null && state.lat != null && state.lng != null
      ? `${state.zoom}/${round6(state.lat)}/${round6(state.lng)}`
      : "";

  const params = new URLSearchParams();
  const f = state.filters;
  if (f) {
    if (f.freeNow != null && f.freeNow !== INITIAL_CRITERIA.freeNow) params.set("frei", f.freeNow ? "1" : "0");
    if (f.availableBy) params.set("ab", f.availableBy);
    if (f.minMonths != null && f.minMonths > 1) params.set("mon", String(f.minMonths));
    for (const key of LIST_KEYS) {
      for (const value of f[key] ?? []) params.append(LIST_PARAMS[key], value);
    }
    if (f.radius) {
      const { center, km } = f.radius;
      params.set("umkreis", `${round6(center.lat)},${round6(center.lng)},${km}`);
    }
    if (f.ageRange) params.set("alter", `${f.ageRange.min}-${f.ageRange.max}`);
    if (f.crisisPlacement) params.set("krise", "1");
    if (f.confirmation && f.confirmation !== "any") params.set("best", f.confirmation);
    for (const flag of f.requiredFlags ?? []) params.append("flag", flag);
  }
  if (state.detail != null) params.set("detail", String(state.detail));
  if (state.tab != null) params.set("tab", state.tab);

  const query = params.toString();
  return mapPart + (query ? `?${query}` : "");
}

export function readHash(): HashState {
  return parseHash(location.hash);
}

export function writeHash(state: HashState): void {
  const hash = formatHash(state);
  if (hash) {
    history.replaceState(null, "", `#${hash}`);
  } else {
    history.replaceState(null, "", location.pathname + location.search);
  }
}

let pending: ReturnType<typeof setTimeout> | null = null;

/** Debounced writeHash; coalesces rapid calls (e.g. during map pan). */
export function writeHashDebounced(state: HashState, ms = 150): void {
  if (pending != null) clearTimeout(pending);
  pending = setTimeout(() => {
    pending = null;
    writeHash(state);
  }, ms);
}

function splitOnce(s: string, sep: string): [string, string] {
  const idx = s.indexOf(sep);
  return idx === -1 ? [s, ""] : [s.slice(0, idx), s.slice(idx + 1)];
}

function safeNum(v: string | null): number | undefined {
  if (v == null || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function round6(v: number): string {
  return v.toFixed(6);
}
