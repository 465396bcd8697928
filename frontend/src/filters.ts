import { CONFIRMATION_FLAG } from "./config";
import { facilityPosition, haversineKm } from "./geo";
import { comparePrimitive } from "./sort";
import type { Facility, FacilityResult, FilterCriteria, FilterOptions } from "./types";

export const EMPTY_CRITERIA: FilterCriteria = Object.freeze({
  freeNow: false,
  availableBy: null,
  minMonths: null,
  regions: [],
  subRegions: [],
  radius: null,
  ageRange: null,
  crisisPlacement: false,
  intakeTypes: [],
  careForms: [],
  genders: [],
  schoolForms: [],
  facilityTypes: [],
  operators: [],
  confirmation: "any",
  contactWindows: [],
  requiredFlags: [],
});

/** What the sidebar shows on first load and after a reset. */
export const INITIAL_CRITERIA: FilterCriteria = Object.freeze({ ...EMPTY_CRITERIA, freeNow: true });

// ---------------------------------------------------------------------------
// Predicate registry
// ---------------------------------------------------------------------------

export interface FilterDefinition<V> {
  /** False when the control sits at its neutral value. */
  isActive(value: V): boolean;
  matches(facility: Facility, value: V): boolean;
}

/** Radius search is not a plain predicate: it annotates and reorders. */
export type FilterKey = Exclude<keyof FilterCriteria, "radius">;

type FilterRegistry = { readonly [K in FilterKey]: FilterDefinition<FilterCriteria[K]> };

type Predicate = (facility: Facility) => boolean;

function nonEmpty(list: readonly unknown[]): boolean {
  return list.length > 0;
}

function checkbox(test: Predicate): FilterDefinition<boolean> {
  return { isActive: (on) => on, matches: (f) => test(f) };
}

function memberOf(get: (f: Facility) => string | null): FilterDefinition<readonly string[]> {
  return {
    isActive: nonEmpty,
    matches: (f, selection) => {
      const value = get(f);
      return value != null && selection.includes(value);
    },
  };
}

function tagOverlap(get: (f: Facility) => readonly string[]): FilterDefinition<readonly string[]> {
  return {
    isActive: nonEmpty,
    matches: (f, selection) => get(f).some((tag) => selection.includes(tag)),
  };
}

export const FILTERS: FilterRegistry = {
  freeNow: checkbox((f) => f.freie_plaetze_jetzt),
  // ISO dates compare correctly as strings.
  availableBy: {
    isActive: (date) => date != null,
    matches: (f, date) => date == null || f.verfuegbar_ab <= date,
  },
  minMonths: {
    isActive: (months) => months != null && months > 1,
    matches: (f, months) => months == null || f.verfuegbar_monate >= months,
  },
  regions: memberOf((f) => f.bundesland),
  subRegions: memberOf((f) => f.landkreis),
  ageRange: {
    isActive: (range) => range != null,
    matches: (f, range) => range == null || (f.alter_max >= range.min && f.alter_min <= range.max),
  },
  crisisPlacement: checkbox((f) => f.krisenplatz || f.notaufnahme_24_7),
  intakeTypes: tagOverlap((f) => f.aufnahmeart),
  careForms: tagOverlap((f) => f.hilfeform),
  genders: memberOf((f) => f.geschlecht),
  schoolForms: tagOverlap((f) => f.schulform_unterstuetzung),
  facilityTypes: memberOf((f) => f.einrichtungstyp),
  operators: memberOf((f) => f.traeger),
  confirmation: {
    isActive: (tier) => tier !== "any",
    matches: (f, tier) => tier === "any" || f[CONFIRMATION_FLAG[tier]],
  },
  contactWindows: memberOf((f) => f.kontaktzeitfenster),
  requiredFlags: {
    isActive: nonEmpty,
    matches: (f, flags) => flags.every((flag) => f[flag]),
  },
};

/** Evaluation order; cheap checks first. */
export const FILTER_ORDER: readonly FilterKey[] = [
  "freeNow",
  "availableBy",
  "minMonths",
  "regions",
  "subRegions",
  "ageRange",
  "crisisPlacement",
  "intakeTypes",
  "careForms",
  "genders",
  "schoolForms",
  "facilityTypes",
  "operators",
  "confirmation",
  "contactWindows",
  "requiredFlags",
];

function activePredicate<K extends FilterKey>(key: K, criteria: FilterCriteria): Predicate | null {
  const definition: FilterDefinition<FilterCriteria[K]> = FILTERS[key];
  const value = criteria[key];
  if (!definition.isActive(value)) return null;
  return (f) => definition.matches(f, value);
}

export function activeFilterKeys(criteria: FilterCriteria): FilterKey[] {
  return FILTER_ORDER.filter((key) => activePredicate(key, criteria) != null);
}

export function activeFilterCount(criteria: FilterCriteria): number {
  return activeFilterKeys(criteria).length + (criteria.radius ? 1 : 0);
}

export function isCriteriaActive(criteria: FilterCriteria): boolean {
  return activeFilterCount(criteria) > 0;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Keep every facility that passes all active filters. With a radius search
 * the survivors carry `distance_km` and come back nearest first; equal
 * distances keep catalog order.
 */
export function applyFilters(catalog: readonly Facility[], criteria: FilterCriteria): FacilityResult[] {
  const predicates = FILTER_ORDER.map((key) => activePredicate(key, criteria)).filter(
    (p): p is Predicate => p != null,
  );
  const radius = criteria.radius;
  const results: FacilityResult[] = [];

  for (const facility of catalog) {
    if (!predicates.every((p) => p(facility))) continue;

    if (radius == null) {
      results.push({ ...facility, distance_km: null });
      continue;
    }

    const distance = haversineKm(radius.center, facilityPosition(facility));
    if (distance <= radius.km) results.push({ ...facility, distance_km: distance });
  }

  if (radius != null) {
    results.sort((a, b) => comparePrimitive(a.distance_km, b.distance_km, true));
  }
  return results;
}

// ---------------------------------------------------------------------------
// Options and criteria updates
// ---------------------------------------------------------------------------

function uniqueSorted(values: Iterable<string | null>): string[] {
  const set = new Set<string>();
  for (const v of values) if (v) set.add(v);
  return [...set].sort((a, b) => a.localeCompare(b, "de"));
}

export function deriveFilterOptions(catalog: readonly Facility[]): FilterOptions {
  let minAge = Infinity;
  let maxAge = -Infinity;
  let maxMonths = 1;
  for (const f of catalog) {
    minAge = Math.min(minAge, f.alter_min);
    maxAge = Math.max(maxAge, f.alter_max);
    maxMonths = Math.max(maxMonths, f.verfuegbar_monate);
  }

  return {
    regions: uniqueSorted(catalog.map((f) => f.bundesland)),
    facilityTypes: uniqueSorted(catalog.map((f) => f.einrichtungstyp)),
    contactWindows: uniqueSorted(catalog.map((f) => f.kontaktzeitfenster)),
    schoolForms: uniqueSorted(catalog.flatMap((f) => f.schulform_unterstuetzung)),
    ageBounds: catalog.length ? { min: minAge, max: maxAge } : { min: 0, max: 0 },
    maxMonths,
  };
}

/** Sub-regions of the selected regions, or of the whole catalog when none is selected. */
export function subRegionOptions(catalog: readonly Facility[], regions: readonly string[]): string[] {
  const scoped = regions.length ? catalog.filter((f) => regions.includes(f.bundesland)) : catalog;
  return uniqueSorted(scoped.map((f) => f.landkreis));
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const CRITERIA_KEYS = Object.keys(EMPTY_CRITERIA).filter((k): k is keyof FilterCriteria => k in EMPTY_CRITERIA);

function copyDefined<K extends keyof FilterCriteria>(
  target: Partial<Mutable<FilterCriteria>>,
  source: Partial<FilterCriteria>,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/** Keys explicitly set to `undefined` keep their current value. */
function definedOnly(partial: Partial<FilterCriteria>): Partial<FilterCriteria> {
  const out: Partial<Mutable<FilterCriteria>> = {};
  for (const key of CRITERIA_KEYS) copyDefined(out, partial, key);
  return out;
}

/**
 * Merge a partial change into a new snapshot. Sub-region selections that the
 * selected regions no longer offer are dropped.
 */
export function updateCriteria(
  catalog: readonly Facility[],
  current: FilterCriteria,
  partial: Partial<FilterCriteria>,
): FilterCriteria {
  const merged: FilterCriteria = { ...current, ...definedOnly(partial) };
  if (!merged.subRegions.length) return Object.freeze(merged);

  const offered = subRegionOptions(catalog, merged.regions);
  return Object.freeze({ ...merged, subRegions: merged.subRegions.filter((s) => offered.includes(s)) });
}
