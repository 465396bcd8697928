import { describe, expect, it } from "vitest";
import {
  activeFilterCount,
  activeFilterKeys,
  applyFilters,
  deriveFilterOptions,
  EMPTY_CRITERIA,
  FILTER_ORDER,
  FILTERS,
  INITIAL_CRITERIA,
  isCriteriaActive,
  subRegionOptions,
  updateCriteria,
} from "./filters";
import { makeFacility } from "./testing/fixtures";
import type { Facility, FilterCriteria } from "./types";

function ids(results: readonly Facility[]): number[] {
  return results.map((f) => f.id);
}

function criteria(partial: Partial<FilterCriteria>): FilterCriteria {
  return { ...EMPTY_CRITERIA, ...partial };
}

const catalog: Facility[] = [
  makeFacility({ id: 1, freie_plaetze_jetzt: false, alter_min: 16, alter_max: 20 }),
  makeFacility({ id: 2, freie_plaetze_jetzt: true, alter_min: 18, alter_max: 25, bundesland: "Bayern" }),
  makeFacility({ id: 3, freie_plaetze_jetzt: false, krisenplatz: true, aufnahmeart: ["kurzfristig", "mittel"] }),
  makeFacility({ id: 4, freie_plaetze_jetzt: true, notaufnahme_24_7: true, platz_bestaetigt_3d: true }),
  makeFacility({ id: 5, freie_plaetze_jetzt: false, aufnahmeart: ["langfristig"], verfuegbar_monate: 12 }),
];

describe("registry", () => {
  it("evaluates every registered filter", () => {
    expect([...FILTER_ORDER].sort()).toEqual(Object.keys(FILTERS).sort());
  });

  it("treats the empty criteria as neutral", () => {
    expect(activeFilterKeys(EMPTY_CRITERIA)).toEqual([]);
    expect(isCriteriaActive(EMPTY_CRITERIA)).toBe(false);
    expect(ids(applyFilters(catalog, EMPTY_CRITERIA))).toEqual([1, 2, 3, 4, 5]);
  });

  it("starts with the free-now filter switched on", () => {
    expect(activeFilterKeys(INITIAL_CRITERIA)).toEqual(["freeNow"]);
  });

  it("counts the radius search as one filter", () => {
    const c = criteria({ freeNow: true, regions: ["Berlin"], radius: { center: { lat: 52, lng: 13 }, km: 50 } });
    expect(activeFilterCount(c)).toBe(3);
  });

  it("does not count a one-month minimum", () => {
    expect(activeFilterKeys(criteria({ minMonths: 1 }))).toEqual([]);
  });
});

describe("applyFilters", () => {
  it("keeps free-now facilities in catalog order", () => {
    expect(ids(applyFilters(catalog, criteria({ freeNow: true })))).toEqual([2, 4]);
  });

  it("matches overlapping age ranges", () => {
    const c = criteria({ ageRange: { min: 12, max: 17 } });
    const result = ids(applyFilters(catalog, c));
    expect(result).toContain(1);
    expect(result).not.toContain(2);
  });

  it("accepts a crisis place or a 24/7 emergency intake", () => {
    expect(ids(applyFilters(catalog, criteria({ crisisPlacement: true })))).toEqual([3, 4]);
  });

  it("matches any overlapping intake type", () => {
    expect(ids(applyFilters(catalog, criteria({ intakeTypes: ["mittel", "langfristig"] })))).toEqual([3, 5]);
  });

  it("requires the flag of the chosen confirmation tier", () => {
    expect(ids(applyFilters(catalog, criteria({ confirmation: "3d" })))).toEqual([4]);
  });

  it("requires every listed flag", () => {
    const c = criteria({ requiredFlags: ["notaufnahme_24_7", "platz_bestaetigt_3d"] });
    expect(ids(applyFilters(catalog, c))).toEqual([4]);
    expect(applyFilters(catalog, criteria({ requiredFlags: ["notaufnahme_24_7", "autismus"] }))).toEqual([]);
  });

  it("includes facilities available on the chosen date", () => {
    const onDate = [makeFacility({ id: 1, verfuegbar_ab: "2026-11-01" })];
    expect(applyFilters(onDate, criteria({ availableBy: "2026-11-01" }))).toHaveLength(1);
    expect(applyFilters(onDate, criteria({ availableBy: "2026-10-31" }))).toHaveLength(0);
  });

  it("filters by minimum months", () => {
    expect(ids(applyFilters(catalog, criteria({ minMonths: 7 })))).toEqual([5]);
  });

  it("combines filters as a conjunction", () => {
    const c = criteria({ freeNow: true, regions: ["Berlin"] });
    expect(ids(applyFilters(catalog, c))).toEqual([4]);
  });

  it("returns a subsequence of the catalog without touching it", () => {
    const before = JSON.stringify(catalog);
    const result = applyFilters(catalog, criteria({ regions: ["Berlin"] }));
    expect(ids(result)).toEqual([1, 3, 4, 5]);
    expect(result[0]).not.toBe(catalog[0]);
    expect(result[0]?.distance_km).toBeNull();
    expect(JSON.stringify(catalog)).toBe(before);
  });

  it("is idempotent", () => {
    const c = criteria({ freeNow: true, radius: { center: { lat: 52.52, lng: 13.405 }, km: 10 } });
    const once = applyFilters(catalog, c);
    expect(applyFilters(once, c)).toEqual(once);
  });
});

describe("facet predicates", () => {
  const facets: Facility[] = [
    makeFacility({
      id: 1,
      landkreis: null,
      hilfeform: ["stationär"],
      geschlecht: "Mädchen",
      schulform_unterstuetzung: ["Grundschule"],
      einrichtungstyp: "Kinderdorf",
      traeger: "privat",
      kontaktzeitfenster: null,
    }),
    makeFacility({
      id: 2,
      landkreis: "Pankow",
      hilfeform: ["betreutes Wohnen", "intensivpädagogisch"],
      geschlecht: "Jungen",
      schulform_unterstuetzung: ["Realschule", "Gymnasium"],
      einrichtungstyp: "Wohngruppe",
      traeger: "öffentlich",
      kontaktzeitfenster: "rund um die Uhr",
    }),
    makeFacility({
      id: 3,
      landkreis: "Mitte",
      hilfeform: [],
      geschlecht: "offen",
      schulform_unterstuetzung: [],
      einrichtungstyp: "Heim",
      traeger: "frei gemeinnützig",
      kontaktzeitfenster: "werktags 9–16 Uhr",
    }),
  ];

  it("matches sub-regions and never a facility without one", () => {
    expect(ids(applyFilters(facets, criteria({ subRegions: ["Pankow"] })))).toEqual([2]);
  });

  it("matches any overlapping care form", () => {
    expect(ids(applyFilters(facets, criteria({ careForms: ["intensivpädagogisch", "stationär"] })))).toEqual([1, 2]);
  });

  it("matches the selected genders", () => {
    expect(ids(applyFilters(facets, criteria({ genders: ["Jungen", "offen"] })))).toEqual([2, 3]);
  });

  it("matches any overlapping school form", () => {
    expect(ids(applyFilters(facets, criteria({ schoolForms: ["Gymnasium"] })))).toEqual([2]);
  });

  it("matches the selected facility types", () => {
    expect(ids(applyFilters(facets, criteria({ facilityTypes: ["Kinderdorf", "Heim"] })))).toEqual([1, 3]);
  });

  it("matches the selected operators", () => {
    expect(ids(applyFilters(facets, criteria({ operators: ["öffentlich"] })))).toEqual([2]);
  });

  it("matches contact windows and never a facility without one", () => {
    const c = criteria({ contactWindows: ["rund um die Uhr", "werktags 9–16 Uhr"] });
    expect(ids(applyFilters(facets, c))).toEqual([2, 3]);
  });

  it("matches a 12 to 17 facility against an overlapping query only", () => {
    const teen = [makeFacility({ alter_min: 12, alter_max: 17 })];
    expect(applyFilters(teen, criteria({ ageRange: { min: 16, max: 20 } }))).toHaveLength(1);
    expect(applyFilters(teen, criteria({ ageRange: { min: 18, max: 25 } }))).toHaveLength(0);
  });
});

describe("radius search", () => {
  const center = { lat: 52, lng: 13 };
  const places = [
    makeFacility({ id: 1, latitude: 52.5, longitude: 13 }),
    makeFacility({ id: 2, latitude: 52.1, longitude: 13 }),
    makeFacility({ id: 3, latitude: 52.5, longitude: 13 }),
    makeFacility({ id: 4, latitude: 60, longitude: 13 }),
  ];

  it("keeps facilities inside the radius, nearest first, ties in catalog order", () => {
    const result = applyFilters(places, criteria({ radius: { center, km: 100 } }));
    expect(ids(result)).toEqual([2, 1, 3]);
    expect(result[0]?.distance_km).toBeCloseTo(11.12, 2);
    expect(result[1]?.distance_km).toBe(result[2]?.distance_km);
  });

  it("includes a facility exactly at the center", () => {
    const result = applyFilters([makeFacility({ latitude: 52, longitude: 13 })], criteria({ radius: { center, km: 5 } }));
    expect(result[0]?.distance_km).toBe(0);
  });
});

describe("options", () => {
  const facilities = [
    makeFacility({ id: 1, bundesland: "Berlin", landkreis: "Mitte", alter_min: 8, verfuegbar_monate: 3 }),
    makeFacility({ id: 2, bundesland: "Bayern", landkreis: "München", alter_max: 21, kontaktzeitfenster: null }),
    makeFacility({ id: 3, bundesland: "Bayern", landkreis: "Augsburg", schulform_unterstuetzung: ["Realschule"] }),
  ];

  it("derives sorted distinct values and bounds", () => {
    expect(deriveFilterOptions(facilities)).toEqual({
      regions: ["Bayern", "Berlin"],
      facilityTypes: ["Wohngruppe"],
      contactWindows: ["werktags 9–16 Uhr"],
      schoolForms: ["Realschule"],
      ageBounds: { min: 8, max: 21 },
      maxMonths: 6,
    });
  });

  it("handles an empty catalog", () => {
    expect(deriveFilterOptions([]).ageBounds).toEqual({ min: 0, max: 0 });
  });

  it("scopes sub-regions to the selected regions", () => {
    expect(subRegionOptions(facilities, ["Bayern"])).toEqual(["Augsburg", "München"]);
    expect(subRegionOptions(facilities, [])).toEqual(["Augsburg", "Mitte", "München"]);
  });

  it("drops sub-regions the selected regions no longer offer", () => {
    const current = criteria({ subRegions: ["Mitte", "München"] });
    const next = updateCriteria(facilities, current, { regions: ["Bayern"] });
    expect(next.subRegions).toEqual(["München"]);
    expect(next.regions).toEqual(["Bayern"]);
    expect(Object.isFrozen(next)).toBe(true);
    expect(current.subRegions).toEqual(["Mitte", "München"]);
  });
});
