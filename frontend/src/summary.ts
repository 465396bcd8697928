import type { Facility } from "./types";

export interface ResultSummary {
  facilities: number;
  freePlaces: number;
  cities: number;
  regions: number;
}

export function summarize(results: readonly Facility[]): ResultSummary {
  return {
    facilities: results.length,
    freePlaces: results.reduce((sum, f) => sum + f.freie_plaetze, 0),
    cities: new Set(results.map((f) => f.stadt)).size,
    regions: new Set(results.map((f) => f.bundesland)).size,
  };
}
