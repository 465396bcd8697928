import { FacilityStore } from "../catalog";
import { normalizeFacility } from "../converters";
import type { Facility, FacilityRaw, FacilityResult } from "../types";

export const BASE_RAW: FacilityRaw = {
  id: 1,
  name: "Testheim",
  stadt: "Teststadt",
  bundesland: "Berlin",
  landkreis: "Mitte",
  adresse: "Teststraße 1, 10115 Berlin",
  latitude: 52.52,
  longitude: 13.405,
  freie_plaetze: 1,
  freie_plaetze_jetzt: true,
  reservierbar: false,
  verfuegbar_ab: "2026-11-01",
  verfuegbar_monate: 6,
  alter_min: 12,
  alter_max: 17,
  geschlecht: "offen",
  betreuungsart: "Wohngruppe",
  hilfeform: ["stationär"],
  aufnahmeart: ["kurzfristig"],
  schulform_unterstuetzung: [],
  einrichtungstyp: "Wohngruppe",
  traeger: "öffentlich",
  kontaktzeitfenster: "werktags 9–16 Uhr",
  kontakt_email: "kontakt@testheim.example.org",
  kontakt_telefon: "+49 30 0000000",
};

export function makeFacility(overrides: Partial<Facility> = {}): Facility {
  return { ...normalizeFacility(BASE_RAW, 0), ...overrides };
}

export function makeResult(overrides: Partial<FacilityResult> = {}): FacilityResult {
  return { ...makeFacility(overrides), distance_km: overrides.distance_km ?? null };
}

export function makeStore(...overrides: Partial<Facility>[]): FacilityStore {
  return new FacilityStore(overrides.map((o, i) => makeFacility({ id: i + 1, ...o })));
}
