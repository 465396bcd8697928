export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

export const FACILITY_FLAGS = [
  "inobhutnahme_geeignet",
  "krisenplatz",
  "notaufnahme_24_7",
  "einzelplatz_moeglich",
  "kleingruppe",
  "keine_gewaltproblematik",
  "keine_suchtthematik",
  "schulbesuch_moeglich",
  "haustiere_erlaubt",
  "traumapaedagogik",
  "psychiatrienahe_betreuung",
  "autismus",
  "geistige_behinderung",
  "koerperliche_einschraenkungen",
  "deutschkenntnisse_erforderlich",
  "sprachunterstuetzung",
  "eins_zu_eins_moeglich",
  "nachtbereitschaft",
  "nachtdienst",
  "deeskalationserfahrung",
  "platz_bestaetigt_24h",
  "platz_bestaetigt_3d",
  "platz_bestaetigt_7d",
] as const;

export type FacilityFlag = (typeof FACILITY_FLAGS)[number];

export type Gender = "Mädchen" | "Jungen" | "offen" | "divers";
export type Operator = "öffentlich" | "frei gemeinnützig" | "privat";

type Loose<T> = T | string | null;

/** Shape of one entry in data/facilities.json before normalization. */
export type FacilityRaw = {
  id?: Loose<number>;
  name?: string;
  stadt?: string;
  bundesland?: string;
  landkreis?: string | null;
  adresse?: string;
  latitude?: Loose<number>;
  longitude?: Loose<number>;
  freie_plaetze?: Loose<number>;
  freie_plaetze_jetzt?: Loose<boolean>;
  reservierbar?: Loose<boolean>;
  verfuegbar_ab?: string;
  verfuegbar_monate?: Loose<number>;
  alter_min?: Loose<number>;
  alter_max?: Loose<number>;
  geschlecht?: string | null;
  betreuungsart?: string;
  hilfeform?: string[] | string | null;
  aufnahmeart?: string[] | string | null;
  schulform_unterstuetzung?: string[] | string | null;
  raumgroesse_qm?: Loose<number>;
  einrichtungstyp?: string;
  traeger?: string;
  kontaktzeitfenster?: string | null;
  kontakt_email?: string;
  kontakt_telefon?: string;
  bild_url?: string | null;
  beschreibung?: string | null;
} & { [K in FacilityFlag]?: Loose<boolean> };

export type Facility = {
  readonly id: number;
  readonly name: string;
  readonly stadt: string;
  readonly bundesland: string;
  readonly landkreis: string | null;
  readonly adresse: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly freie_plaetze: number;
  readonly freie_plaetze_jetzt: boolean;
  readonly reservierbar: boolean;
  /** ISO date, YYYY-MM-DD. */
  readonly verfuegbar_ab: string;
  readonly verfuegbar_monate: number;
  readonly alter_min: number;
  readonly alter_max: number;
  readonly geschlecht: Gender;
  readonly betreuungsart: string;
  readonly hilfeform: readonly string[];
  readonly aufnahmeart: readonly string[];
  readonly schulform_unterstuetzung: readonly string[];
  readonly raumgroesse_qm: number | null;
  readonly einrichtungstyp: string;
  readonly traeger: Operator;
  readonly kontaktzeitfenster: string | null;
  readonly kontakt_email: string;
  readonly kontakt_telefon: string;
  readonly bild_url: string;
  readonly beschreibung: string;
} & { readonly [K in FacilityFlag]: boolean };

export type FacilityResult = Facility & {
  /** Set only while a radius search is active. */
  readonly distance_km: number | null;
};

export interface RadiusSearch {
  readonly center: LatLng;
  readonly km: number;
}

export interface AgeRange {
  readonly min: number;
  readonly max: number;
}

export type ConfirmationTier = "any" | "24h" | "3d" | "7d";

export interface FilterCriteria {
  readonly freeNow: boolean;
  readonly availableBy: string | null;
  readonly minMonths: number | null;
  readonly regions: readonly string[];
  readonly subRegions: readonly string[];
  readonly radius: RadiusSearch | null;
  readonly ageRange: AgeRange | null;
  /** Crisis placement or 24/7 emergency intake. */
  readonly crisisPlacement: boolean;
  readonly intakeTypes: readonly string[];
  readonly careForms: readonly string[];
  readonly genders: readonly string[];
  readonly schoolForms: readonly string[];
  readonly facilityTypes: readonly string[];
  readonly operators: readonly string[];
  readonly confirmation: ConfirmationTier;
  readonly contactWindows: readonly string[];
  readonly requiredFlags: readonly FacilityFlag[];
}

export interface FilterOptions {
  regions: string[];
  facilityTypes: string[];
  contactWindows: string[];
  schoolForms: string[];
  ageBounds: AgeRange;
  maxMonths: number;
}

export type NavigationState =
  | { readonly page: "overview" }
  | { readonly page: "detail"; readonly facilityId: number };

export type ViewTab = "cards" | "map" | "table";

/** Matches the shape of data/config.json. */
export interface AppConfig {
  center?: LatLng;
  radiusKm?: number;
}
