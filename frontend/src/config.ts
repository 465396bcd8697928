import type { ConfirmationTier, FacilityFlag, Gender, LatLng, Operator } from "./types";

/** Geographic center of Germany. */
export const DEFAULT_CENTER: LatLng = { lat: 51.1657, lng: 10.4515 };

export const RADIUS_KM = { min: 5, max: 500, initial: 100 } as const;

export const INQUIRY_AGE = { min: 6, max: 25, initial: 14 } as const;

export const EARTH_RADIUS_KM = 6371;

export const FREE_COLOR = "#2e7d32";
export const FULL_COLOR = "#c62828";

export function availabilityColor(freePlaces: number): string {
  return freePlaces > 0 ? FREE_COLOR : FULL_COLOR;
}

export const GENDER_OPTIONS: readonly Gender[] = ["Mädchen", "Jungen", "offen", "divers"];

export const OPERATOR_OPTIONS: readonly Operator[] = ["öffentlich", "frei gemeinnützig", "privat"];

export const INTAKE_TYPE_OPTIONS = ["kurzfristig", "mittel", "langfristig"] as const;

export const CARE_FORM_OPTIONS = [
  "stationär",
  "betreute Wohngruppe",
  "intensivpädagogisch",
  "betreutes Wohnen",
] as const;

export const CONFIRMATION_OPTIONS: readonly { value: ConfirmationTier; label: string }[] = [
  { value: "any", label: "egal" },
  { value: "24h", label: "24 Stunden" },
  { value: "3d", label: "3 Tagen" },
  { value: "7d", label: "7 Tagen" },
];

export const CONFIRMATION_FLAG: Record<Exclude<ConfirmationTier, "any">, FacilityFlag> = {
  "24h": "platz_bestaetigt_24h",
  "3d": "platz_bestaetigt_3d",
  "7d": "platz_bestaetigt_7d",
};

export interface FlagGroup {
  title: string;
  flags: readonly { flag: FacilityFlag; label: string }[];
}

/** Checkbox groups of the "Erweiterte Filter" section, in display order. */
export const FLAG_GROUPS: readonly FlagGroup[] = [
  {
    title: "Hilfeform und Setting",
    flags: [
      { flag: "einzelplatz_moeglich", label: "Einzelplatz möglich" },
      { flag: "kleingruppe", label: "Kleingruppe" },
    ],
  },
  {
    title: "Ausschluss und Mindestkriterien",
    flags: [
      { flag: "keine_gewaltproblematik", label: "Keine Gewaltproblematik" },
      { flag: "keine_suchtthematik", label: "Keine Suchtthematik" },
      { flag: "schulbesuch_moeglich", label: "Schulbesuch möglich" },
      { flag: "haustiere_erlaubt", label: "Haustiere erlaubt" },
    ],
  },
  {
    title: "Spezialisierungen",
    flags: [
      { flag: "traumapaedagogik", label: "Traumapädagogik" },
      { flag: "psychiatrienahe_betreuung", label: "Psychiatrienahe Betreuung" },
      { flag: "autismus", label: "Autismus" },
      { flag: "geistige_behinderung", label: "Geistige Behinderung" },
      { flag: "koerperliche_einschraenkungen", label: "Körperliche Einschränkungen" },
      { flag: "deutschkenntnisse_erforderlich", label: "Deutschkenntnisse erforderlich" },
      { flag: "sprachunterstuetzung", label: "Sprachunterstützung vorhanden" },
    ],
  },
  {
    title: "Betreuungskapazität und Personal",
    flags: [
      { flag: "eins_zu_eins_moeglich", label: "1:1 möglich" },
      { flag: "nachtbereitschaft", label: "Nachtbereitschaft" },
      { flag: "nachtdienst", label: "Nachtdienst" },
      { flag: "deeskalationserfahrung", label: "Deeskalationserfahrung" },
    ],
  },
];

/** Flags listed under "Spezialisierungen" on the detail page. */
export const SPECIALIZATION_LABELS: readonly { flag: FacilityFlag; label: string }[] = [
  { flag: "traumapaedagogik", label: "Traumapädagogik" },
  { flag: "psychiatrienahe_betreuung", label: "Psychiatrienahe Betreuung" },
  { flag: "autismus", label: "Autismus" },
  { flag: "geistige_behinderung", label: "Geistige Behinderung" },
  { flag: "koerperliche_einschraenkungen", label: "Körperliche Einschränkungen" },
  { flag: "sprachunterstuetzung", label: "Sprachunterstützung" },
];

export const MESSAGES = {
  notFound: "Eintrag nicht gefunden.",
  noResults: "Keine Einrichtungen gefunden. Bitte passen Sie die Filter an.",
  requiredFields: "Bitte füllen Sie alle Pflichtfelder (*) aus.",
  sendFailed: "Die Anfrage konnte nicht gesendet werden. Bitte versuchen Sie es später erneut.",
  bootFailed: "Die Einrichtungsdaten konnten nicht geladen werden.",
} as const;
