import { GENDER_OPTIONS, OPERATOR_OPTIONS } from "./config";
import type { Facility, FacilityRaw, Gender, Operator } from "./types";

/** A seed record that cannot be turned into a Facility. Fatal at boot. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function toNumber(value: number | string | null | undefined): number | null {
  if (value == null || value === "") return null;
  const n = typeof value === "number" ? value : Number(String(value).trim());
  return Number.isFinite(n) ? n : null;
}

export function toBoolean(value: boolean | string | null | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (value == null) return false;
  const s = value.trim().toLowerCase();
  return s === "true" || s === "1" || s === "ja";
}

export function toStringArray(value: readonly string[] | string | null | undefined): string[] {
  if (!value) return [];
  if (Array.isArray(value)) return value.filter((v) => typeof v === "string" && v.trim().length > 0);
  return String(value).split(";").map((s) => s.trim()).filter(Boolean);
}

function optionalString(value: string | null | undefined): string | null {
  const s = value?.trim();
  return s ? s : null;
}

function isGender(value: string): value is Gender {
  return GENDER_OPTIONS.some((g) => g === value);
}

function isOperator(value: string): value is Operator {
  return OPERATOR_OPTIONS.some((o) => o === value);
}

export function normalizeFacility(raw: FacilityRaw, index: number): Facility {
  const where = raw.id != null ? `Facility #${raw.id}` : `Record ${index}`;

  const requireString = (field: keyof FacilityRaw, value: string | undefined): string => {
    const s = value?.trim();
    if (!s) throw new CatalogError(`${where}: missing "${field}"`);
    return s;
  };

  const requireNumber = (field: keyof FacilityRaw, value: number | string | null | undefined): number => {
    const n = toNumber(value);
    if (n == null) throw new CatalogError(`${where}: missing or non-numeric "${field}"`);
    return n;
  };

  const requireInteger = (field: keyof FacilityRaw, value: number | string | null | undefined): number => {
    const n = requireNumber(field, value);
    if (!Number.isInteger(n)) throw new CatalogError(`${where}: "${field}" must be an integer`);
    return n;
  };

  const id = requireInteger("id", raw.id);
  const freePlaces = requireInteger("freie_plaetze", raw.freie_plaetze);
  const months = requireInteger("verfuegbar_monate", raw.verfuegbar_monate);
  const ageMin = requireInteger("alter_min", raw.alter_min);
  const ageMax = requireInteger("alter_max", raw.alter_max);

  if (freePlaces < 0) throw new CatalogError(`${where}: "freie_plaetze" must not be negative`);
  if (months < 1) throw new CatalogError(`${where}: "verfuegbar_monate" must be at least 1`);
  if (ageMin > ageMax) throw new CatalogError(`${where}: "alter_min" exceeds "alter_max"`);

  const availableFrom = requireString("verfuegbar_ab", raw.verfuegbar_ab);
  if (!ISO_DATE.test(availableFrom)) {
    throw new CatalogError(`${where}: "verfuegbar_ab" is not a YYYY-MM-DD date`);
  }

  const gender = optionalString(raw.geschlecht) ?? "offen";
  if (!isGender(gender)) throw new CatalogError(`${where}: unknown "geschlecht" ${gender}`);

  const operator = requireString("traeger", raw.traeger);
  if (!isOperator(operator)) throw new CatalogError(`${where}: unknown "traeger" ${operator}`);

  return {
    id,
    name: requireString("name", raw.name),
    stadt: requireString("stadt", raw.stadt),
    bundesland: requireString("bundesland", raw.bundesland),
    landkreis: optionalString(raw.landkreis),
    adresse: requireString("adresse", raw.adresse),
    latitude: requireNumber("latitude", raw.latitude),
    longitude: requireNumber("longitude", raw.longitude),
    freie_plaetze: freePlaces,
    freie_plaetze_jetzt: toBoolean(raw.freie_plaetze_jetzt),
    reservierbar: toBoolean(raw.reservierbar),
    verfuegbar_ab: availableFrom,
    verfuegbar_monate: months,
    alter_min: ageMin,
    alter_max: ageMax,
    geschlecht: gender,
    betreuungsart: requireString("betreuungsart", raw.betreuungsart),
    hilfeform: Object.freeze(toStringArray(raw.hilfeform)),
    aufnahmeart: Object.freeze(toStringArray(raw.aufnahmeart)),
    schulform_unterstuetzung: Object.freeze(toStringArray(raw.schulform_unterstuetzung)),
    raumgroesse_qm: toNumber(raw.raumgroesse_qm),
    einrichtungstyp: requireString("einrichtungstyp", raw.einrichtungstyp),
    traeger: operator,
    kontaktzeitfenster: optionalString(raw.kontaktzeitfenster),
    kontakt_email: requireString("kontakt_email", raw.kontakt_email),
    kontakt_telefon: requireString("kontakt_telefon", raw.kontakt_telefon),
    bild_url: raw.bild_url ?? "",
    beschreibung: raw.beschreibung ?? "",
    inobhutnahme_geeignet: toBoolean(raw.inobhutnahme_geeignet),
    krisenplatz: toBoolean(raw.krisenplatz),
    notaufnahme_24_7: toBoolean(raw.notaufnahme_24_7),
    einzelplatz_moeglich: toBoolean(raw.einzelplatz_moeglich),
    kleingruppe: toBoolean(raw.kleingruppe),
    keine_gewaltproblematik: toBoolean(raw.keine_gewaltproblematik),
    keine_suchtthematik: toBoolean(raw.keine_suchtthematik),
    schulbesuch_moeglich: toBoolean(raw.schulbesuch_moeglich),
    haustiere_erlaubt: toBoolean(raw.haustiere_erlaubt),
    traumapaedagogik: toBoolean(raw.traumapaedagogik),
    psychiatrienahe_betreuung: toBoolean(raw.psychiatrienahe_betreuung),
    autismus: toBoolean(raw.autismus),
    geistige_behinderung: toBoolean(raw.geistige_behinderung),
    koerperliche_einschraenkungen: toBoolean(raw.koerperliche_einschraenkungen),
    deutschkenntnisse_erforderlich: toBoolean(raw.deutschkenntnisse_erforderlich),
    sprachunterstuetzung: toBoolean(raw.sprachunterstuetzung),
    eins_zu_eins_moeglich: toBoolean(raw.eins_zu_eins_moeglich),
    nachtbereitschaft: toBoolean(raw.nachtbereitschaft),
    nachtdienst: toBoolean(raw.nachtdienst),
    deeskalationserfahrung: toBoolean(raw.deeskalationserfahrung),
    platz_bestaetigt_24h: toBoolean(raw.platz_bestaetigt_24h),
    platz_bestaetigt_3d: toBoolean(raw.platz_bestaetigt_3d),
    platz_bestaetigt_7d: toBoolean(raw.platz_bestaetigt_7d),
  };
}
