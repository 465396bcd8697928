import {
  CARE_FORM_OPTIONS,
  CONFIRMATION_OPTIONS,
  FLAG_GROUPS,
  GENDER_OPTIONS,
  INTAKE_TYPE_OPTIONS,
  OPERATOR_OPTIONS,
  RADIUS_KM,
} from "./config";
import { $, byId, el } from "./dom";
import type { ConfirmationTier, FacilityFlag, FilterCriteria, FilterOptions, LatLng } from "./types";

const CRISIS_SUITABLE: FacilityFlag = "inobhutnahme_geeignet";

/** Multi-select criteria; each control's id equals its key. */
type MultiKey =
  | "regions"
  | "subRegions"
  | "intakeTypes"
  | "careForms"
  | "genders"
  | "schoolForms"
  | "facilityTypes"
  | "operators"
  | "contactWindows";

const MULTI_KEYS: readonly MultiKey[] = [
  "regions",
  "subRegions",
  "intakeTypes",
  "careForms",
  "genders",
  "schoolForms",
  "facilityTypes",
  "operators",
  "contactWindows",
];

const TIERS = new Set<string>(CONFIRMATION_OPTIONS.map((o) => o.value));

function isTier(value: string): value is ConfirmationTier {
  return TIERS.has(value);
}

interface FilterPanelOptions {
  options: FilterOptions;
  searchCenter: LatLng;
  radiusKm?: number;
  /** Earliest selectable "Frei ab" date; defaults to now. */
  today?: Date;
  onChange: () => void;
  onReset: () => void;
}

function fillSelect(select: HTMLSelectElement, values: readonly string[]): void {
  select.replaceChildren(
    ...values.map((v) => {
      const opt = document.createElement("option");
      opt.value = v;
      opt.textContent = v;
      return opt;
    }),
  );
}

function readMulti(select: HTMLSelectElement): string[] {
  return [...select.selectedOptions].map((o) => o.value);
}

function writeMulti(select: HTMLSelectElement, values: readonly string[]): void {
  for (const opt of select.options) opt.selected = values.includes(opt.value);
}

/** Local calendar date as YYYY-MM-DD. */
export function isoDate(d: Date): string {
  const month = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  return `${d.getFullYear()}-${month}-${day}`;
}

function readNumber(input: HTMLInputElement, fallback: number): number {
  if (input.value.trim() === "") return fallback;
  const n = Number(input.value);
  return Number.isFinite(n) ? n : fallback;
}

/** Sidebar form. Reads a full criteria snapshot from the controls and writes one back. */
export class FilterPanel {
  private readonly options: FilterOptions;
  private readonly searchCenter: LatLng;
  private readonly radiusKm: number;
  private readonly selects: Record<MultiKey, HTMLSelectElement>;
  private readonly flagBoxes = new Map<FacilityFlag, HTMLInputElement>();
  /** Serialized snapshot of the last reported or written criteria. */
  private lastSnapshot: string | null = null;

  private readonly freeNow = byId("freeNow", HTMLInputElement);
  private readonly availableBy = byId("availableBy", HTMLInputElement);
  private readonly minMonths = byId("minMonths", HTMLInputElement);
  private readonly minMonthsLabel = $("#minMonthsValue");
  private readonly radiusToggle = byId("radiusToggle", HTMLInputElement);
  private readonly radiusFields = $("#radiusFields");
  private readonly radiusKmInput = byId("radiusKm", HTMLInputElement);
  private readonly radiusKmLabel = $("#radiusKmValue");
  private readonly refLat = byId("refLat", HTMLInputElement);
  private readonly refLng = byId("refLng", HTMLInputElement);
  private readonly ageMin = byId("ageMin", HTMLInputElement);
  private readonly ageMax = byId("ageMax", HTMLInputElement);
  private readonly crisisSuitable = byId("crisisSuitable", HTMLInputElement);
  private readonly crisisPlacement = byId("crisisPlacement", HTMLInputElement);
  private readonly confirmation = byId("confirmation", HTMLSelectElement);

  constructor({ options, searchCenter, radiusKm, today, onChange, onReset }: FilterPanelOptions) {
    this.options = options;
    this.searchCenter = searchCenter;
    this.radiusKm = radiusKm ?? RADIUS_KM.initial;

    this.selects = {
      regions: byId("regions", HTMLSelectElement),
      subRegions: byId("subRegions", HTMLSelectElement),
      intakeTypes: byId("intakeTypes", HTMLSelectElement),
      careForms: byId("careForms", HTMLSelectElement),
      genders: byId("genders", HTMLSelectElement),
      schoolForms: byId("schoolForms", HTMLSelectElement),
      facilityTypes: byId("facilityTypes", HTMLSelectElement),
      operators: byId("operators", HTMLSelectElement),
      contactWindows: byId("contactWindows", HTMLSelectElement),
    };

    fillSelect(this.selects.regions, options.regions);
    fillSelect(this.selects.intakeTypes, INTAKE_TYPE_OPTIONS);
    fillSelect(this.selects.careForms, CARE_FORM_OPTIONS);
    fillSelect(this.selects.genders, GENDER_OPTIONS);
    fillSelect(this.selects.schoolForms, options.schoolForms);
    fillSelect(this.selects.facilityTypes, options.facilityTypes);
    fillSelect(this.selects.operators, OPERATOR_OPTIONS);
    fillSelect(this.selects.contactWindows, options.contactWindows);

    this.confirmation.replaceChildren(
      ...CONFIRMATION_OPTIONS.map(({ value, label }) => {
        const opt = document.createElement("option");
        opt.value = value;
        opt.textContent = label;
        return opt;
      }),
    );

    this.availableBy.min = isoDate(today ?? new Date());
    this.minMonths.min = "1";
    this.minMonths.max = String(options.maxMonths);
    this.radiusKmInput.min = String(RADIUS_KM.min);
    this.radiusKmInput.max = String(RADIUS_KM.max);
    for (const input of [this.ageMin, this.ageMax]) {
      input.min = String(options.ageBounds.min);
      input.max = String(options.ageBounds.max);
    }

    this.buildFlagGroups($("#flagGroups"));

    const form = $("#filters");
    // Checkboxes and selects fire both "input" and "change"; report each edit once.
    const handle = (): void => {
      this.syncControls();
      const snapshot = JSON.stringify(this.read());
      if (snapshot === this.lastSnapshot) return;
      this.lastSnapshot = snapshot;
      onChange();
    };
    form.addEventListener("input", handle);
    form.addEventListener("change", handle);
    $("#resetFilters").addEventListener("click", (e) => {
      e.preventDefault();
      onReset();
    });
  }

  setSubRegionOptions(values: readonly string[]): void {
    const selected = readMulti(this.selects.subRegions);
    fillSelect(this.selects.subRegions, values);
    writeMulti(this.selects.subRegions, selected);
  }

  read(): FilterCriteria {
    const { ageBounds } = this.options;
    const ageMin = readNumber(this.ageMin, ageBounds.min);
    const ageMax = readNumber(this.ageMax, ageBounds.max);
    const months = readNumber(this.minMonths, 1);
    const tier = this.confirmation.value;

    const requiredFlags: FacilityFlag[] = [];
    if (this.crisisSuitable.checked) requiredFlags.push(CRISIS_SUITABLE);
    for (const [flag, box] of this.flagBoxes) if (box.checked) requiredFlags.push(flag);

    return {
      freeNow: this.freeNow.checked,
      availableBy: this.availableBy.value || null,
      minMonths: months > 1 ? months : null,
      regions: readMulti(this.selects.regions),
      subRegions: readMulti(this.selects.subRegions),
      radius: this.radiusToggle.checked
        ? {
            center: {
              lat: readNumber(this.refLat, this.searchCenter.lat),
              lng: readNumber(this.refLng, this.searchCenter.lng),
            },
            km: readNumber(this.radiusKmInput, this.radiusKm),
          }
        : null,
      ageRange: ageMin <= ageBounds.min && ageMax >= ageBounds.max ? null : { min: ageMin, max: ageMax },
      crisisPlacement: this.crisisPlacement.checked,
      intakeTypes: readMulti(this.selects.intakeTypes),
      careForms: readMulti(this.selects.careForms),
      genders: readMulti(this.selects.genders),
      schoolForms: readMulti(this.selects.schoolForms),
      facilityTypes: readMulti(this.selects.facilityTypes),
      operators: readMulti(this.selects.operators),
      confirmation: isTier(tier) ? tier : "any",
      contactWindows: readMulti(this.selects.contactWindows),
      requiredFlags,
    };
  }

  /** Restore controls from a snapshot, e.g. after a reset or on boot from the URL hash. */
  write(criteria: FilterCriteria): void {
    const { ageBounds } = this.options;

    this.freeNow.checked = criteria.freeNow;
    this.availableBy.value = criteria.availableBy ?? "";
    this.minMonths.value = String(criteria.minMonths ?? 1);

    for (const key of MULTI_KEYS) writeMulti(this.selects[key], criteria[key]);

    const radius = criteria.radius;
    this.radiusToggle.checked = radius != null;
    this.radiusKmInput.value = String(radius?.km ?? this.radiusKm);
    this.refLat.value = (radius?.center.lat ?? this.searchCenter.lat).toFixed(4);
    this.refLng.value = (radius?.center.lng ?? this.searchCenter.lng).toFixed(4);

    this.ageMin.value = String(criteria.ageRange?.min ?? ageBounds.min);
    this.ageMax.value = String(criteria.ageRange?.max ?? ageBounds.max);

    this.crisisSuitable.checked = criteria.requiredFlags.includes(CRISIS_SUITABLE);
    this.crisisPlacement.checked = criteria.crisisPlacement;
    for (const [flag, box] of this.flagBoxes) box.checked = criteria.requiredFlags.includes(flag);

    this.confirmation.value = criteria.confirmation;
    this.syncControls();
    this.lastSnapshot = JSON.stringify(this.read());
  }

  /** Slider captions and the radius fields follow their controls. */
  private syncControls(): void {
    this.minMonthsLabel.textContent = this.minMonths.value;
    this.radiusKmLabel.textContent = `${this.radiusKmInput.value} km`;
    this.radiusFields.hidden = !this.radiusToggle.checked;
  }

  private buildFlagGroups(container: HTMLElement): void {
    for (const group of FLAG_GROUPS) {
      const fieldset = el("fieldset", "flag-group");
      fieldset.appendChild(el("legend", undefined, group.title));
      for (const { flag, label } of group.flags) {
        const box = el("input");
        box.type = "checkbox";
        box.id = `flag-${flag}`;
        box.name = flag;
        const lbl = el("label");
        lbl.append(box, ` ${label}`);
        fieldset.appendChild(lbl);
        this.flagBoxes.set(flag, box);
      }
      container.appendChild(fieldset);
    }
  }
}
