import { INQUIRY_AGE, MESSAGES, SPECIALIZATION_LABELS } from "./config";
import { $, el, formatAgeBand, formatDate, yesNo } from "./dom";
import type { InquiryForm, InquiryResult } from "./inquiry";
import type { Facility } from "./types";

export type RenderMapFn = (container: HTMLElement, facility: Facility) => () => void;

interface DetailOptions {
  rootSelector: string;
  onBack: () => void;
  onSubmit: (form: InquiryForm) => Promise<InquiryResult>;
  renderMap?: RenderMapFn;
}

function section(title: string, ...children: Node[]): HTMLElement {
  const box = el("section", "detail-section");
  box.append(el("h2", undefined, title), ...children);
  return box;
}

function factList(rows: readonly [string, string][]): HTMLElement {
  const dl = el("dl", "detail-facts");
  for (const [label, value] of rows) dl.append(el("dt", undefined, label), el("dd", undefined, value));
  return dl;
}

export function infoRows(f: Facility): [string, string][] {
  const rows: [string, string][] = [
    ["Adresse", f.adresse],
    ["Betreuungsart", f.betreuungsart],
    ["Hilfeform", f.hilfeform.join(", ")],
    ["Freie Plätze", `${f.freie_plaetze} (${f.freie_plaetze_jetzt ? "jetzt verfügbar" : "nicht sofort"})`],
    ["Reservierbar", yesNo(f.reservierbar)],
    ["Altersgruppe", `${formatAgeBand(f.alter_min, f.alter_max)} Jahre`],
    ["Geschlecht", f.geschlecht],
    ["Verfügbar ab", formatDate(f.verfuegbar_ab)],
    ["Verfügbarkeit", `${f.verfuegbar_monate} Monate`],
    ["Aufnahmeart", f.aufnahmeart.join(", ")],
    ["Inobhutnahme", yesNo(f.inobhutnahme_geeignet)],
    ["Krisenplatz", yesNo(f.krisenplatz)],
    ["Notaufnahme 24/7", yesNo(f.notaufnahme_24_7)],
    ["Einrichtungstyp", f.einrichtungstyp],
    ["Träger", f.traeger],
  ];
  if (f.raumgroesse_qm != null) rows.push(["Raumgröße", `${f.raumgroesse_qm} m²`]);
  return rows;
}

export function specializations(f: Facility): string[] {
  return SPECIALIZATION_LABELS.filter(({ flag }) => f[flag]).map(({ label }) => label);
}

function textField(name: string, label: string, type = "text"): HTMLLabelElement {
  const lbl = el("label", "form-field");
  const input = el("input");
  input.name = name;
  input.type = type;
  lbl.append(label, input);
  return lbl;
}

function buildInquiryForm(): HTMLFormElement {
  const form = el("form", "inquiry-form");
  form.noValidate = true;

  const age = el("input");
  age.name = "alter";
  age.type = "number";
  age.min = String(INQUIRY_AGE.min);
  age.max = String(INQUIRY_AGE.max);
  age.defaultValue = String(INQUIRY_AGE.initial);
  const ageLabel = el("label", "form-field");
  ageLabel.append("Alter des Jugendlichen", age);

  const message = el("textarea");
  message.name = "nachricht";
  message.rows = 5;
  message.placeholder = "Beschreiben Sie kurz Ihr Anliegen …";
  const messageLabel = el("label", "form-field form-field--wide");
  messageLabel.append("Ihre Nachricht *", message);

  const submit = el("button", "inquiry-submit", "Anfrage absenden");
  submit.type = "submit";

  const feedback = el("p", "inquiry-feedback");
  feedback.setAttribute("role", "status");

  form.append(
    textField("name", "Ihr Name *"),
    textField("organisation", "Ihre Organisation (optional)"),
    textField("email", "Ihre E-Mail-Adresse *", "email"),
    ageLabel,
    textField("telefon", "Ihre Telefonnummer (optional)", "tel"),
    messageLabel,
    submit,
    feedback,
  );
  return form;
}

export function readInquiryForm(form: HTMLFormElement): InquiryForm {
  const data = new FormData(form);
  const text = (name: string): string => {
    const v = data.get(name);
    return typeof v === "string" ? v : "";
  };
  const age = Number(text("alter"));

  return {
    name: text("name"),
    organisation: text("organisation") || undefined,
    email: text("email"),
    telefon: text("telefon") || undefined,
    nachricht: text("nachricht"),
    alter: text("alter") && Number.isInteger(age) ? age : null,
  };
}

export class DetailView {
  private readonly root: HTMLElement;
  private readonly onBack: DetailOptions["onBack"];
  private readonly onSubmit: DetailOptions["onSubmit"];
  private readonly renderMap?: RenderMapFn;
  private disposeMap: (() => void) | null = null;
  private shownId: number | null = null;

  constructor({ rootSelector, onBack, onSubmit, renderMap }: DetailOptions) {
    this.root = $(rootSelector);
    this.onBack = onBack;
    this.onSubmit = onSubmit;
    this.renderMap = renderMap;
  }

  get facilityId(): number | null {
    return this.shownId;
  }

  show(facility: Facility): void {
    if (this.shownId === facility.id) return;
    this.clear();
    this.shownId = facility.id;

    const back = el("button", "detail-back", "← Zurück zur Übersicht");
    back.type = "button";
    back.addEventListener("click", () => this.onBack());

    const caption = [facility.stadt, facility.bundesland, facility.landkreis].filter(Boolean).join(" · ");
    const header = el("header", "detail-header");
    header.append(el("h1", undefined, facility.name), el("p", "detail-caption", caption));

    const media = el("div", "detail-media");
    if (facility.bild_url) {
      const img = el("img", "detail-image");
      img.src = facility.bild_url;
      img.alt = facility.name;
      media.appendChild(img);
    }
    const mapBox = el("div", "detail-map");
    media.appendChild(mapBox);

    const info = el("div", "detail-info");
    info.append(
      section("Informationen", factList(infoRows(facility))),
      section("Beschreibung", el("p", undefined, facility.beschreibung)),
    );
    const spez = specializations(facility);
    if (spez.length) info.appendChild(section("Spezialisierungen", el("p", undefined, spez.join(", "))));
    info.appendChild(
      section(
        "Kontakt",
        factList([
          ["E-Mail", facility.kontakt_email],
          ["Telefon", facility.kontakt_telefon],
          ["Kontaktzeit", facility.kontaktzeitfenster ?? "Nicht angegeben"],
        ]),
      ),
    );

    const body = el("div", "detail-body");
    body.append(media, info);

    const form = buildInquiryForm();
    form.addEventListener("submit", (e) => {
      e.preventDefault();
      this.submit(form).catch((err: unknown) => {
        console.error("Inquiry submission failed:", err);
        this.showFeedback(form, { ok: false, error: MESSAGES.sendFailed });
      });
    });

    this.root.append(back, header, body, section("Anfrage senden", form));
    this.root.hidden = false;

    if (this.renderMap) this.disposeMap = this.renderMap(mapBox, facility);
  }

  hide(): void {
    this.clear();
    this.root.hidden = true;
  }

  private clear(): void {
    this.disposeMap?.();
    this.disposeMap = null;
    this.shownId = null;
    this.root.replaceChildren();
  }

  private async submit(form: HTMLFormElement): Promise<void> {
    const result = await this.onSubmit(readInquiryForm(form));
    this.showFeedback(form, result);
    if (result.ok) form.reset();
  }

  private showFeedback(form: HTMLFormElement, result: InquiryResult): void {
    const feedback = $(".inquiry-feedback", form);
    feedback.textContent = result.ok ? result.message : result.error;
    feedback.classList.toggle("inquiry-feedback--error", !result.ok);
    feedback.classList.toggle("inquiry-feedback--success", result.ok);
  }
}
