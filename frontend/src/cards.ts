import { $, el, formatAgeBand, formatDate, formatDistance } from "./dom";
import type { FacilityResult } from "./types";

interface CardsOptions {
  containerSelector: string;
  onDetails: (facilityId: number) => void;
}

export function buildCard(facility: FacilityResult): HTMLElement {
  const card = el("article", "facility-card");
  card.dataset.id = String(facility.id);

  card.appendChild(el("h3", "card-title", facility.name));

  const location = el("p", "card-location");
  location.append(el("strong", undefined, facility.stadt), `, ${facility.bundesland}`);
  card.appendChild(location);
  if (facility.distance_km != null) {
    card.appendChild(el("p", "card-distance", `${formatDistance(facility.distance_km)} entfernt`));
  }

  const status =
    facility.freie_plaetze > 0
      ? el("p", "card-status card-status--free", `${facility.freie_plaetze} freie Plätze`)
      : el("p", "card-status card-status--full", "Belegt");
  card.append(status, el("p", "card-care", facility.betreuungsart));
  if (facility.inobhutnahme_geeignet) card.appendChild(el("p", "card-badge", "Inobhutnahme geeignet"));

  const facts = el("dl", "card-facts");
  const addFact = (label: string, value: string): void => {
    facts.append(el("dt", undefined, label), el("dd", undefined, value));
  };
  addFact("Alter", `${formatAgeBand(facility.alter_min, facility.alter_max)} Jahre`);
  addFact("Ab", formatDate(facility.verfuegbar_ab));
  addFact("Dauer", `${facility.verfuegbar_monate} Monate`);
  card.appendChild(facts);

  const btn = el("button", "card-details", "Details anzeigen");
  btn.type = "button";
  btn.dataset.action = "details";
  card.appendChild(btn);

  return card;
}

export class CardsController {
  private readonly container: HTMLElement;

  constructor({ containerSelector, onDetails }: CardsOptions) {
    this.container = $(containerSelector);

    this.container.addEventListener("click", (e) => {
      if (!(e.target instanceof Element)) return;
      if (!e.target.closest("[data-action='details']")) return;
      const id = Number(e.target.closest<HTMLElement>("article[data-id]")?.dataset.id);
      if (Number.isInteger(id)) onDetails(id);
    });
  }

  render(results: readonly FacilityResult[]): void {
    this.container.replaceChildren(...results.map(buildCard));
  }
}
