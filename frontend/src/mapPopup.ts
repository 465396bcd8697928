import { escapeHtml, formatDistance } from "./dom";
import type { FacilityResult } from "./types";

export function buildPopupHtml(facility: FacilityResult): string {
  const rows = [
    `<b>${escapeHtml(facility.name)}</b>`,
    escapeHtml(facility.stadt),
    `Freie Plätze: ${facility.freie_plaetze}`,
    escapeHtml(facility.betreuungsart),
  ];
  if (facility.distance_km != null) rows.push(`Entfernung: ${formatDistance(facility.distance_km)}`);

  const detailsBtn = `<button class="popup-details" type="button" data-action="details" data-id="${facility.id}">Details anzeigen</button>`;

  return `<div class="popup-content">${rows.join("<br>")}${detailsBtn}</div>`;
}
