const escapeDiv = document.createElement("div");

export function escapeHtml(text: string): string {
  escapeDiv.textContent = text;
  return escapeDiv.innerHTML;
}

export function $(selector: string, parent: ParentNode = document): HTMLElement {
  const el = parent.querySelector<HTMLElement>(selector);
  if (!el) throw new Error(`Element not found: ${selector}`);
  return el;
}

/** Typed lookup by id; throws when the element is missing or of another kind. */
export function byId<T extends HTMLElement>(id: string, kind: new () => T): T {
  const el = document.getElementById(id);
  if (!(el instanceof kind)) throw new Error(`#${id} is not a <${kind.name}>`);
  return el;
}

export function td(text: string): HTMLTableCellElement {
  const cell = document.createElement("td");
  cell.textContent = text;
  return cell;
}

export function el<K extends keyof HTMLElementTagNameMap>(
  tag: K,
  className?: string,
  text?: string,
): HTMLElementTagNameMap[K] {
  const node = document.createElement(tag);
  if (className) node.className = className;
  if (text != null) node.textContent = text;
  return node;
}

export function formatDistance(km: number | null): string {
  return km == null ? "" : `${km.toFixed(1)} km`;
}

/** 2025-03-01 -> 01.03.2025 */
export function formatDate(iso: string): string {
  const [y, m, d] = iso.split("-");
  return y && m && d ? `${d}.${m}.${y}` : iso;
}

export function formatAgeBand(min: number, max: number): string {
  return `${min}–${max}`;
}

export function yesNo(value: boolean): string {
  return value ? "Ja" : "Nein";
}
