import { byId, formatDate, td } from "./dom";
import { comparePrimitive } from "./sort";
import type { FacilityResult } from "./types";

type SortableKey =
  | "name"
  | "stadt"
  | "bundesland"
  | "betreuungsart"
  | "freie_plaetze"
  | "alter_min"
  | "alter_max"
  | "verfuegbar_ab"
  | "verfuegbar_monate"
  | "distance_km";

interface Column {
  key: SortableKey;
  label: string;
  format: (f: FacilityResult) => string;
}

export const COLUMNS: readonly Column[] = [
  { key: "name", label: "Name", format: (f) => f.name },
  { key: "stadt", label: "Stadt", format: (f) => f.stadt },
  { key: "bundesland", label: "Bundesland", format: (f) => f.bundesland },
  { key: "betreuungsart", label: "Betreuungsart", format: (f) => f.betreuungsart },
  { key: "freie_plaetze", label: "Freie Plätze", format: (f) => String(f.freie_plaetze) },
  { key: "alter_min", label: "Alter min", format: (f) => String(f.alter_min) },
  { key: "alter_max", label: "Alter max", format: (f) => String(f.alter_max) },
  { key: "verfuegbar_ab", label: "Verfügbar ab", format: (f) => formatDate(f.verfuegbar_ab) },
  { key: "verfuegbar_monate", label: "Dauer (Mon.)", format: (f) => String(f.verfuegbar_monate) },
  {
    key: "distance_km",
    label: "Entfernung (km)",
    format: (f) => (f.distance_km == null ? "" : f.distance_km.toFixed(1)),
  },
];

interface TableOptions {
  tableId: string;
  onRowClick: (facility: FacilityResult) => void;
}

export class TableController {
  private readonly thead: HTMLTableSectionElement;
  private readonly tbody: HTMLTableSectionElement;
  private readonly onRowClick: TableOptions["onRowClick"];
  private results: FacilityResult[] = [];
  private columns: readonly Column[] = [];
  private sortKey: SortableKey | null = null;
  private sortAsc = true;

  constructor({ tableId, onRowClick }: TableOptions) {
    const table = byId(tableId, HTMLTableElement);
    this.thead = table.tHead ?? table.createTHead();
    this.tbody = table.tBodies[0] ?? table.createTBody();
    this.onRowClick = onRowClick;

    this.thead.addEventListener("click", (e) => {
      if (!(e.target instanceof Element)) return;
      const th = e.target.closest<HTMLTableCellElement>("th[data-key]");
      const column = this.columns.find((c) => c.key === th?.dataset.key);
      if (column) this.toggleSort(column.key);
    });

    this.tbody.addEventListener("click", (e) => {
      if (!(e.target instanceof Element)) return;
      const row = e.target.closest<HTMLTableRowElement>("tr[data-id]");
      const facility = this.results.find((f) => String(f.id) === row?.dataset.id);
      if (facility) this.onRowClick(facility);
    });
  }

  /** The distance column only shows while results carry a distance. */
  setResults(results: readonly FacilityResult[]): void {
    this.results = [...results];
    const withDistance = results.some((f) => f.distance_km != null);
    this.columns = COLUMNS.filter((c) => c.key !== "distance_km" || withDistance);
    if (this.sortKey === "distance_km" && !withDistance) this.sortKey = null;
    if (this.sortKey) this.applySort();
    this.renderHead();
    this.renderRows();
  }

  private toggleSort(key: SortableKey): void {
    this.sortAsc = this.sortKey === key ? !this.sortAsc : true;
    this.sortKey = key;
    this.applySort();
    this.renderHead();
    this.renderRows();
  }

  private applySort(): void {
    const key = this.sortKey;
    if (!key) return;
    const asc = this.sortAsc;
    this.results.sort((a, b) => comparePrimitive(a[key], b[key], asc));
  }

  private renderHead(): void {
    const tr = document.createElement("tr");
    for (const column of this.columns) {
      const th = document.createElement("th");
      th.dataset.key = column.key;
      th.textContent = column.label;
      if (column.key === this.sortKey) th.setAttribute("aria-sort", this.sortAsc ? "ascending" : "descending");
      tr.appendChild(th);
    }
    this.thead.replaceChildren(tr);
  }

  private renderRows(): void {
    this.tbody.textContent = "";

    for (const facility of this.results) {
      const tr = document.createElement("tr");
      tr.dataset.id = String(facility.id);
      tr.append(...this.columns.map((c) => td(c.format(facility))));
      this.tbody.appendChild(tr);
    }
  }
}
