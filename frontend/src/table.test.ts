import { beforeEach, describe, expect, it, vi } from "vitest";
import { $ } from "./dom";
import { TableController } from "./table";
import { makeResult } from "./testing/fixtures";
import type { FacilityResult } from "./types";

function headers(): string[] {
  return [...document.querySelectorAll("#results-table th")].map((th) => th.textContent ?? "");
}

function firstColumn(): string[] {
  return [...document.querySelectorAll("#results-table tbody tr")].map((tr) => tr.firstElementChild?.textContent ?? "");
}

const results = [
  makeResult({ id: 1, name: "Birkenhof", freie_plaetze: 2 }),
  makeResult({ id: 2, name: "Ahornhaus", freie_plaetze: 0 }),
  makeResult({ id: 3, name: "Zedernheim", freie_plaetze: 5 }),
];

describe("TableController", () => {
  let onRowClick: (facility: FacilityResult) => void;
  let table: TableController;

  beforeEach(() => {
    document.body.innerHTML = '<table id="results-table"><thead></thead><tbody></tbody></table>';
    onRowClick = vi.fn();
    table = new TableController({ tableId: "results-table", onRowClick });
  });

  it("renders rows in result order without a distance column", () => {
    table.setResults(results);
    expect(headers()).toEqual([
      "Name",
      "Stadt",
      "Bundesland",
      "Betreuungsart",
      "Freie Plätze",
      "Alter min",
      "Alter max",
      "Verfügbar ab",
      "Dauer (Mon.)",
    ]);
    expect(firstColumn()).toEqual(["Birkenhof", "Ahornhaus", "Zedernheim"]);
  });

  it("adds the distance column during a radius search", () => {
    table.setResults([makeResult({ distance_km: 12.34 })]);
    expect(headers().at(-1)).toBe("Entfernung (km)");
    expect($("#results-table tbody tr").lastElementChild?.textContent).toBe("12.3");
  });

  it("sorts by a column and toggles the direction", () => {
    table.setResults(results);
    $("th[data-key='name']").click();
    expect(firstColumn()).toEqual(["Ahornhaus", "Birkenhof", "Zedernheim"]);
    expect($("th[data-key='name']").getAttribute("aria-sort")).toBe("ascending");

    $("th[data-key='name']").click();
    expect(firstColumn()).toEqual(["Zedernheim", "Birkenhof", "Ahornhaus"]);
    expect($("th[data-key='name']").getAttribute("aria-sort")).toBe("descending");
  });

  it("keeps the sort when new results arrive", () => {
    table.setResults(results);
    $("th[data-key='freie_plaetze']").click();
    table.setResults(results.slice(0, 2));
    expect(firstColumn()).toEqual(["Ahornhaus", "Birkenhof"]);
  });

  it("opens a facility from its row", () => {
    table.setResults(results);
    $("tr[data-id='3'] td").click();
    expect(onRowClick).toHaveBeenCalledWith(results[2]);
  });
});
