import { beforeEach, describe, expect, it, vi } from "vitest";
import page from "../index.html?raw";
import { byId } from "./dom";
import { FilterPanel, isoDate } from "./filterPanel";
import { deriveFilterOptions, INITIAL_CRITERIA } from "./filters";
import { makeStore } from "./testing/fixtures";

const store = makeStore(
  { bundesland: "Berlin", alter_min: 8 },
  { bundesland: "Bayern", landkreis: "München", alter_max: 21 },
);

function mountSidebar(): void {
  document.body.innerHTML = page.slice(page.indexOf("<body>") + "<body>".length, page.indexOf("</body>"));
}

function change(target: HTMLElement): void {
  target.dispatchEvent(new Event("change", { bubbles: true }));
}

describe("FilterPanel", () => {
  let onChange: () => void;
  let onReset: () => void;
  let panel: FilterPanel;

  beforeEach(() => {
    mountSidebar();
    onChange = vi.fn();
    onReset = vi.fn();
    panel = new FilterPanel({
      options: deriveFilterOptions(store.all),
      searchCenter: { lat: 51.1657, lng: 10.4515 },
      today: new Date(2026, 9, 19),
      onChange,
      onReset,
    });
  });

  it("reads back the criteria it was given", () => {
    panel.write(INITIAL_CRITERIA);
    expect(panel.read()).toEqual(INITIAL_CRITERIA);
  });

  it("fills the option lists from the catalog", () => {
    const regions = byId("regions", HTMLSelectElement);
    expect([...regions.options].map((o) => o.value)).toEqual(["Bayern", "Berlin"]);
    expect(document.querySelectorAll("#flagGroups input[type='checkbox']")).toHaveLength(17);
  });

  it("turns control changes into criteria", () => {
    panel.write(INITIAL_CRITERIA);
    const regions = byId("regions", HTMLSelectElement);
    for (const option of regions.options) option.selected = option.value === "Berlin";
    byId("crisisSuitable", HTMLInputElement).checked = true;
    byId("flag-autismus", HTMLInputElement).checked = true;
    byId("ageMin", HTMLInputElement).value = "14";
    byId("confirmation", HTMLSelectElement).value = "24h";
    change(regions);

    expect(onChange).toHaveBeenCalledOnce();
    expect(panel.read()).toEqual({
      ...INITIAL_CRITERIA,
      regions: ["Berlin"],
      ageRange: { min: 14, max: 21 },
      confirmation: "24h",
      requiredFlags: ["inobhutnahme_geeignet", "autismus"],
    });
  });

  it("shows the radius fields while the radius search is on", () => {
    panel.write(INITIAL_CRITERIA);
    const toggle = byId("radiusToggle", HTMLInputElement);
    toggle.checked = true;
    change(toggle);

    expect(byId("radiusFields", HTMLDivElement).hidden).toBe(false);
    expect(panel.read().radius).toEqual({ center: { lat: 51.1657, lng: 10.4515 }, km: 100 });
  });

  it("keeps selected sub-regions that are still offered", () => {
    panel.setSubRegionOptions(["Mitte", "München"]);
    const sub = byId("subRegions", HTMLSelectElement);
    for (const option of sub.options) option.selected = option.value === "München";
    panel.setSubRegionOptions(["München"]);
    expect(panel.read().subRegions).toEqual(["München"]);
  });

  it("reports a toggle once when both input and change fire", () => {
    panel.write(INITIAL_CRITERIA);
    const crisis = byId("crisisPlacement", HTMLInputElement);
    crisis.checked = true;
    crisis.dispatchEvent(new Event("input", { bubbles: true }));
    change(crisis);
    expect(onChange).toHaveBeenCalledOnce();

    crisis.checked = false;
    change(crisis);
    expect(onChange).toHaveBeenCalledTimes(2);
  });

  it("does not report a write as a change", () => {
    panel.write({ ...INITIAL_CRITERIA, freeNow: false });
    change(byId("freeNow", HTMLInputElement));
    expect(onChange).not.toHaveBeenCalled();
  });

  it("starts the available-from picker at today", () => {
    expect(byId("availableBy", HTMLInputElement).min).toBe("2026-10-19");
    expect(isoDate(new Date(2027, 0, 5))).toBe("2027-01-05");
  });

  it("calls onReset from the reset button", () => {
    byId("resetFilters", HTMLButtonElement).click();
    expect(onReset).toHaveBeenCalledOnce();
  });
});
