import "./styles/index.css";

import { CardsController } from "./cards";
import { loadCatalog, loadConfig } from "./catalog";
import { DEFAULT_CENTER, MESSAGES } from "./config";
import { DetailView } from "./detail";
import { DirectoryController, type DirectoryState } from "./directory";
import { $ } from "./dom";
import { FilterPanel } from "./filterPanel";
import { activeFilterCount, deriveFilterOptions, INITIAL_CRITERIA, subRegionOptions } from "./filters";
import { readHash, writeHashDebounced, type HashState } from "./hashState";
import { AcknowledgingSender } from "./inquiry";
import { MapController, renderLocationMap } from "./map";
import { OVERVIEW, showDetail } from "./navigation";
import { summarize } from "./summary";
import { TableController } from "./table";
import type { ViewTab } from "./types";

// ---------------------------------------------------------------------------
// Boot
// ---------------------------------------------------------------------------

async function boot(): Promise<void> {
  const base = import.meta.env.BASE_URL;
  const hash = readHash();

  const [config, store] = await Promise.all([loadConfig(base), loadCatalog(base)]);
  const center = config.center ?? DEFAULT_CENTER;
  const initialView =
    hash.zoom != null && hash.lat != null && hash.lng != null
      ? { lat: hash.lat, lng: hash.lng, zoom: hash.zoom }
      : undefined;

  const directory = new DirectoryController(store, {
    sender: new AcknowledgingSender(),
    initialCriteria: { ...INITIAL_CRITERIA, ...hash.filters },
    initialNavigation: hash.detail != null ? showDetail(hash.detail) : OVERVIEW,
  });

  // --- Controllers --------------------------------------------------------

  const openDetails = (id: number): void => directory.selectFacility(id);

  // The panel already shows what the user just changed; writing it back would move the caret.
  let changeFromPanel = false;
  const panel = new FilterPanel({
    options: deriveFilterOptions(store.all),
    searchCenter: center,
    radiusKm: config.radiusKm,
    onChange: () => {
      changeFromPanel = true;
      try {
        directory.setFilterCriteria(panel.read());
      } finally {
        changeFromPanel = false;
      }
    },
    onReset: () => directory.resetFilters(),
  });

  const cards = new CardsController({ containerSelector: "#cards", onDetails: openDetails });
  const table = new TableController({ tableId: "results-table", onRowClick: (f) => openDetails(f.id) });
  const detail = new DetailView({
    rootSelector: "#detail",
    onBack: () => directory.goBack(),
    onSubmit: (form) => directory.submitInquiry(form),
    renderMap: renderLocationMap,
  });

  // --- Tabs ---------------------------------------------------------------

  let map: MapController | null = null;
  let tab: ViewTab = hash.tab ?? "cards";
  const tabButtons = document.querySelectorAll<HTMLButtonElement>("#tabs button[data-tab]");

  // Leaflet cannot size itself inside a hidden container, so the map is built on first view.
  function ensureMap(): MapController {
    if (map) return map;
    map = new MapController({
      containerId: "map",
      center,
      initialView,
      onDetails: openDetails,
    });
    map.onMoveEnd(syncHash);
    const { results, criteria } = directory.getState();
    map.render(results);
    map.setSearchArea(criteria.radius);
    if (!initialView) map.fitToFacilities(results, criteria.radius);
    return map;
  }

  function showTab(next: ViewTab): void {
    tab = next;
    for (const btn of tabButtons) btn.classList.toggle("active", btn.dataset.tab === next);
    for (const name of ["cards", "map", "table"] as const) {
      $(`#tab-${name}`).hidden = name !== next;
    }
    if (next === "map") window.setTimeout(() => ensureMap().invalidateSize(), 0);
    syncHash();
  }

  for (const btn of tabButtons) {
    btn.addEventListener("click", () => {
      const next = btn.dataset.tab;
      if (next === "cards" || next === "map" || next === "table") showTab(next);
    });
  }

  // --- Render -------------------------------------------------------------

  const overview = $("#overview");
  const notice = $("#notice");
  const empty = $("#empty");
  const views = $("#views");
  const filterCount = $("#filterCount");
  let lastResults: DirectoryState["results"] | null = null;

  function renderSummary(state: DirectoryState): void {
    const s = summarize(state.results);
    $("#metric-facilities").textContent = String(s.facilities);
    $("#metric-free").textContent = String(s.freePlaces);
    $("#metric-cities").textContent = String(s.cities);
    $("#metric-regions").textContent = String(s.regions);
  }

  function render(state: DirectoryState): void {
    notice.textContent = state.notice ?? "";
    notice.hidden = state.notice == null;

    panel.setSubRegionOptions(subRegionOptions(store.all, state.criteria.regions));
    if (!changeFromPanel) panel.write(state.criteria);
    const count = activeFilterCount(state.criteria);
    filterCount.textContent = count ? `${count} aktiv` : "";

    if (state.results !== lastResults) {
      lastResults = state.results;
      renderSummary(state);
      empty.hidden = state.results.length > 0;
      empty.textContent = MESSAGES.noResults;
      views.hidden = state.results.length === 0;
      cards.render(state.results);
      table.setResults(state.results);
      if (map) {
        map.render(state.results);
        map.setSearchArea(state.criteria.radius);
      }
    }

    const selected = directory.selectedFacility();
    if (selected) {
      overview.hidden = true;
      if (detail.facilityId !== selected.id) {
        detail.show(selected);
        window.scrollTo({ top: 0 });
      }
    } else {
      detail.hide();
      overview.hidden = false;
    }

    syncHash();
  }

  // --- Hash sync ----------------------------------------------------------

  function buildCurrentHash(): HashState {
    const { criteria, navigation } = directory.getState();
    const view = map?.getView();
    return {
      zoom: view?.zoom,
      lat: view?.lat,
      lng: view?.lng,
      filters: criteria,
      detail: navigation.page === "detail" ? navigation.facilityId : undefined,
      tab,
    };
  }

  function syncHash(): void {
    writeHashDebounced(buildCurrentHash());
  }

  // --- Initial render -----------------------------------------------------

  $("#catalogSize").textContent = String(store.size);
  $("#footer-date").textContent = new Date().toLocaleDateString("de-DE");
  directory.subscribe(render);
  showTab(tab);
}

boot().catch((err: unknown) => {
  console.error("App failed to start:", err);
  const status = document.getElementById("notice");
  if (status) {
    status.textContent = MESSAGES.bootFailed;
    status.hidden = false;
  }
});
