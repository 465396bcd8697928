import L from "leaflet";
import "leaflet.markercluster";
import "leaflet/dist/leaflet.css";
import "leaflet.markercluster/dist/MarkerCluster.css";
import "leaflet.markercluster/dist/MarkerCluster.Default.css";

import { availabilityColor, FREE_COLOR, FULL_COLOR } from "./config";
import { facilityPosition } from "./geo";
import { createLayerSets } from "./mapLayers";
import { buildPopupHtml } from "./mapPopup";
import type { Facility, FacilityResult, LatLng, RadiusSearch } from "./types";

export interface MapView {
  lat: number;
  lng: number;
  zoom: number;
}

interface MapOptions {
  containerId: string;
  center: LatLng;
  initialView?: MapView;
  onDetails: (facilityId: number) => void;
}

// ---------------------------------------------------------------------------
// Icon factories
// ---------------------------------------------------------------------------

const CLUSTER_SIZES = { small: 28, medium: 36, large: 44 } as const;

function clusterSize(count: number): keyof typeof CLUSTER_SIZES {
  if (count >= 20) return "large";
  if (count >= 5) return "medium";
  return "small";
}

function createClusterIcon(cluster: L.MarkerCluster): L.DivIcon {
  const count = cluster.getChildCount();
  const px = CLUSTER_SIZES[clusterSize(count)];
  return L.divIcon({
    html: `<div class="cluster-icon" style="width:${px}px;height:${px}px">${count}</div>`,
    className: "",
    iconSize: [px, px],
  });
}

function createFacilityIcon(facility: Facility): L.DivIcon {
  return L.divIcon({
    html: `<div class="marker-house" style="background:${availabilityColor(facility.freie_plaetze)}">⌂</div>`,
    className: "",
    iconSize: [22, 22],
    iconAnchor: [11, 11],
  });
}

function createSearchCenterIcon(): L.DivIcon {
  return L.divIcon({
    html: '<div class="center-marker">×</div>',
    className: "",
    iconSize: [20, 20],
    iconAnchor: [10, 10],
  });
}

function createLegendControl(): L.Control {
  const Legend = L.Control.extend({
    onAdd() {
      const container = L.DomUtil.create("div", "map-legend");
      const entries: [string, string][] = [
        [FREE_COLOR, "Freie Plätze"],
        [FULL_COLOR, "Belegt"],
      ];
      for (const [color, label] of entries) {
        const row = L.DomUtil.create("div", "map-legend-item", container);
        const dot = L.DomUtil.create("span", "map-legend-dot", row);
        dot.style.background = color;
        row.appendChild(document.createTextNode(` ${label}`));
      }
      return container;
    },
  });
  return new Legend({ position: "bottomright" });
}

function toLatLng(p: LatLng): L.LatLngTuple {
  return [p.lat, p.lng];
}

// ---------------------------------------------------------------------------
// MapController
// ---------------------------------------------------------------------------

export class MapController {
  private readonly map: L.Map;
  private readonly clusterGroup: L.MarkerClusterGroup;
  private readonly searchLayer = L.layerGroup();
  private readonly onDetails: MapOptions["onDetails"];

  constructor({ containerId, center, initialView, onDetails }: MapOptions) {
    this.onDetails = onDetails;

    const start = initialView ?? { ...center, zoom: 6 };
    this.map = L.map(containerId).setView([start.lat, start.lng], start.zoom);

    const layers = createLayerSets();
    layers.defaultBase.addTo(this.map);
    L.control.layers(layers.baseLayers, {}, { position: "topleft" }).addTo(this.map);
    createLegendControl().addTo(this.map);

    this.clusterGroup = L.markerClusterGroup({
      maxClusterRadius: 40,
      spiderfyOnMaxZoom: true,
      showCoverageOnHover: false,
      iconCreateFunction: createClusterIcon,
    });
    this.map.addLayer(this.clusterGroup);
    this.searchLayer.addTo(this.map);
  }

  // --- View helpers --------------------------------------------------------

  getView(): MapView {
    const c = this.map.getCenter();
    return { lat: c.lat, lng: c.lng, zoom: this.map.getZoom() };
  }

  onMoveEnd(cb: () => void): void {
    this.map.on("moveend", cb);
  }

  invalidateSize(): void {
    this.map.invalidateSize();
  }

  fitToFacilities(facilities: readonly Facility[], search: RadiusSearch | null): void {
    if (facilities.length === 0 && !search) return;
    const bounds = L.latLngBounds(facilities.map((f) => toLatLng(facilityPosition(f))));
    if (search) bounds.extend(toLatLng(search.center));
    this.map.fitBounds(bounds, { padding: [30, 30], maxZoom: 12 });
  }

  // --- Radius search overlay -----------------------------------------------

  setSearchArea(search: RadiusSearch | null): void {
    this.searchLayer.clearLayers();
    if (!search) return;

    const center = toLatLng(search.center);
    L.circle(center, {
      radius: search.km * 1000,
      color: "#1565c0",
      weight: 2,
      fillOpacity: 0.06,
      interactive: false,
    }).addTo(this.searchLayer);
    L.marker(center, { icon: createSearchCenterIcon() })
      .bindPopup(`<b>Suchmittelpunkt</b><br>Umkreis ${search.km} km`)
      .addTo(this.searchLayer);
  }

  // --- Marker rendering ----------------------------------------------------

  render(results: readonly FacilityResult[]): void {
    this.clusterGroup.clearLayers();

    for (const facility of results) {
      const marker = L.marker(toLatLng(facilityPosition(facility)), {
        icon: createFacilityIcon(facility),
        title: facility.name,
      });

      marker.bindPopup(buildPopupHtml(facility), { maxWidth: 250 });
      marker.on("popupopen", (e) => {
        const btn = e.popup.getElement()?.querySelector<HTMLButtonElement>("button[data-action='details']");
        btn?.addEventListener("click", () => this.onDetails(facility.id), { once: true });
      });

      this.clusterGroup.addLayer(marker);
    }
  }
}

/** Small fixed map on the detail page. Returns a disposer. */
export function renderLocationMap(container: HTMLElement, facility: Facility): () => void {
  const position = toLatLng(facilityPosition(facility));
  const map = L.map(container, { scrollWheelZoom: false }).setView(position, 13);
  createLayerSets().defaultBase.addTo(map);
  L.marker(position, { icon: createFacilityIcon(facility), title: facility.name }).addTo(map);
  return () => map.remove();
}
