import L from "leaflet";

export interface LayerSets {
  baseLayers: Record<string, L.TileLayer>;
  defaultBase: L.TileLayer;
}

const OSM_ATTRIB =
  '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';
const CARTO_ATTRIB = `${OSM_ATTRIB} &copy; <a href="https://carto.com/attributions">CARTO</a>`;

/** Fresh tile layers per map; a layer instance can only sit on one map. */
export function createLayerSets(): LayerSets {
  const osmStandard = L.tileLayer("https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png", {
    maxZoom: 19,
    attribution: OSM_ATTRIB,
  });

  const cartoVoyager = L.tileLayer(
    "https://{s}.basemaps.cartocdn.com/rastertiles/voyager/{z}/{x}/{y}{r}.png",
    { subdomains: "abcd", maxZoom: 20, attribution: CARTO_ATTRIB },
  );

  const cartoLight = L.tileLayer("https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}{r}.png", {
    subdomains: "abcd",
    maxZoom: 20,
    attribution: CARTO_ATTRIB,
  });

  return {
    baseLayers: {
      OpenStreetMap: osmStandard,
      Voyager: cartoVoyager,
      Hell: cartoLight,
    },
    defaultBase: osmStandard,
  };
}
