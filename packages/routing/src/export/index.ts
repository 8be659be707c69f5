export {
  fleetToGeoJson,
  type FleetGeoJsonOptions,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
} from "./fleet-geojson.js";
