export {
  METERS_PER_DEG_LAT,
  metersPerDegLng,
  haversineDistance,
  planarDistance,
  bboxAroundPoint,
  isValidCoordinate,
} from "./distance.js";
