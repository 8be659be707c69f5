/**
 * Grid-based spatial index over restricted zones.
 *
 * Each zone is registered in every ~500m cell its bounding box covers, with
 * a flat-earth projection around the zones' mean latitude. Zones too large
 * for the grid are kept in a list that every query checks.
 */

import type { BoundingBox, RestrictedZone } from "@skyroute/types";
import { METERS_PER_DEG_LAT, metersPerDegLng } from "../geo/distance.js";
import type { SpatialIndex } from "./feasibility.js";
import { boxesOverlap, zoneBounds } from "./zone-geometry.js";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 500;

/** Zones covering more cells than this skip the grid */
const MAX_CELLS_PER_ZONE = 10_000;

interface IndexedZone {
  zone: RestrictedZone;
  bounds: BoundingBox;
  order: number;
}

interface CellRange {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export class ZoneSpatialIndex implements SpatialIndex {
  /** cell key -> load order of the zones in it; ids need not be unique */
  private grid = new Map<string, Set<number>>();
  private entries: IndexedZone[] = [];
  private oversized = new Set<number>();
  /** Cells that hold any zone; queries never scan beyond them */
  private extent: CellRange | null = null;
  private cellSize: number;
  private metersPerDegLng: number;

  constructor(zones: RestrictedZone[], cellSizeMeters: number = DEFAULT_CELL_SIZE) {
    this.cellSize = cellSizeMeters;

    let sumLat = 0;
    let count = 0;
    const bounded: IndexedZone[] = [];
    for (const zone of zones) {
      const bounds = zoneBounds(zone);
      if (!bounds) continue;
      bounded.push({ zone, bounds, order: bounded.length });
      sumLat += (bounds.minLat + bounds.maxLat) / 2;
      count++;
    }
    const midLat = count > 0 ? sumLat / count : 0;
    this.metersPerDegLng = metersPerDegLng(midLat);

    for (const entry of bounded) this.insert(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Zones whose bounding box overlaps the query box, in load order */
  query(bbox: BoundingBox): RestrictedZone[] {
    const found = new Set<number>(this.oversized);
    const range = this.clampToExtent(this.cellRange(bbox));
    if (range) {
      for (let x = range.minX; x <= range.maxX; x++) {
        for (let y = range.minY; y <= range.maxY; y++) {
          const set = this.grid.get(`${x},${y}`);
          if (set) {
            for (const order of set) found.add(order);
          }
        }
      }
    }

    const hits: IndexedZone[] = [];
    for (const order of found) {
      const entry = this.entries[order];
      if (entry && boxesOverlap(entry.bounds, bbox)) hits.push(entry);
    }
    return hits.sort((a, b) => a.order - b.order).map((entry) => entry.zone);
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private insert(entry: IndexedZone): void {
    const { bounds, order } = entry;
    this.entries[order] = entry;

    const range = this.cellRange(bounds);
    if ((range.maxX - range.minX + 1) * (range.maxY - range.minY + 1) > MAX_CELLS_PER_ZONE) {
      this.oversized.add(order);
      return;
    }

    for (let x = range.minX; x <= range.maxX; x++) {
      for (let y = range.minY; y <= range.maxY; y++) {
        const key = `${x},${y}`;
        let set = this.grid.get(key);
        if (!set) {
          set = new Set();
          this.grid.set(key, set);
        }
        set.add(order);
      }
    }

    this.extent = this.extent
      ? {
          minX: Math.min(this.extent.minX, range.minX),
          maxX: Math.max(this.extent.maxX, range.maxX),
          minY: Math.min(this.extent.minY, range.minY),
          maxY: Math.max(this.extent.maxY, range.maxY),
        }
      : range;
  }

  private cellRange(bbox: BoundingBox): CellRange {
    const [minX, minY] = this.cellCoords(bbox.minLat, bbox.minLng);
    const [maxX, maxY] = this.cellCoords(bbox.maxLat, bbox.maxLng);
    return { minX, maxX, minY, maxY };
  }

  /** Intersection with the occupied cells; null when they do not meet */
  private clampToExtent(range: CellRange): CellRange | null {
    const extent = this.extent;
    if (!extent) return null;
    const clamped = {
      minX: Math.max(range.minX, extent.minX),
      maxX: Math.min(range.maxX, extent.maxX),
      minY: Math.max(range.minY, extent.minY),
      maxY: Math.min(range.maxY, extent.maxY),
    };
    return clamped.minX <= clamped.maxX && clamped.minY <= clamped.maxY ? clamped : null;
  }

  private cellCoords(lat: number, lng: number): [number, number] {
    const mx = lng * this.metersPerDegLng;
    const my = lat * METERS_PER_DEG_LAT;
    return [Math.floor(mx / this.cellSize), Math.floor(my / this.cellSize)];
  }
}
