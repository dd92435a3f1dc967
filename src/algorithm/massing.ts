/**
 * Massing
 *
 * Stacks footprints into floors: one ring per floor, each raised by the
 * floor-to-floor height.
 */

import { Point3 } from '../types/geometry';
import { PlanLayout } from './types';
import { flattenPoints } from '../geometry/point';
import { footprintCorners } from '../geometry/rectangle';
import defaultLayoutData from './data/default-layout.json';

/**
 * Per-floor rectangular rings for one building, flattened as
 * [x, y, z] x 4 corners (bottom-left, bottom-right, top-right, top-left).
 */
export function buildingFloorRings(
  center: Point3,
  width: number,
  depth: number,
  floors: number,
  floorHeight: number,
  baseZ: number = center.z
): number[][] {
  const rings: number[][] = [];

  for (let floor = 0; floor < floors; floor++) {
    const z = baseZ + floor * floorHeight;
    rings.push(flattenPoints(footprintCorners({ center, width, depth }, z)));
  }

  return rings;
}

export interface ExtrudedFloor {
  vertices: Point3[];
  height: number;
  /** Elevation of this floor's slab */
  zLevel: number;
}

export interface ExtrudedBuilding {
  floors: ExtrudedFloor[];
  totalHeight: number;
  basePolygon: Point3[];
}

/**
 * Extrudes an arbitrary base polygon through a sequence of floor heights
 */
export function extrudeFootprint(
  basePolygon: readonly Point3[],
  floorHeights: readonly number[],
  baseZ: number = 0
): ExtrudedBuilding {
  const floors: ExtrudedFloor[] = [];
  let z = baseZ;

  for (const height of floorHeights) {
    floors.push({
      vertices: basePolygon.map(p => ({ x: p.x, y: p.y, z })),
      height,
      zLevel: z
    });
    z += height;
  }

  return {
    floors,
    totalHeight: z - baseZ,
    basePolygon: [...basePolygon]
  };
}

/**
 * The fixed placeholder layout (two small buildings on an 80 x 50 site)
 * offered to callers when generation fails unexpectedly.
 * Returns a fresh copy on each call.
 */
export function defaultLayout(): PlanLayout {
  return {
    buildingLayersHeights: defaultLayoutData.buildingLayersHeights.map(h => [...h]),
    buildingLayersVertices: defaultLayoutData.buildingLayersVertices.map(b => b.map(r => [...r])),
    subSiteVertices: defaultLayoutData.subSiteVertices.map(v => [...v]),
    subSiteSetbackVertices: defaultLayoutData.subSiteSetbackVertices.map(v => [...v])
  };
}
