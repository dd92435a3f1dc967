/**
 * Geometry operations exposed next to plan generation:
 * analysis, validation, offset and polygon-polygon intersection tests.
 *
 * Each takes flat [x, y, z, ...] arrays and answers with a KernelResult.
 */

import { Point3 } from '../types/geometry';
import { KernelOptions, KernelResult } from './types';
import { ENGINE_NAME, ENGINE_VERSION, MAX_TOLERANCE, MIN_TOLERANCE } from './constants';
import { resolveKernelOptions } from './config';
import { InputShapeError, runGuarded } from './errors';
import { parseFlatVertices } from './site-parameters';
import { Logger } from './utils/logger';
import { flattenPoints } from '../geometry/point';
import { signedDistanceToPlane } from '../geometry/plane';
import {
  closeRing,
  detectPlane,
  dominantOrientation,
  getSegments,
  isClosed,
  isValidPolyline,
  makeClosed,
  pointInPolygon2d,
  polylineArea,
  polylineCentroid,
  polylineFromFlat,
  polylineLength,
  ringVertices
} from '../geometry/polyline';
import { hasSelfIntersection, linePolylineIntersections } from '../geometry/intersection';
import { OffsetStrategyName, offsetWithFallback } from '../geometry/offset';

const log = Logger.scoped('operations');

// ============================================================================
// ANALYSIS
// ============================================================================

export interface GeometryAnalysis {
  area: number;
  perimeter: number;
  isClosed: boolean;
  isValid: boolean;
  /** Vertex-average centroid; undefined for an open polyline */
  centroid: Point3 | undefined;
  /** Angle (radians) of the longest edge */
  mainOrientation: number;
  pointCount: number;
}

/**
 * Measures a polyline as given (no closing is attempted)
 */
export function analyzeGeometry(
  vertices: unknown,
  options: Partial<KernelOptions> = {}
): KernelResult<GeometryAnalysis> {
  return runGuarded(() => {
    const { tolerance } = resolveKernelOptions(options);
    const polyline = polylineFromFlat(parseFlatVertices(vertices));

    return {
      area: polylineArea(polyline, tolerance),
      perimeter: polylineLength(polyline),
      isClosed: isClosed(polyline, tolerance),
      isValid: isValidPolyline(polyline, tolerance),
      centroid: polylineCentroid(polyline, tolerance),
      mainOrientation: dominantOrientation(polyline),
      pointCount: polyline.points.length
    };
  });
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface ValidationOptions {
  tolerance?: number;
  checkClosure?: boolean;
  checkSelfIntersection?: boolean;
  checkPlanarity?: boolean;
}

export interface GeometryValidation {
  /** No errors (warnings allowed) */
  isValid: boolean;
  errors: string[];
  warnings: string[];
  /** 0 when the polygon cannot be closed */
  polygonArea: number;
  polygonPerimeter: number;
  isClosed: boolean;
  isPlanar: boolean;
  selfIntersects: boolean;
}

/**
 * Validates a polygon: closes it within tolerance, then checks
 * self-intersection (an error), closure and planarity (warnings).
 * A disabled check reports its optimistic value.
 */
export function validateGeometry(
  vertices: unknown,
  options: ValidationOptions = {}
): KernelResult<GeometryValidation> {
  return runGuarded(() => {
    const { tolerance } = resolveKernelOptions({ tolerance: options.tolerance });
    const raw = polylineFromFlat(parseFlatVertices(vertices));
    const errors: string[] = [];
    const warnings: string[] = [];

    const closure = makeClosed(raw, tolerance);
    const polyline = closure.polyline;
    if (!closure.closed && options.checkClosure !== false) {
      warnings.push('Polygon is not closed');
    }

    let selfIntersects = false;
    if (options.checkSelfIntersection !== false) {
      selfIntersects = hasSelfIntersection(polyline, tolerance);
      if (selfIntersects) errors.push('Polygon self-intersects');
    }

    let isPlanar = true;
    if (options.checkPlanarity !== false) {
      const plane = detectPlane(polyline);
      isPlanar = plane !== undefined &&
        polyline.points.every(p => Math.abs(signedDistanceToPlane(plane, p)) <= tolerance);
      if (!isPlanar) warnings.push('Polygon is not planar');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
      polygonArea: closure.closed ? polylineArea(polyline, tolerance) : 0,
      polygonPerimeter: polylineLength(polyline),
      isClosed: closure.closed,
      isPlanar,
      selfIntersects
    };
  });
}

// ============================================================================
// OFFSET
// ============================================================================

export type OffsetDirection = 'inward' | 'outward';

export type GeometryOffset =
  | { success: true; offsetVertices: number[]; strategy: OffsetStrategyName; fallbackUsed: boolean }
  | { success: false; errorMessage: string };

/**
 * Offsets a polygon that closes within tolerance, trying the offset tiers in order
 */
export function offsetGeometry(
  vertices: unknown,
  offsetDistance: number,
  direction: OffsetDirection = 'inward',
  options: Partial<KernelOptions> = {}
): KernelResult<GeometryOffset> {
  return runGuarded((): GeometryOffset => {
    const { tolerance } = resolveKernelOptions(options);
    const raw = polylineFromFlat(parseFlatVertices(vertices));

    if (!Number.isFinite(offsetDistance)) {
      return { success: false, errorMessage: 'Offset distance must be a finite number' };
    }

    const closure = makeClosed(raw, tolerance);
    if (!closure.closed) {
      return { success: false, errorMessage: 'Cannot close polygon within tolerance' };
    }

    const signed = direction === 'inward' ? offsetDistance : -offsetDistance;
    const result = offsetWithFallback(closure.polyline, signed, tolerance);

    if (result.status === 'failed') {
      log.debug(`offset of ${signed} failed in every tier`);
      return { success: false, errorMessage: 'Unable to create valid offset polygon' };
    }

    return {
      success: true,
      offsetVertices: flattenPoints(result.polyline.points),
      strategy: result.strategy,
      fallbackUsed: result.fallbackUsed
    };
  });
}

// ============================================================================
// POLYGON-POLYGON INTERSECTION TEST
// ============================================================================

export type IntersectionType =
  | 'separate'
  | 'a_inside_b'
  | 'b_inside_a'
  | 'overlap'
  | 'edge_intersection'
  | 'invalid';

export interface PolygonIntersectionTest {
  intersects: boolean;
  intersectionType: IntersectionType;
  /** Edge crossings, only reported for 'edge_intersection' */
  intersectionPoints: Point3[];
}

function ringFromFlat(vertices: unknown, tolerance: number): Point3[] | undefined {
  try {
    return ringVertices(polylineFromFlat(parseFlatVertices(vertices)), tolerance);
  } catch (error) {
    if (error instanceof InputShapeError && error.code === 'TOO_FEW_VALUES') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Classifies how two polygons relate, by vertex containment first and
 * edge crossings second. Fewer than 3 vertices on either side is 'invalid'.
 */
export function testPolygonIntersection(
  verticesA: unknown,
  verticesB: unknown,
  options: Partial<KernelOptions> = {}
): KernelResult<PolygonIntersectionTest> {
  return runGuarded((): PolygonIntersectionTest => {
    const { tolerance } = resolveKernelOptions(options);
    const ringA = ringFromFlat(verticesA, tolerance);
    const ringB = ringFromFlat(verticesB, tolerance);

    if (!ringA || !ringB || ringA.length < 3 || ringB.length < 3) {
      return { intersects: false, intersectionType: 'invalid', intersectionPoints: [] };
    }

    const aInB = ringA.filter(p => pointInPolygon2d(p, ringB)).length;
    const bInA = ringB.filter(p => pointInPolygon2d(p, ringA)).length;

    if (aInB > 0 || bInA > 0) {
      let intersectionType: IntersectionType = 'overlap';
      if (aInB === ringA.length) intersectionType = 'a_inside_b';
      else if (bInA === ringB.length) intersectionType = 'b_inside_a';
      return { intersects: true, intersectionType, intersectionPoints: [] };
    }

    const polylineB = closeRing({ points: ringB }, tolerance);
    const intersectionPoints: Point3[] = [];

    for (const edge of getSegments(closeRing({ points: ringA }, tolerance))) {
      for (const hit of linePolylineIntersections(edge, polylineB, tolerance)) {
        intersectionPoints.push(hit.point);
      }
    }

    if (intersectionPoints.length > 0) {
      return { intersects: true, intersectionType: 'edge_intersection', intersectionPoints };
    }

    return { intersects: false, intersectionType: 'separate', intersectionPoints: [] };
  });
}

// ============================================================================
// ENGINE INFO
// ============================================================================

export interface KernelDescription {
  geometryEngine: string;
  version: string;
  capabilities: string[];
  supportedOperations: string[];
  coordinateSystem: string;
  precision: string;
  toleranceRange: [number, number];
}

export function describeKernel(): KernelDescription {
  return {
    geometryEngine: ENGINE_NAME,
    version: ENGINE_VERSION,
    capabilities: [
      'Polygon validation',
      'Self-intersection detection',
      'Point-in-polygon testing',
      'Polygon offsetting',
      'Basic intersection testing',
      'Ear-clipping triangulation',
      'Area and perimeter calculation',
      'Building placement algorithms',
      'Parametric urban design'
    ],
    supportedOperations: [
      'generatePlan',
      'analyzeGeometry',
      'validateGeometry',
      'offsetGeometry',
      'testPolygonIntersection'
    ],
    coordinateSystem: '3D Cartesian (X, Y, Z)',
    precision: 'IEEE 754 double precision',
    toleranceRange: [MIN_TOLERANCE, MAX_TOLERANCE]
  };
}
