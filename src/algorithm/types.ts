/**
 * Site Layout Kernel - Algorithm Types
 * Types for the parametric layout pipeline
 *
 * ## Pipeline
 *
 * flat vertices + parameter record
 *   -> SiteParameters (immutable, defaults merged with validated overrides)
 *   -> DesignResult (positions, footprint, floors)
 *   -> PlanLayout (flattened rings for the caller)
 *
 * Every public entry point answers with a `KernelResult`; nothing throws past it.
 */

import { BoundingBox, Point3, Polyline } from '../types/geometry';

// ============================================================================
// SITE PARAMETERS
// ============================================================================

/**
 * Building style, driving the floor-to-floor height
 */
export enum BuildingStyle {
  Residential = 0,
  Office = 1,
  Commercial = 2,
  Mixed = 3
}

/**
 * Parameter record as received from the request layer.
 * Field names follow the wire format; every field is optional and
 * an invalid value is ignored rather than rejected.
 */
export interface PlanParameterInput {
  site_type?: unknown;
  far?: unknown;
  density?: unknown;
  mix_ratio?: unknown;
  building_style?: unknown;
  /** Degrees, 0-180 */
  orientation?: unknown;
}

/**
 * Resolved design parameters (no geometry)
 */
export interface DesignParameters {
  /** 0-4 */
  readonly siteType: number;
  /** 0.0-1.0 */
  readonly density: number;
  /** Floor-area ratio, 0.0-10.0 */
  readonly far: number;
  /** 0.0-1.0, carried through for the caller; no rule consumes it yet */
  readonly mixRatio: number;
  readonly buildingStyle: BuildingStyle;
  /**
   * Rotation in radians applied to building positions.
   * Defaults to the site's dominant-edge orientation when no override is given.
   */
  readonly orientation: number;
}

/**
 * Per-request site description. Constructed once, never mutated.
 */
export interface SiteParameters extends DesignParameters {
  /** Site boundary, closed */
  readonly boundary: Polyline;
  /** Shoelace area of the boundary */
  readonly area: number;
  /** Angle (radians) of the longest boundary edge */
  readonly dominantOrientation: number;
  readonly bounds: BoundingBox;
  /** Whether the input ring had to be closed by the kernel */
  readonly closedByKernel: boolean;
}

// ============================================================================
// KERNEL OPTIONS
// ============================================================================

/**
 * Per-call tunables
 */
export interface KernelOptions {
  /** Geometric tolerance; clamped into [1e-10, 1e-3] */
  tolerance: number;
  /** Seed for scatter placement and grid jitter; random per request when omitted */
  seed?: number;
  /** Cap on scatter attempts; defaults to a multiple of the requested count */
  maxScatterAttempts?: number;
}

// ============================================================================
// DESIGN RESULT
// ============================================================================

export type PlacementStrategy = 'scatter' | 'jittered-grid' | 'tight-grid';

/**
 * Output of the parametric design rule engine
 */
export interface DesignResult {
  /** Footprint centers */
  positions: Point3[];
  /** Shared footprint width (x extent) */
  buildingWidth: number;
  /** Shared footprint depth (y extent) */
  buildingDepth: number;
  floorsPerBuilding: number;
  floorHeight: number;
  strategy: PlacementStrategy;
  /** Building count the rules asked for */
  requestedCount: number;
  /** Building count actually placed (may be lower) */
  placedCount: number;
  /** positions x floors x footprint area */
  totalFloorArea: number;
}

// ============================================================================
// PLAN LAYOUT (wire shape)
// ============================================================================

/**
 * Flattened layout handed back to the request layer
 */
export interface PlanLayout {
  /** Per building, per floor heights */
  buildingLayersHeights: number[][];
  /** Per building, per floor ring of 4 corners x (x, y, z) */
  buildingLayersVertices: number[][][];
  /** Site boundary(ies), flattened */
  subSiteVertices: number[][];
  /** Setback boundary(ies), flattened, raised above the site plane */
  subSiteSetbackVertices: number[][];
}

/**
 * Successful plan generation
 */
export interface GeneratedPlan {
  layout: PlanLayout;
  site: SiteParameters;
  design: DesignResult;
  /** Which offset tier produced the setback, if any */
  setbackStrategy: 'offset' | 'inset' | 'none';
  /** Degenerate-geometry conditions resolved by a fallback */
  warnings: string[];
}

// ============================================================================
// RESULTS
// ============================================================================

export type KernelFailureKind = 'input-shape' | 'internal';

export interface KernelFailure {
  kind: KernelFailureKind;
  code: string;
  message: string;
}

/**
 * Outcome of a public entry point.
 * `rejected` = the input never reached the geometry; `failed` = an unexpected fault.
 */
export type KernelResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'rejected'; error: KernelFailure }
  | { status: 'failed'; error: KernelFailure };

/**
 * Plan generation additionally offers the placeholder layout on internal failure
 */
export type PlanGenerationResult =
  | { status: 'ok'; value: GeneratedPlan }
  | { status: 'rejected'; error: KernelFailure }
  | { status: 'failed'; error: KernelFailure; fallback: PlanLayout };
