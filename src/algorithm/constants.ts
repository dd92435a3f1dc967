/**
 * Site Layout Kernel - Constants
 * Default values and configuration
 *
 * ALL VALUES ARE IN METERS
 */

import { BuildingStyle, KernelOptions, PlacementStrategy } from './types';

// ============================================================================
// TOLERANCES
// ============================================================================

/** Default tolerance for every geometric comparison */
export const DEFAULT_TOLERANCE = 1e-6;

/** Accepted tolerance window; caller values outside it are clamped */
export const MIN_TOLERANCE = 1e-10;
export const MAX_TOLERANCE = 1e-3;

/** Minimum cross-product length for three points to define a plane */
export const PLANE_DETECTION_THRESHOLD = 1e-6;

/** Orientations at or below this magnitude are treated as "no rotation" */
export const ORIENTATION_EPSILON = 1e-6;

// ============================================================================
// INPUT SHAPE
// ============================================================================

export const COORDINATES_PER_VERTEX = 3;
export const MIN_VERTEX_COUNT = 3;
export const MIN_FLAT_VALUES = COORDINATES_PER_VERTEX * MIN_VERTEX_COUNT;

// ============================================================================
// PARAMETRIC DESIGN RULES
// ============================================================================

/**
 * Footprint sizing. Width and depth scale linearly with density:
 * width 14-26m, depth 12-22m.
 */
export const FOOTPRINT_SIZING = {
  baseSize: 20.0,
  widthBase: 0.7,
  widthDensityFactor: 0.6,
  depthBase: 0.6,
  depthDensityFactor: 0.5
} as const;

/** Site area per building is footprint x this factor (room for spacing) */
export const SPACING_AREA_FACTOR = 2;

export const MAX_BUILDINGS = 8;
export const MIN_FLOORS = 2;
export const MAX_FLOORS = 15;

/** Floor count used when the footprint area is zero */
export const FALLBACK_FLOORS = 3;

/** Floor-to-floor height (m) per building style */
export const FLOOR_HEIGHTS: Record<BuildingStyle, number> = {
  [BuildingStyle.Residential]: 3.0,
  [BuildingStyle.Office]: 3.5,
  [BuildingStyle.Commercial]: 4.0,
  [BuildingStyle.Mixed]: 3.2
};

export const DEFAULT_FLOOR_HEIGHT = FLOOR_HEIGHTS[BuildingStyle.Residential];

/** Density thresholds selecting the placement strategy */
export const DENSITY_THRESHOLDS = {
  scatterBelow: 0.3,
  jitteredGridBelow: 0.7
} as const;

/** Spacing (m) between footprints per placement strategy */
export const STRATEGY_SPACING: Record<PlacementStrategy, number> = {
  scatter: 15.0,
  'jittered-grid': 8.0,
  'tight-grid': 5.0
};

/** Jitter (m) applied on each axis in the medium-density grid */
export const GRID_JITTER = 3.0;

// ============================================================================
// PLACEMENT ENGINE
// ============================================================================

export const DEFAULT_SCATTER_SPACING = 5.0;
export const DEFAULT_GRID_SPACING = 10.0;

/** Scatter attempts allowed per requested building */
export const SCATTER_ATTEMPTS_PER_BUILDING = 200;

/** Upper bound on grid cells swept for one site */
export const MAX_GRID_CELLS = 250_000;

// ============================================================================
// SETBACK
// ============================================================================

/** Setback distance = base + density x factor */
export const SETBACK_RULE = {
  base: 3.0,
  densityFactor: 2.0
} as const;

/** Setback ring is raised above the site plane by this much */
export const SETBACK_Z_OFFSET = 0.2;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_KERNEL_OPTIONS: KernelOptions = {
  tolerance: DEFAULT_TOLERANCE
};

export const ENGINE_NAME = 'Site Layout Kernel';
export const ENGINE_VERSION = '0.1.0';
