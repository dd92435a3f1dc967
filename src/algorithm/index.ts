/**
 * Site Layout Kernel - Algorithm Module
 *
 * Exports all public APIs for plan generation and geometry operations
 */

// Types - use 'export type' for type-only exports
export { BuildingStyle } from './types';
export type {
  DesignParameters,
  DesignResult,
  GeneratedPlan,
  KernelFailure,
  KernelFailureKind,
  KernelOptions,
  KernelResult,
  PlacementStrategy,
  PlanGenerationResult,
  PlanLayout,
  PlanParameterInput,
  SiteParameters
} from './types';

// Constants
export {
  DEFAULT_TOLERANCE,
  MIN_TOLERANCE,
  MAX_TOLERANCE,
  FLOOR_HEIGHTS,
  MAX_BUILDINGS,
  MIN_FLOORS,
  MAX_FLOORS,
  SETBACK_Z_OFFSET,
  DEFAULT_KERNEL_OPTIONS
} from './constants';

// Errors and options
export { InputShapeError, GeometryKernelError } from './errors';
export type { InputShapeErrorCode } from './errors';
export { resolveKernelOptions, clampTolerance } from './config';

// Site parameters
export {
  parseFlatVertices,
  resolveDesignParameters,
  buildSiteParameters,
  DEFAULT_DESIGN_PARAMETERS
} from './site-parameters';

// Placement and design rules
export { scatterPlacements, gridPlacements, footprintInside } from './placement';
export type { ScatterOptions, ScatterResult } from './placement';
export {
  applySiteParameters,
  footprintSize,
  buildingCount,
  floorsPerBuilding,
  floorHeightFor,
  placementStrategyFor
} from './parametric-design';

// Massing
export { buildingFloorRings, extrudeFootprint, defaultLayout } from './massing';
export type { ExtrudedBuilding, ExtrudedFloor } from './massing';

// Generator
export { generatePlan, setbackDistance } from './generator';

// Operations
export {
  analyzeGeometry,
  validateGeometry,
  offsetGeometry,
  testPolygonIntersection,
  describeKernel
} from './operations';
export type {
  GeometryAnalysis,
  GeometryValidation,
  GeometryOffset,
  OffsetDirection,
  IntersectionType,
  PolygonIntersectionTest,
  ValidationOptions,
  KernelDescription
} from './operations';

// Random source
export { createRandomSource } from './utils/random';
export type { RandomSource } from './utils/random';
