/**
 * Site Layout Kernel - Plan Generator
 *
 * The single entry point of the layout pipeline:
 *
 *   flat vertices + parameter record
 *     -> SiteParameters
 *     -> parametric design (placement, floors)
 *     -> massing rings + site boundary + setback
 *
 * Never throws. Input-shape problems come back as `rejected`; unexpected
 * faults as `failed` together with the placeholder layout.
 */

import {
  DesignResult,
  GeneratedPlan,
  KernelOptions,
  PlanGenerationResult,
  PlanLayout,
  PlanParameterInput,
  SiteParameters
} from './types';
import { SETBACK_RULE, SETBACK_Z_OFFSET } from './constants';
import { resolveKernelOptions } from './config';
import { GeometryKernelError, toKernelFailure } from './errors';
import { buildSiteParameters, parseFlatVertices } from './site-parameters';
import { applySiteParameters } from './parametric-design';
import { buildingFloorRings, defaultLayout } from './massing';
import { createRandomSource } from './utils/random';
import { Logger } from './utils/logger';
import { flattenPoints } from '../geometry/point';
import { offsetWithFallback } from '../geometry/offset';

const log = Logger.scoped('generator');

/**
 * Setback distance grows with density
 */
export function setbackDistance(density: number): number {
  return SETBACK_RULE.base + density * SETBACK_RULE.densityFactor;
}

interface SetbackOutcome {
  vertices: number[] | undefined;
  strategy: GeneratedPlan['setbackStrategy'];
  warning?: string;
}

function computeSetback(site: SiteParameters, tolerance: number): SetbackOutcome {
  const distance = setbackDistance(site.density);
  const result = offsetWithFallback(site.boundary, distance, tolerance);

  if (result.status === 'failed') {
    const reasons = result.attempts
      .map(a => (a.outcome.status === 'success' ? a.strategy : `${a.strategy}: ${a.outcome.reason}`))
      .join('; ');
    log.warn(`setback of ${distance}m failed (${reasons})`);
    return { vertices: undefined, strategy: 'none', warning: `setback of ${distance}m could not be built` };
  }

  const vertices = flattenPoints(result.polyline.points, SETBACK_Z_OFFSET);
  if (result.fallbackUsed) {
    log.warn(`setback of ${distance}m fell back to ${result.strategy}`);
    return { vertices, strategy: result.strategy, warning: `setback built with ${result.strategy} fallback` };
  }

  return { vertices, strategy: result.strategy };
}

function assertFinite(design: DesignResult): void {
  const bad = design.positions.find(p => !Number.isFinite(p.x) || !Number.isFinite(p.y) || !Number.isFinite(p.z));
  if (bad || !Number.isFinite(design.totalFloorArea)) {
    throw new GeometryKernelError('design produced non-finite coordinates');
  }
}

function buildLayout(site: SiteParameters, design: DesignResult, setback: number[] | undefined): PlanLayout {
  const layout: PlanLayout = {
    buildingLayersHeights: [],
    buildingLayersVertices: [],
    subSiteVertices: [flattenPoints(site.boundary.points)],
    subSiteSetbackVertices: setback ? [setback] : []
  };

  for (const position of design.positions) {
    layout.buildingLayersHeights.push(new Array<number>(design.floorsPerBuilding).fill(design.floorHeight));
    layout.buildingLayersVertices.push(
      buildingFloorRings(
        position,
        design.buildingWidth,
        design.buildingDepth,
        design.floorsPerBuilding,
        design.floorHeight
      )
    );
  }

  return layout;
}

/**
 * Generates a building layout for a site polygon.
 *
 * @param vertices - flat [x, y, z, ...] array, at least 3 vertices
 * @param parameters - optional design parameters; invalid fields are ignored
 * @param options - tolerance, seed, scatter attempt cap
 */
export function generatePlan(
  vertices: unknown,
  parameters?: PlanParameterInput,
  options: Partial<KernelOptions> = {}
): PlanGenerationResult {
  try {
    const resolved = resolveKernelOptions(options);
    const flat = parseFlatVertices(vertices);
    log.info(`plan generation requested for ${flat.length / 3} vertices`);

    const { site, warnings } = buildSiteParameters(flat, parameters, resolved.tolerance);
    log.info(`site area=${site.area.toFixed(2)}, FAR=${site.far}, density=${site.density}`);

    const random = createRandomSource(resolved.seed);
    const design = applySiteParameters(site.boundary, site.area, site, random, {
      maxScatterAttempts: resolved.maxScatterAttempts,
      tolerance: resolved.tolerance
    });
    assertFinite(design);

    if (design.placedCount < design.requestedCount) {
      warnings.push(`placed ${design.placedCount} of ${design.requestedCount} requested buildings`);
    }

    const setback = computeSetback(site, resolved.tolerance);
    if (setback.warning) warnings.push(setback.warning);

    const layout = buildLayout(site, design, setback.vertices);
    log.info(`plan generated with ${design.placedCount} buildings (seed ${random.seed})`);

    return {
      status: 'ok',
      value: { layout, site, design, setbackStrategy: setback.strategy, warnings }
    };
  } catch (error) {
    const failure = toKernelFailure(error);
    if (failure.kind === 'input-shape') {
      log.warn(`plan request rejected: ${failure.message}`);
      return { status: 'rejected', error: failure };
    }
    log.error(`plan generation failed: ${failure.message}`);
    return { status: 'failed', error: failure, fallback: defaultLayout() };
  }
}
