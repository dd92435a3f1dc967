/**
 * Geometry module - re-exports all geometry utilities
 */

export * from './point';
export * from './vector';
export * from './line';
export * from './plane';
export * from './rectangle';
export * from './polyline';
export * from './intersection';
export * from './offset';
export * from './triangulation';
export * from './boolean';
