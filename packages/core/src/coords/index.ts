/**
 * Coordinate frames and box geometry
 *
 * Canonical internal vertical coordinate: depth below the road surface in
 * meters (positive downward, air above the surface is negative). The solver
 * only accepts non-negative coordinates, so every depth is mapped through a
 * VerticalFrame before it is emitted.
 */

import type { VerticalFrameKind } from '@roadvoid/shared';

// ============================================================================
// Coordinate Types
// ============================================================================

/** 3D point in meters */
export interface Point3D {
  x: number;
  y: number;
  z: number;
}

/** Axis-aligned box given by its lower and upper corners */
export interface Box3D {
  min: Point3D;
  max: Point3D;
}

/** Closed interval [min, max] */
export interface Interval {
  min: number;
  max: number;
}

/** Vertical extent of the scene used to build a frame */
export interface VerticalExtent {
  /** Air thickness above the road surface (m) */
  airThickness: number;
  /** Air plus road, i.e. the domain height (m) */
  totalDepth: number;
}

// ============================================================================
// Vertical Frames
// ============================================================================

/**
 * Create the mapping from depth below the road surface to solver z.
 *
 * - 'surface-relative': z = depth + airThickness. The air layer occupies
 *   [0, airThickness] and z grows with depth.
 * - 'depth-from-bottom': z = (totalDepth - airThickness) - depth. z = 0 is
 *   the subgrade floor and z grows toward the air.
 */
export function createVerticalFrame(kind: VerticalFrameKind, extent: VerticalExtent) {
  const roadDepth = extent.totalDepth - extent.airThickness;
  const offset = kind === 'surface-relative' ? extent.airThickness : 0;

  const toSolverZ = (depth: number): number =>
    kind === 'surface-relative' ? depth + offset : roadDepth - depth;

  return {
    kind,
    /** Constant added to depths in the surface-relative frame, 0 otherwise */
    offset,
    /** Depth of the road below the surface, excluding air (m) */
    roadDepth,

    /** Solver z of the road surface, where the antenna sits */
    surfaceZ: toSolverZ(0),

    toSolverZ,

    /**
     * Convert a depth interval to a solver z interval (min <= max)
     */
    toSolverInterval(topDepth: number, bottomDepth: number): Interval {
      const a = toSolverZ(topDepth);
      const b = toSolverZ(bottomDepth);
      return { min: Math.min(a, b), max: Math.max(a, b) };
    },

    /**
     * Convert a box whose z axis holds depths into solver coordinates
     */
    toSolverBox(box: Box3D): Box3D {
      const z = this.toSolverInterval(box.min.z, box.max.z);
      return {
        min: { x: box.min.x, y: box.min.y, z: z.min },
        max: { x: box.max.x, y: box.max.y, z: z.max },
      };
    },
  };
}

export type VerticalFrame = ReturnType<typeof createVerticalFrame>;

// ============================================================================
// Box Functions
// ============================================================================

/**
 * Create a box centered on a point
 */
export function boxFromCenter(center: Point3D, size: Point3D): Box3D {
  return {
    min: { x: center.x - size.x / 2, y: center.y - size.y / 2, z: center.z - size.z / 2 },
    max: { x: center.x + size.x / 2, y: center.y + size.y / 2, z: center.z + size.z / 2 },
  };
}

/**
 * Get the center of a box
 */
export function boxCenter(box: Box3D): Point3D {
  return {
    x: (box.min.x + box.max.x) / 2,
    y: (box.min.y + box.max.y) / 2,
    z: (box.min.z + box.max.z) / 2,
  };
}

/**
 * Get the edge lengths of a box
 */
export function boxSize(box: Box3D): Point3D {
  return {
    x: box.max.x - box.min.x,
    y: box.max.y - box.min.y,
    z: box.max.z - box.min.z,
  };
}

/**
 * Check if a box lies inside another. Exact unless a tolerance is given.
 */
export function boxContains(outer: Box3D, inner: Box3D, epsilon = 0): boolean {
  return (
    inner.min.x >= outer.min.x - epsilon &&
    inner.min.y >= outer.min.y - epsilon &&
    inner.min.z >= outer.min.z - epsilon &&
    inner.max.x <= outer.max.x + epsilon &&
    inner.max.y <= outer.max.y + epsilon &&
    inner.max.z <= outer.max.z + epsilon
  );
}

/**
 * Intersect two boxes. Returns null when they share no volume.
 */
export function intersectBoxes(a: Box3D, b: Box3D): Box3D | null {
  const min = {
    x: Math.max(a.min.x, b.min.x),
    y: Math.max(a.min.y, b.min.y),
    z: Math.max(a.min.z, b.min.z),
  };
  const max = {
    x: Math.min(a.max.x, b.max.x),
    y: Math.min(a.max.y, b.max.y),
    z: Math.min(a.max.z, b.max.z),
  };
  if (min.x >= max.x || min.y >= max.y || min.z >= max.z) return null;
  return { min, max };
}
