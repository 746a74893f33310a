/**
 * Unit tests for @roadvoid/core road module
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@roadvoid/shared';
import { validateConfig } from '../schema/index.js';
import {
  buildCrossSection,
  crossSectionFromConfig,
  domainFromConfig,
  layerIntervals,
  resolveMaterial,
  voidMaterialFromConfig,
  type Material,
} from './index.js';

function material(name: string, permittivity = 4): Material {
  return { name, permittivity, conductivity: 0, permeability: 1, magneticLoss: 0 };
}

const config = validateConfig({
  road: {
    airThickness: 0.5,
    surfaceAsphaltThickness: 0.05,
    baseAsphaltThickness: 0.15,
    upperSubbaseThickness: 0.2,
    lowerSubbaseThickness: 0.3,
    subgradeThickness: 0.8,
  },
  gpr: { frequency: 800, timeWindow: 25, spatialResolution: 0.005 },
  void: {
    initialXPositionRange: [0.5, 0.5],
    initialYPositionRange: [0.5, 0.5],
    initialDepthRange: [0.5, 0.5],
    initialSizeXRange: [0.1, 0.1],
    initialSizeYRange: [0.1, 0.1],
    initialSizeZRange: [0.05, 0.05],
    growthRateRange: [2, 2],
    upwardMovementRange: [0.2, 0.2],
  },
  materials: {
    air: 1,
    surfaceAsphalt: 6,
    baseAsphalt: { permittivity: 5, conductivity: 0.03 },
    upperSubbase: 8,
    lowerSubbase: 10,
    subgrade: { permittivity: 15, conductivity: 0.07, permeability: 1.1, magneticLoss: 0.001 },
    void: 1,
  },
  domain: { sizeX: 3, sizeY: 1.5 },
  generation: { numSequences: 1, stagesPerSequence: 3 },
});

describe('resolveMaterial', () => {
  it('uses per-layer conductivity for bare permittivities', () => {
    expect(resolveMaterial('surface_asphalt', 6)).toEqual({
      name: 'surface_asphalt',
      permittivity: 6,
      conductivity: 0.01,
      permeability: 1,
      magneticLoss: 0,
    });
    expect(resolveMaterial('subgrade', 15).conductivity).toBe(0.05);
  });

  it('keeps explicit properties', () => {
    expect(
      resolveMaterial('subgrade', { permittivity: 15, conductivity: 0.07, permeability: 1.1, magneticLoss: 0.001 })
    ).toEqual({ name: 'subgrade', permittivity: 15, conductivity: 0.07, permeability: 1.1, magneticLoss: 0.001 });
  });

  it('resolves the void material', () => {
    expect(voidMaterialFromConfig(config)).toEqual({
      name: 'void',
      permittivity: 1,
      conductivity: 0,
      permeability: 1,
      magneticLoss: 0,
    });
  });
});

describe('crossSectionFromConfig', () => {
  const section = crossSectionFromConfig(config);

  it('orders layers top to bottom', () => {
    expect(section.layers.map((l) => l.name)).toEqual([
      'air',
      'surface_asphalt',
      'base_asphalt',
      'upper_subbase',
      'lower_subbase',
      'subgrade',
    ]);
    expect(section.layers[2].material.conductivity).toBe(0.03);
  });

  it('sums depths', () => {
    expect(section.airThickness).toBe(0.5);
    expect(section.totalDepth).toBeCloseTo(2.0, 12);
    expect(section.roadDepth).toBeCloseTo(1.5, 12);
  });
});

describe('layerIntervals', () => {
  const intervals = layerIntervals(crossSectionFromConfig(config));

  it('starts with air above the surface', () => {
    expect(intervals[0]).toEqual({ name: 'air', topDepth: -0.5, bottomDepth: 0 });
  });

  it('leaves no gap or overlap between adjacent layers', () => {
    for (let i = 1; i < intervals.length; i++) {
      expect(intervals[i].topDepth).toBe(intervals[i - 1].bottomDepth);
      expect(intervals[i].bottomDepth).toBeGreaterThan(intervals[i].topDepth);
    }
  });

  it('ends at the road depth', () => {
    expect(intervals[intervals.length - 1].bottomDepth).toBeCloseTo(1.5, 12);
  });
});

describe('buildCrossSection', () => {
  it('rejects duplicate names and non-positive thickness together', () => {
    try {
      buildCrossSection([
        { name: 'air', thickness: 0.3, material: material('air', 1) },
        { name: 'base', thickness: 0, material: material('base') },
        { name: 'base', thickness: 0.2, material: material('base2') },
      ]);
      throw new Error('expected buildCrossSection to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({
        violations: ['layer base: thickness must be positive, got 0', 'layer base: duplicate layer name'],
      });
    }
  });

  it('requires air on top', () => {
    expect(() =>
      buildCrossSection([
        { name: 'base', thickness: 0.2, material: material('base') },
        { name: 'air', thickness: 0.3, material: material('air', 1) },
      ])
    ).toThrow('first layer must be air, got base');
  });

  it('rejects shared material names', () => {
    expect(() =>
      buildCrossSection([
        { name: 'air', thickness: 0.3, material: material('air', 1) },
        { name: 'upper', thickness: 0.2, material: material('gravel') },
        { name: 'lower', thickness: 0.2, material: material('gravel') },
      ])
    ).toThrow('material names must be unique across layers');
  });

  it('reserves the void material name', () => {
    expect(() =>
      buildCrossSection([
        { name: 'air', thickness: 0.3, material: material('air', 1) },
        { name: 'cavity', thickness: 0.2, material: material('void') },
      ])
    ).toThrow('material name "void" is reserved');
  });
});

describe('domainFromConfig', () => {
  it('derives the height from the cross-section', () => {
    const domain = domainFromConfig(config, crossSectionFromConfig(config));
    expect(domain.sizeX).toBe(3);
    expect(domain.sizeY).toBe(1.5);
    expect(domain.sizeZ).toBeCloseTo(2.0, 12);
    expect(domain.dx).toBe(0.005);
  });

  it('rejects a configured height that disagrees with the road', () => {
    const bad = { ...config, domain: { ...config.domain, sizeZ: 2.5 } };
    expect(() => domainFromConfig(bad, crossSectionFromConfig(bad))).toThrow(ConfigurationError);
  });
});
