/**
 * Grid Map Generator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { generateGridMap, gridColonyName } from '../../src/core/map-generator';
import { formatMap } from '../../src/core/map-format';
import { SeededRandom } from '../../src/core/random';
import { InvalidConfigurationError } from '../../src/core/errors';
import { createScriptedRandom } from '../mocks';

describe('generateGridMap', () => {
  it('should connect every orthogonal neighbour both ways at full density', () => {
    const random = createScriptedRandom(0.5);
    const graph = generateGridMap({ width: 2, height: 2, random });

    expect(formatMap(graph)).toEqual([
      'R0C0 south=R1C0 east=R0C1',
      'R0C1 south=R1C1 west=R0C0',
      'R1C0 north=R0C0 east=R1C1',
      'R1C1 north=R0C1 west=R1C0',
    ]);
    expect(random.draws).toBe(0);
  });

  it('should keep a tunnel only when its roll is below the density', () => {
    const graph = generateGridMap({ width: 2, height: 2, density: 0.5, random: createScriptedRandom(0.2, 0.7) });

    expect(formatMap(graph)).toEqual([
      'R0C0 south=R1C0',
      'R0C1 south=R1C1',
      'R1C0 north=R0C0',
      'R1C1 north=R0C1',
    ]);
  });

  it('should produce no tunnels at zero density', () => {
    const graph = generateGridMap({ width: 3, height: 1, density: 0, random: createScriptedRandom(0) });
    expect(graph.colonies()).toEqual(['R0C0', 'R0C1', 'R0C2']);
    expect(graph.edgeCount()).toBe(0);
  });

  it('should count tunnels of a larger grid', () => {
    const graph = generateGridMap({ width: 10, height: 5, random: new SeededRandom('grid') });
    // 2 * (rows * (cols - 1) + cols * (rows - 1))
    expect(graph.colonyCount()).toBe(50);
    expect(graph.edgeCount()).toBe(2 * (5 * 9 + 10 * 4));
    expect(graph.exists(gridColonyName(9, 4))).toBe(true);
  });

  it('should replay a sparse grid for the same seed', () => {
    const a = generateGridMap({ width: 6, height: 6, density: 0.4, random: new SeededRandom('test-seed') });
    const b = generateGridMap({ width: 6, height: 6, density: 0.4, random: new SeededRandom('test-seed') });
    expect(formatMap(a)).toEqual(formatMap(b));
  });

  it('should reject bad sizes and densities', () => {
    const random = createScriptedRandom(0);
    expect(() => generateGridMap({ width: 0, height: 2, random }))
      .toThrow('grid size must be positive integers, got 0x2');
    expect(() => generateGridMap({ width: 2, height: 2, density: 1.5, random }))
      .toThrow(InvalidConfigurationError);
    expect(() => generateGridMap({ width: 2, height: 2, density: Number.NaN, random }))
      .toThrow('density must be between 0 and 1, got NaN');
  });
});
