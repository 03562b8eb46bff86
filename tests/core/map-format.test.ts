/**
 * Map Format Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { formatColony, formatMap, summarizeMap } from '../../src/core/map-format';
import { buildGraph } from '../mocks';

describe('Map format', () => {
  const graph = () => buildGraph(
    [
      ['Foo', 'north', 'Bar'],
      ['Foo', 'west', 'Baz'],
      ['Foo', 'south', 'Qux'],
      ['Bar', 'south', 'Foo'],
      ['Bar', 'west', 'Bee'],
      ['Baz', 'east', 'Foo'],
    ],
    ['Lone'],
  );

  it('should render a colony with its tunnels', () => {
    expect(formatColony(graph(), 'Foo')).toBe('Foo north=Bar west=Baz south=Qux');
    expect(formatColony(graph(), 'Bee')).toBe('Bee');
  });

  it('should drop destroyed colonies and the tunnels into them', () => {
    const g = graph();
    g.destroy('Bar');

    expect(formatMap(g)).toEqual([
      'Foo west=Baz south=Qux',
      'Baz east=Foo',
      'Qux',
      'Bee',
      'Lone',
    ]);
  });

  it('should summarize the shape of a map', () => {
    expect(summarizeMap(graph())).toEqual({
      colonies: 6,
      tunnels: 6,
      deadEnds: 3,
      oneWay: 2,
      isolated: 1,
    });
  });
});
