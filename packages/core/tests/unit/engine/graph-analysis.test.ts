import { describe, expect, it } from 'vitest';
import {
  findCycle,
  findDanglingInputs,
  findFinalOutputs,
  findRoot,
  findRoots,
  validateGraph,
} from '../../../src/engine/graph-analysis.js';
import { buildGraph } from '../../../src/engine/graph-builder.js';
import type { BlockSpec, Connection } from '../../../src/types/workflow.js';

function block(name: string): BlockSpec {
  return { name, version: '', github: `acme/${name}`, force: false };
}

function conn(fromBlock: string, output: string, input = '', source = ''): Connection {
  return { fromBlock, fromEntry: 'run', output, input, source };
}

const chain = [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'x'), conn('c', 'z', 'y')];

describe('findRoots', () => {
  it('returns vertices without incoming edges in declaration order', () => {
    const graph = buildGraph(
      ['c', 'a', 'b'].map(block),
      [conn('a', 'x', '', 'a.txt'), conn('c', 'w', '', 'c.txt'), conn('b', 'y', 'x')],
    );
    expect(findRoots(graph)).toEqual(['c', 'a']);
    expect(findRoot(graph)).toBe('c');
  });

  it('throws when every vertex has an incoming edge', () => {
    const graph = buildGraph([block('a')], [conn('a', 'x', 'x')]);
    expect(findRoots(graph)).toEqual([]);
    expect(() => findRoot(graph)).toThrow('no root node found');
  });
});

describe('findCycle', () => {
  it('returns undefined for a DAG', () => {
    expect(findCycle(buildGraph(['a', 'b', 'c'].map(block), chain))).toBeUndefined();
  });

  it('returns the closed path of a cycle', () => {
    const graph = buildGraph(
      ['a', 'b', 'c'].map(block),
      [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'x'), conn('c', 'z', 'y'), conn('b', 'q', 'z')],
    );
    expect(findCycle(graph)).toEqual(['b', 'c', 'b']);
  });

  it('reports a self-loop', () => {
    expect(findCycle(buildGraph([block('a')], [conn('a', 'x', 'x')]))).toEqual(['a', 'a']);
  });
});

describe('label analysis', () => {
  it('finds inputs nothing produces', () => {
    expect(findDanglingInputs([conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'missing')])).toEqual([
      { block: 'b', label: 'missing' },
    ]);
  });

  it('finds outputs nothing consumes', () => {
    expect(findFinalOutputs([...chain, conn('a', 'side', '', 'in.txt')])).toEqual(['z', 'side']);
  });
});

describe('validateGraph', () => {
  it('reports roots and final outputs of a valid graph', () => {
    const graph = buildGraph(['a', 'b', 'c'].map(block), chain);
    expect(validateGraph(graph, chain)).toEqual({ roots: ['a'], finalOutputs: ['z'] });
  });

  it('rejects a graph with no root', () => {
    const connections = [conn('a', 'x', 'y'), conn('b', 'y', 'x')];
    const graph = buildGraph(['a', 'b'].map(block), connections);
    expect(() => validateGraph(graph, connections)).toThrow('no root node found');
  });

  it('rejects a cycle below a root', () => {
    const connections = [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'x'), conn('c', 'z', 'y'), conn('b', 'q', 'z')];
    const graph = buildGraph(['a', 'b', 'c'].map(block), connections);
    expect(() => validateGraph(graph, connections)).toThrow('workflow contains a cycle: b -> c -> b');
  });

  it('rejects a dangling input', () => {
    const connections = [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'typo')];
    const graph = buildGraph(['a', 'b'].map(block), connections);
    expect(() => validateGraph(graph, connections)).toThrow(
      'block "b" reads input "typo" which no connection produces',
    );
  });
});
