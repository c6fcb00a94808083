import { describe, expect, it } from 'vitest';
import { buildGraph } from '../../../src/engine/graph-builder.js';
import type { BlockSpec, Connection } from '../../../src/types/workflow.js';
import { GraphError } from '../../../src/utils/errors.js';

function block(name: string): BlockSpec {
  return { name, version: '', github: `acme/${name}`, force: false };
}

function conn(fromBlock: string, output: string, input = '', source = ''): Connection {
  return { fromBlock, fromEntry: 'run', output, input, source };
}

describe('buildGraph', () => {
  it('adds one vertex per block with no edges for a single root connection', () => {
    const graph = buildGraph([block('a')], [conn('a', 'x', '', 'in.txt')]);
    expect(graph.vertexNames()).toEqual(['a']);
    expect(graph.size()).toBe(0);
    expect(graph.vertex('a').connections).toEqual([conn('a', 'x', '', 'in.txt')]);
  });

  it('links a producer to the consumer reading its output', () => {
    const graph = buildGraph([block('a'), block('b')], [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'x')]);
    expect(graph.edges()).toEqual([
      {
        source: 'a',
        target: 'b',
        attributes: { fromEntry: 'run', output: 'x', input: 'x', source: 'in.txt' },
      },
    ]);
  });

  it('creates one edge per producer on fan-in', () => {
    const graph = buildGraph(
      [block('a'), block('b'), block('c')],
      [conn('a', 'x', '', 'a.txt'), conn('b', 'x', '', 'b.txt'), conn('c', 'z', 'x')],
    );
    expect(graph.edges().map((e) => `${e.source}->${e.target}`)).toEqual(['a->c', 'b->c']);
    expect(graph.inDegree('c')).toBe(2);
  });

  it('creates one edge per consumer on fan-out', () => {
    const graph = buildGraph(
      [block('a'), block('b'), block('c')],
      [conn('a', 'x', '', 'a.txt'), conn('b', 'y', 'x'), conn('c', 'z', 'x')],
    );
    expect(graph.successors('a')).toEqual(['b', 'c']);
  });

  it('produces a self-edge when a block reads its own output', () => {
    const graph = buildGraph([block('a')], [conn('a', 'x', 'x')]);
    expect(graph.edges().map((e) => `${e.source}->${e.target}`)).toEqual(['a->a']);
  });

  it('ignores unmatched input labels', () => {
    const graph = buildGraph([block('a'), block('b')], [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'nope')]);
    expect(graph.size()).toBe(0);
  });

  it('rejects a connection that names an undeclared block', () => {
    expect(() => buildGraph([block('a')], [conn('ghost', 'x', '', 'in.txt')])).toThrow(GraphError);
    expect(() => buildGraph([block('a')], [conn('ghost', 'x', '', 'in.txt')])).toThrow(
      'connection "x" references unknown block "ghost"',
    );
  });

  it('keeps a later duplicate block declaration in the original position', () => {
    const replacement: BlockSpec = { name: 'a', version: 'v2', github: 'acme/other', force: true };
    const graph = buildGraph([block('a'), block('b'), replacement], []);
    expect(graph.vertexNames()).toEqual(['a', 'b']);
    expect(graph.vertex('a').block).toEqual(replacement);
  });

  it('satisfies the matching rule for every producer/consumer pair', () => {
    const connections = [
      conn('a', 'x', '', 'a.txt'),
      conn('b', 'y', 'x'),
      conn('c', 'z', 'y'),
      conn('c', 'w', 'x'),
      conn('d', 'v', 'z'),
    ];
    const graph = buildGraph(['a', 'b', 'c', 'd'].map(block), connections);
    const edgeSet = new Set(
      graph.edges().map((e) => `${e.source}->${e.target}:${e.attributes.output}:${e.attributes.input}`),
    );

    for (const producer of connections) {
      for (const consumer of connections) {
        const key = `${producer.fromBlock}->${consumer.fromBlock}:${producer.output}:${consumer.input}`;
        const shouldLink = consumer.input !== '' && producer.output === consumer.input;
        expect(edgeSet.has(key)).toBe(shouldLink);
      }
    }
  });

  it('builds identical graphs from the same input', () => {
    const blocks = ['a', 'b', 'c'].map(block);
    const connections = [conn('a', 'x', '', 'in.txt'), conn('b', 'y', 'x'), conn('c', 'z', 'y')];
    const first = buildGraph(blocks, connections);
    const second = buildGraph(blocks, connections);
    expect(second.vertexNames()).toEqual(first.vertexNames());
    expect(second.edges()).toEqual(first.edges());
  });
});
