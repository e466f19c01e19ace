import { describe, it } from "mocha";
import { expect } from "chai";

import { DependencyAnalysis, findShortestPath } from "../src/graph/analysis.js";
import { DependencyGraphBuilder } from "../src/graph/builder.js";
import { DependencyGraph, type DependencyGraphView } from "../src/graph/dependencyGraph.js";
import { InMemoryRecordSource } from "../src/records/memorySource.js";
import { ItemData, TextureAsset, makeRecord, tableExtractor } from "./helpers/catalogFixtures.js";

function buildAnalysis(topLimit?: number): { analysis: DependencyAnalysis; source: InMemoryRecordSource } {
  const source = new InMemoryRecordSource([
    makeRecord(ItemData, "A"),
    makeRecord(ItemData, "B"),
    makeRecord(ItemData, "C"),
    makeRecord(ItemData, "D"),
    makeRecord(ItemData, "E"),
    makeRecord(TextureAsset, "P"),
  ]);
  const builder = new DependencyGraphBuilder({
    source,
    extractor: tableExtractor(source, { A: ["B", "D"], B: ["C"], C: ["A"], D: ["C"] }),
    clock: () => 0,
  });
  return { analysis: new DependencyAnalysis(builder, topLimit === undefined ? {} : { topLimit }), source };
}

const ids = (records: ReadonlyArray<{ readonly id: string }> | null): string[] | null =>
  records ? records.map((record) => record.id) : null;

describe("dependency analysis", () => {
  it("finds the path with the fewest edges", () => {
    const { analysis } = buildAnalysis();

    expect(ids(analysis.shortestPath("A", "C"))).to.deep.equal(["A", "B", "C"]);
    expect(ids(analysis.shortestPath("C", "D"))).to.deep.equal(["C", "A", "D"]);
  });

  it("prefers a direct edge over a longer chain", () => {
    const graph = new DependencyGraph();
    const a = makeRecord(ItemData, "A");
    const b = makeRecord(ItemData, "B");
    const c = makeRecord(ItemData, "C");
    graph.addDependency(a, b);
    graph.addDependency(b, c);
    graph.addDependency(a, c);

    expect(findShortestPath(graph, a, c)?.map((node) => node.key)).to.deep.equal(["A", "C"]);
  });

  it("returns no path between disconnected records", () => {
    const graph = new DependencyGraph();
    const a = makeRecord(ItemData, "A");
    const b = makeRecord(ItemData, "B");
    graph.addNode(a);
    graph.addNode(b);

    expect(findShortestPath(graph, a, b)).to.equal(null);
  });

  it("returns a single-node path from a record to itself", () => {
    const { analysis } = buildAnalysis();

    expect(ids(analysis.shortestPath("E", "E"))).to.deep.equal(["E"]);
  });

  it("returns null for unreachable or unknown endpoints", () => {
    const { analysis } = buildAnalysis();

    expect(analysis.shortestPath("A", "E")).to.equal(null);
    expect(analysis.shortestPath("A", "missing")).to.equal(null);
    expect(analysis.shortestPath("missing", "A")).to.equal(null);
  });

  it("terminates on cycles without a target", () => {
    const graph = new DependencyGraph();
    const x = makeRecord(ItemData, "x");
    const y = makeRecord(ItemData, "y");
    graph.addDependency(x, y);
    graph.addDependency(y, x);
    graph.addNode(makeRecord(ItemData, "z"));

    expect(findShortestPath(graph, x, "z")).to.equal(null);
    expect(findShortestPath(graph, y, x)?.map((node) => node.key)).to.deep.equal(["y", "x"]);
  });

  it("lists orphans and filters them by type name", () => {
    const { analysis } = buildAnalysis();

    expect(ids(analysis.findOrphans())).to.deep.equal(["E", "P"]);
    expect(ids(analysis.findOrphans(["TextureAsset"]))).to.deep.equal(["E"]);
  });

  it("reports a lone record as an orphan", () => {
    const source = new InMemoryRecordSource([makeRecord(ItemData, "P")]);
    const builder = new DependencyGraphBuilder({ source, extractor: tableExtractor(source, {}), clock: () => 0 });

    expect(ids(new DependencyAnalysis(builder).findOrphans())).to.deep.equal(["P"]);
  });

  it("hands out the cached graph for reading", () => {
    const { analysis } = buildAnalysis();
    const graph: DependencyGraphView = analysis.graph();

    expect(analysis.graph()).to.equal(graph);
    expect(graph.nodeCount).to.equal(6);
    expect(graph.referenceCount("C")).to.equal(2);
  });

  it("ranks the most referenced records with their counters", () => {
    const { analysis } = buildAnalysis();
    const [top] = analysis.mostReferenced(1);

    expect(top.record.id).to.equal("C");
    expect(top.referenceCount).to.equal(2);
    expect(top.dependencyCount).to.equal(1);
    expect(top.isOrphan).to.equal(false);
  });

  it("uses the configured top limit by default", () => {
    const { analysis } = buildAnalysis(2);

    expect(analysis.mostReferenced()).to.have.length(2);
    expect(analysis.mostDependencies().map((entry) => entry.record.id)).to.deep.equal(["A", "B"]);
  });

  it("lists referencers and dependencies", () => {
    const { analysis } = buildAnalysis();

    expect(ids(analysis.referencersOf("C"))).to.deep.equal(["B", "D"]);
    expect(ids(analysis.dependenciesOf("A"))).to.deep.equal(["B", "D"]);
    expect(analysis.referencersOf("missing")).to.deep.equal([]);
  });

  it("reports per-record statistics and degrades for absent records", () => {
    const { analysis, source } = buildAnalysis();
    const a = source.loadByIdentity("A");

    expect(a).to.not.equal(null);
    if (a) {
      expect(analysis.statsFor(a)).to.deep.equal({ record: a, referenceCount: 1, dependencyCount: 2, isOrphan: false });
    }
    const stray = makeRecord(ItemData, "stray");
    expect(analysis.statsFor(stray)).to.deep.equal({
      record: stray,
      referenceCount: 0,
      dependencyCount: 0,
      isOrphan: true,
    });
  });

  it("summarises the whole graph", () => {
    const { analysis } = buildAnalysis();
    const stats = analysis.graphStats();

    expect(stats.nodeCount).to.equal(6);
    expect(stats.edgeCount).to.equal(5);
    expect(stats.orphanCount).to.equal(2);
  });
});
