import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { CatalogInputError } from "../src/errors.js";
import { DependencyGraphBuilder, buildDependencyGraph } from "../src/graph/builder.js";
import { InMemoryRecordSource } from "../src/records/memorySource.js";
import type { CatalogRecord } from "../src/records/types.js";
import { ItemData, makeRecord, tableExtractor } from "./helpers/catalogFixtures.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function chainSource(): InMemoryRecordSource {
  return new InMemoryRecordSource([
    makeRecord(ItemData, "a"),
    makeRecord(ItemData, "b"),
    makeRecord(ItemData, "c"),
  ]);
}

describe("dependency graph building", () => {
  it("adds a node per record and an edge per reference", () => {
    const source = chainSource();
    const logger = new RecordingLogger();
    let now = 100;
    const { graph, report } = buildDependencyGraph(
      source.listAllRecords(),
      tableExtractor(source, { a: ["b"], b: ["c"] }),
      { logger, clock: () => (now += 5) },
    );

    expect(graph.nodeCount).to.equal(3);
    expect(graph.edgeCount).to.equal(2);
    expect(report).to.deep.equal({
      nodeCount: 3,
      edgeCount: 2,
      skippedRecords: 0,
      selfReferences: 0,
      failures: [],
      builtAt: 110,
      durationMs: 5,
    });
    expect(logger.messages()).to.deep.equal(["dependency_graph_built"]);
    expect(logger.entries[0].payload).to.deep.equal({
      node_count: 3,
      edge_count: 2,
      skipped_records: 0,
      duration_ms: 5,
    });
  });

  it("drops self references and records without identity", () => {
    const source = chainSource();
    const { graph, report } = buildDependencyGraph(
      [...source.listAllRecords(), makeRecord(ItemData, "")],
      tableExtractor(source, { a: ["a", "b"] }),
    );

    expect(graph.edgeCount).to.equal(1);
    expect(report.selfReferences).to.equal(1);
    expect(report.skippedRecords).to.equal(1);
    expect(graph.isOrphan("a")).to.equal(true);
  });

  it("keeps building when the extractor fails for one record", () => {
    const source = chainSource();
    const logger = new RecordingLogger();
    const table = tableExtractor(source, { a: ["b"], c: ["a"] });
    const referencesOf = sinon.stub().callsFake((record: CatalogRecord) => {
      if (record.id === "b") {
        throw new Error("unreadable record");
      }
      return table.referencesOf(record);
    });

    const { graph, report } = buildDependencyGraph(source.listAllRecords(), { referencesOf }, { logger });

    expect(referencesOf.callCount).to.equal(3);
    expect(graph.edgeCount).to.equal(2);
    expect(report.failures).to.deep.equal([{ recordId: "b", message: "unreadable record" }]);
    expect(logger.messages("warn")).to.deep.equal(["dependency_extraction_failed", "dependency_graph_incomplete"]);
  });

  it("rejects a missing record set or extractor", () => {
    const source = chainSource();
    expect(() => buildDependencyGraph(null, tableExtractor(source, {}))).to.throw(CatalogInputError);
    expect(() => buildDependencyGraph(source.listAllRecords(), undefined)).to.throw(CatalogInputError);
  });
});

describe("dependency graph builder cache", () => {
  it("serves the cached graph until the TTL elapses", () => {
    const source = chainSource();
    let now = 0;
    const builder = new DependencyGraphBuilder({
      source,
      extractor: tableExtractor(source, { a: ["b"] }),
      clock: () => now,
    });

    const first = builder.getCachedGraph();
    expect(builder.generation).to.equal(1);

    now = 29_999;
    expect(builder.getCachedGraph()).to.equal(first);
    expect(builder.isCacheValid()).to.equal(true);

    now = 30_000;
    expect(builder.isCacheValid()).to.equal(false);
    const second = builder.getCachedGraph();
    expect(second).to.not.equal(first);
    expect(builder.generation).to.equal(2);
  });

  it("honours a custom TTL and forced rebuilds", () => {
    const source = chainSource();
    let now = 0;
    const builder = new DependencyGraphBuilder({
      source,
      extractor: tableExtractor(source, {}),
      ttlMs: 10,
      clock: () => now,
    });

    const first = builder.buildGraph();
    now = 9;
    expect(builder.buildGraph()).to.equal(first);
    expect(builder.buildGraph({ useCache: false })).to.not.equal(first);
    expect(builder.generation).to.equal(2);
  });

  it("only sees source changes after invalidation", () => {
    const source = chainSource();
    const logger = new RecordingLogger();
    const builder = new DependencyGraphBuilder({
      source,
      extractor: tableExtractor(source, {}),
      clock: () => 0,
      logger,
    });

    expect(builder.getCachedGraph().nodeCount).to.equal(3);
    source.upsert(makeRecord(ItemData, "d"));
    expect(builder.getCachedGraph().nodeCount).to.equal(3);

    builder.invalidateCache();
    expect(builder.isCacheValid()).to.equal(false);
    expect(builder.lastReport()).to.equal(null);
    expect(builder.getCachedGraph().nodeCount).to.equal(4);
    expect(builder.lastReport()?.nodeCount).to.equal(4);
    expect(logger.messages("debug")).to.deep.equal(["dependency_graph_cache_invalidated"]);
  });
});
