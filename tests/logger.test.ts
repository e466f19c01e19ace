import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

function captureStream(): { lines: string[]; stream: { write(chunk: string): boolean } } {
  const lines: string[] = [];
  return {
    lines,
    stream: {
      write(chunk: string): boolean {
        lines.push(chunk);
        return true;
      },
    },
  };
}

const epoch = (): Date => new Date(0);

describe("StructuredLogger", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("writes one JSON line per entry", () => {
    const { lines, stream } = captureStream();
    const logger = new StructuredLogger({ stream, now: epoch });

    logger.info("catalog_scanned", { record_count: 3 });
    logger.debug("dependency_graph_cache_invalidated");

    expect(lines).to.deep.equal([
      '{"timestamp":"1970-01-01T00:00:00.000Z","level":"info","message":"catalog_scanned","payload":{"record_count":3}}\n',
      '{"timestamp":"1970-01-01T00:00:00.000Z","level":"debug","message":"dependency_graph_cache_invalidated"}\n',
    ]);
  });

  it("defaults to stdout", () => {
    const write = sinon.stub(process.stdout, "write").returns(true);
    const logger = new StructuredLogger({ now: epoch });

    logger.warn("dependency_extraction_failed", { record_id: "a" });
    write.restore();

    expect(write.callCount).to.equal(1);
    expect(write.firstCall.args[0]).to.equal(
      '{"timestamp":"1970-01-01T00:00:00.000Z","level":"warn","message":"dependency_extraction_failed","payload":{"record_id":"a"}}\n',
    );
  });

  it("redacts sensitive keys at any depth when enabled", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      stream: captureStream().stream,
      redactionEnabled: true,
      onEntry: (entry) => entries.push(entry),
    });

    logger.error("upstream_failed", { request: { Authorization: "Bearer test-secret", path: "/x" }, tokens: [{ token: "t" }] });

    expect(entries[0].payload).to.deep.equal({
      request: { Authorization: "[REDACTED]", path: "/x" },
      tokens: [{ token: "[REDACTED]" }],
    });
  });

  it("hands listeners a copy of each entry", () => {
    const payload = { count: 1 };
    const received: LogEntry[] = [];
    const logger = new StructuredLogger({ stream: captureStream().stream, onEntry: (entry) => received.push(entry) });

    logger.info("snapshot_taken", payload);
    payload.count = 2;

    expect(received[0].payload).to.deep.equal({ count: 1 });
  });

  it("rotates the mirrored log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "catalog.log");

    try {
      const logger = new StructuredLogger({
        stream: captureStream().stream,
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, padding: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("catalog.log");
      expect(files).to.include("catalog.log.1");
      expect(files).to.not.include("catalog.log.3");

      const archived = await readFile(path.join(directory, "catalog.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
