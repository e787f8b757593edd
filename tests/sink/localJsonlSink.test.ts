import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config";
import { createSink, LocalJsonlSink } from "../../src/sink";

describe("LocalJsonlSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "layout-sink-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("appends one line per document and record", async () => {
    const sink = new LocalJsonlSink(
      {
        ...DEFAULT_CONFIG,
        outputDirs: { documents: path.join(dir, "docs"), manifests: path.join(dir, "manifests") },
      },
      "run_local",
    );

    await sink.publishDocuments({
      sourceId: "src-1",
      sourcePath: "/data/a.json",
      documents: [
        { id: "doc-1", content: "one", content_type: "text", meta: {} },
        { id: "doc-2", content: "two", content_type: "text", meta: {} },
      ],
    });
    await sink.publishConversionResult([
      {
        sourceId: "src-1",
        sourcePath: "/data/a.json",
        sha256: "e".repeat(64),
        status: "converted_ok",
        documentCount: 2,
        tableCount: 0,
        runId: "run_other",
        convertedAt: "2026-01-01T00:00:00.000Z",
      },
    ]);

    const documents = await fs.promises.readFile(path.join(dir, "docs", "documents.jsonl"), "utf-8");
    expect(documents.split("\n")).toEqual([
      '{"runId":"run_local","sourceId":"src-1","id":"doc-1","content":"one","content_type":"text","meta":{}}',
      '{"runId":"run_local","sourceId":"src-1","id":"doc-2","content":"two","content_type":"text","meta":{}}',
      "",
    ]);

    const conversions = await fs.promises.readFile(path.join(dir, "manifests", "conversions.jsonl"), "utf-8");
    expect(JSON.parse(conversions.trim())).toMatchObject({ sourceId: "src-1", runId: "run_local" });
  });

  it("is the sink the pipeline writes to", () => {
    const config = {
      ...DEFAULT_CONFIG,
      outputDirs: { documents: path.join(dir, "docs"), manifests: path.join(dir, "manifests") },
    };

    expect(createSink(config, "run_local")).toBeInstanceOf(LocalJsonlSink);
    expect(fs.existsSync(path.join(dir, "manifests"))).toBe(true);
  });
});
