import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { FakeSource, backendDown } from "../test/fake-source.js";
import { ExitCode } from "./exit-codes.js";
import {
  resolveFileFormat,
  runExtract,
  splitMetricList,
  toConfigOverrides,
  type ExtractCommandOptions,
} from "./extract-command.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const T0 = Date.parse("2023-01-01T00:00:00Z");
const HOUR = 3_600_000;
const STEP = 15_000;

function source(options?: ConstructorParameters<typeof FakeSource>[0]): FakeSource {
  return new FakeSource(options)
    .addSeries("up", { instance: "a" }, T0, T0 + 2 * HOUR, STEP)
    .addSeries("node_load1", { instance: "a" }, T0, T0 + 2 * HOUR, STEP);
}

function capture() {
  let text = "";
  return {
    stream: {
      write(chunk: string) {
        text += chunk;
        return true;
      },
    },
    text: () => text,
  };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "extract-command-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function flags(overrides: Partial<ExtractCommandOptions> = {}): ExtractCommandOptions {
  return {
    source: "prometheus",
    url: "http://prometheus:9090",
    metrics: "up,node_load1",
    from: "2023-01-01T00:00:00Z",
    to: "2023-01-01T01:00:00Z",
    format: "csv",
    outputFile: join(dir, "metrics.csv"),
    ...overrides,
  };
}

async function run(options: ExtractCommandOptions, fake: FakeSource = source()) {
  const stdout = capture();
  const stderr = capture();
  const code = await runExtract(options, {
    stdout: stdout.stream,
    stderr: stderr.stream,
    logger: silentLogger(),
    env: {},
    createSource: () => fake,
  });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

// ---------------------------------------------------------------------------
// runExtract
// ---------------------------------------------------------------------------

describe("runExtract", () => {
  it("writes one file per metric and exits 0", async () => {
    const { code, stdout } = await run(flags());

    expect(code).toBe(ExitCode.OK);
    expect((await readdir(dir)).sort()).toEqual(["metrics_node_load1.csv", "metrics_up.csv"]);
    const lines = (await readFile(join(dir, "metrics_up.csv"), "utf8")).split("\n");
    expect(lines[0]).toBe('timestamp,"{instance=""a""}"');
    expect(lines).toHaveLength(HOUR / STEP + 2);
    expect(stdout.endsWith("\n2 ok, 0 not found, 0 failed\n")).toBe(true);
  });

  it("writes a combined file with --combined-output", async () => {
    const { code } = await run(flags({ combinedOutput: true }));
    expect(code).toBe(ExitCode.OK);
    expect(await readdir(dir)).toEqual(["metrics.csv"]);
  });

  it("exits 3 when some metrics are missing", async () => {
    const { code, stdout } = await run(flags({ metrics: "up,missing" }));
    expect(code).toBe(ExitCode.PARTIAL);
    expect(await readdir(dir)).toEqual(["metrics_up.csv"]);
    expect(stdout.endsWith("\n1 ok, 1 not found, 0 failed\n")).toBe(true);
  });

  it("exits 4 and still prints the summary when every metric fails", async () => {
    const { code, stdout } = await run(flags({ metrics: "up" }), source({ failing: { up: backendDown() } }));
    expect(code).toBe(ExitCode.FAILED);
    expect(stdout).toContain("failed(GET /api/v1/query failed after 4 attempt(s): connection refused)");
    expect(await readdir(dir)).toEqual([]);
  });

  it("exits 2 on invalid flags without querying", async () => {
    const fake = source();
    const missingUrl = await run(flags({ url: undefined }), fake);
    expect(missingUrl).toMatchObject({ code: ExitCode.CONFIG, stderr: "Error: --url is required\n" });

    const both = await run(flags({ allMetrics: true }), fake);
    expect(both).toMatchObject({ code: ExitCode.CONFIG, stderr: "Error: Use either --metrics or --all-metrics, not both\n" });

    const neither = await run(flags({ metrics: undefined }), fake);
    expect(neither.stderr).toBe("Error: Either --metrics or --all-metrics must be specified\n");

    const influx = await run(flags({ source: "influxdb", bucket: "metrics" }), fake);
    expect(influx.stderr).toBe("Error: --token, --org required for InfluxDB\n");

    const inverted = await run(flags({ from: "2023-01-02T00:00:00Z" }), fake);
    expect(inverted.code).toBe(ExitCode.CONFIG);

    expect(fake.requests).toHaveLength(0);
  });

  it("extracts every listed metric with --all-metrics", async () => {
    const { code, stdout } = await run(flags({ metrics: undefined, allMetrics: true }));
    expect(code).toBe(ExitCode.OK);
    expect(stdout.split("\n").slice(2, 4).map((line) => line.split(" ")[0])).toEqual(["node_load1", "up"]);
  });
});

// ---------------------------------------------------------------------------
// Flag parsing
// ---------------------------------------------------------------------------

describe("splitMetricList", () => {
  it("keeps commas inside expressions", () => {
    expect(splitMetricList('up, sum by (job, instance) (rate(x[5m])),a{b="c,d"},')).toEqual([
      "up",
      "sum by (job, instance) (rate(x[5m]))",
      'a{b="c,d"}',
    ]);
  });
});

describe("resolveFileFormat", () => {
  it("infers the file format for pandas from the extension", () => {
    expect(resolveFileFormat("pandas", "out.parquet")).toBe("parquet");
    expect(resolveFileFormat("pandas", "out.H5")).toBe("hdf5");
    expect(resolveFileFormat("pandas", "out")).toBe("csv");
    expect(resolveFileFormat("JSON", "out.csv")).toBe("json");
  });

  it("rejects an unknown format", () => {
    expect(() => resolveFileFormat("xlsx", "out.xlsx")).toThrow(ConfigError);
  });
});

describe("toConfigOverrides", () => {
  it("maps flags onto config fields", () => {
    expect(
      toConfigOverrides({
        format: "csv",
        parallel: true,
        step: "30s",
        expressionStep: "2s",
        maxPoints: "500",
        timeout: "1m",
        retries: "3",
        rateLimit: "2.5",
        verbose: true,
      }),
    ).toEqual({
      concurrency: 4,
      stepMs: 30_000,
      expressionStepMs: 2000,
      maxPointsPerRequest: 500,
      timeoutMs: 60_000,
      retry: { attempts: 4 },
      rateLimit: 2.5,
      logLevel: "debug",
    });
  });

  it("prefers --max-workers over --parallel", () => {
    expect(toConfigOverrides({ format: "csv", parallel: true, maxWorkers: "8" }).concurrency).toBe(8);
  });

  it("rejects a non-integer worker count", () => {
    expect(() => toConfigOverrides({ format: "csv", maxWorkers: "two" })).toThrow(
      '--max-workers must be an integer >= 1, got "two"',
    );
  });
});
