import { Command, CommanderError, Option } from "commander";
import { VERSION } from "../version.js";
import { ExitCode } from "./exit-codes.js";
import { runExtract, type ExtractCommandDeps, type ExtractCommandOptions } from "./extract-command.js";

export interface ProgramDeps extends ExtractCommandDeps {
  /** Receives the exit code of the command that ran */
  onExit?: (code: ExitCode) => void;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name("metrics-extractor")
    .description("Extract metrics from Prometheus and InfluxDB at native resolution")
    .version(VERSION);

  // Set before adding commands so they inherit it
  program.exitOverride((err: CommanderError) => {
    // --help and --version exit 0; usage errors are configuration errors
    throw new CommanderError(err.exitCode === 0 ? ExitCode.OK : ExitCode.CONFIG, err.code, err.message);
  });

  program
    .command("extract")
    .description("Extract metrics over a time window and write them to files")
    .addOption(
      new Option("--source <source>", "Data source to extract metrics from").choices(["prometheus", "influxdb"]),
    )
    .option("--url <url>", "URL of the data source")
    .option("--metrics <list>", "Comma-separated list of metrics (or PromQL expressions)")
    .option("--all-metrics", "Extract every metric the source lists")
    .option("--from <time>", "Start of the window, ISO-8601 (omit --from and --to for all history)")
    .option("--to <time>", "End of the window, ISO-8601 (default: now)")
    .addOption(
      new Option("--format <format>", "Output format")
        .choices(["parquet", "hdf5", "csv", "json", "feather", "pandas"])
        .default("csv"),
    )
    .option(
      "--output-file <path>",
      "Output path; with several metrics the base of each file name (metrics.csv → metrics_<metric>.csv)",
    )
    .option("--combined-output", "Write all metrics to one file")
    .option("--token <token>", "InfluxDB API token")
    .option("--org <org>", "InfluxDB organization")
    .option("--bucket <bucket>", "InfluxDB bucket")
    .option("--measurement <name>", "InfluxDB measurement to restrict fields to")
    .option("--username <user>", "Prometheus basic auth user")
    .option("--password <password>", "Prometheus basic auth password")
    .option("--bearer-token <token>", "Prometheus bearer token")
    .option("--parallel", "Extract metrics in parallel")
    .option("--max-workers <n>", "Metrics extracted at once (default: 4 with --parallel)")
    .option("--step <duration>", "Native scrape interval, e.g. 15s")
    .option("--expression-step <duration>", "Evaluation step of PromQL expressions (default: 1s)")
    .option("--max-points <n>", "Points per request the backend allows")
    .option("--timeout <duration>", "Per-request timeout, e.g. 30s or 30000")
    .option("--retries <n>", "Retries of a transient failure")
    .option("--rate-limit <rps>", "Requests per second across all metrics")
    .option("-v, --verbose", "Debug logging")
    .action(async (options: ExtractCommandOptions) => {
      const code = await runExtract(options, deps);
      deps.onExit?.(code);
    });

  return program;
}
