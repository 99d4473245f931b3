import { loadConfig } from "../config";
import { runDownloadOne, runPlan, runStatus, runSync, SyncSummary } from "../core/commands";
import { createHttpTransport } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "sync" | "plan" | "download" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  jobId?: string;
  ignoreHttpsErrors: boolean;
  maxJobs?: number;
  configPath?: string;
  apiKeyFile?: string;
}

const HELP_TEXT = `
Usage:
  jobdata-sync <command> [options]

Commands:
  sync               Fetch job headers, then download every new or changed job
  plan               Fetch job headers and list the jobs a sync would download
  download <jobId>   Download one job's per-second data
  status             Show local store statistics

Options:
  --config <path>        Optional path to JSON config file
  --api-key-file <path>  Read the API key from the first line of this file
  --max-jobs <n>         Limit jobs downloaded by sync
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "sync" || raw === "plan" || raw === "download" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let jobId: string | undefined;
  if (command === "download") {
    jobId = argv[1] && !argv[1].startsWith("--") ? argv[1] : undefined;
    if (!jobId) {
      return "help";
    }
  }

  const maxJobsRaw = optionValue(argv, "--max-jobs");
  const maxJobsParsed = maxJobsRaw ? Number.parseInt(maxJobsRaw, 10) : undefined;
  return {
    command,
    jobId,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    maxJobs: maxJobsParsed !== undefined && Number.isFinite(maxJobsParsed) && maxJobsParsed >= 0 ? maxJobsParsed : undefined,
    configPath: optionValue(argv, "--config"),
    apiKeyFile: optionValue(argv, "--api-key-file"),
  };
}

function exitCodeFor(summary: SyncSummary): number {
  if (summary.status === "headers_failed") {
    return 2;
  }
  return summary.failed > 0 ? 1 : 0;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }
  if (parsed.apiKeyFile !== undefined) {
    config = {
      ...config,
      apiKey: undefined,
      apiKeyFile: parsed.apiKeyFile,
    };
  }

  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const transport = createHttpTransport(config);
  const context = { runId, config, store, sink, logger, metrics, transport };

  logger.info("command_start", {
    command: parsed.command,
    jobId: parsed.jobId,
    maxJobs: parsed.maxJobs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    maxAttempts: config.maxAttempts,
    defaultDelaySeconds: config.defaultDelaySeconds,
    pacingDelaySeconds: config.pacingDelaySeconds,
  });

  try {
    let exitCode = 0;
    switch (parsed.command) {
      case "sync":
        exitCode = exitCodeFor(await runSync({ ...context, logger: logger.child("sync") }, parsed.maxJobs));
        break;
      case "plan": {
        const plan = await runPlan({ ...context, logger: logger.child("plan") }, parsed.maxJobs);
        exitCode = plan.status === "ok" ? 0 : 2;
        break;
      }
      case "download":
        if (!parsed.jobId) {
          console.error("download requires a job id");
          return 1;
        }
        exitCode = exitCodeFor(await runDownloadOne({ ...context, logger: logger.child("download") }, parsed.jobId));
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
