import { SkipLogger } from "../catalog";
import { loadConfig, OutputFormat, parseOutputFormat, resolveSkipLogPath } from "../config";
import { runConvert, runEstimate } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";

export type CommandName = "convert" | "estimate";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  inputDir?: string;
  outputDir?: string;
  format?: OutputFormat;
  maxFiles?: number;
}

const HELP_TEXT = `
Usage:
  catalog-export <command> [options]

Commands:
  convert    Convert every .xml catalog in the input directory to a spreadsheet
  estimate   Report the streaming <upc> estimate for every input file; writes nothing

Options:
  --config <path>     Optional path to JSON config file
  --input <dir>       Input directory (overrides XML_INPUT_DIR)
  --output <dir>      Output directory (overrides XLSX_OUTPUT_DIR)
  --format <fmt>      Output format: xlsx (default) or csv
  --max-files <n>     Limit the number of files processed
  -h, --help          Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "convert" || raw === "estimate") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  const value = index >= 0 ? argv[index + 1] : undefined;
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

  const maxFilesRaw = optionValue(argv, "--max-files");
  const maxFilesParsed = maxFilesRaw ? Number.parseInt(maxFilesRaw, 10) : undefined;

  return {
    command,
    configPath: optionValue(argv, "--config"),
    inputDir: optionValue(argv, "--input"),
    outputDir: optionValue(argv, "--output"),
    format: parseOutputFormat(optionValue(argv, "--format")),
    maxFiles: maxFilesParsed !== undefined && Number.isFinite(maxFilesParsed) ? maxFilesParsed : undefined,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  config = {
    ...config,
    inputDir: parsed.inputDir ?? config.inputDir,
    outputDir: parsed.outputDir ?? config.outputDir,
    outputFormat: parsed.format ?? config.outputFormat,
  };

  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const skipLog = new SkipLogger({ logFilePath: resolveSkipLogPath(config), logger: logger.child("skip-log") });
  const sink = createSink(config);
  const context = { config, logger, metrics, sink, skipLog };

  logger.info("command_start", {
    command: parsed.command,
    inputDir: config.inputDir,
    outputDir: config.outputDir,
    format: config.outputFormat,
    maxFiles: parsed.maxFiles,
  });

  try {
    switch (parsed.command) {
      case "convert":
        await runConvert({ ...context, logger: logger.child("convert") }, parsed.maxFiles);
        break;
      case "estimate":
        await runEstimate({ ...context, logger: logger.child("estimate") }, parsed.maxFiles);
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
