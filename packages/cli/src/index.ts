import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  buildComponentMap,
  collectOrgIssues,
  createLogger,
  emptyHierarchy,
  isLogLevel,
  resolveHierarchy,
  runReportPipeline,
  toWallClockTime,
  type ComponentMap,
  type Logger,
  type LogLevel,
  type OrgIssueSource,
  type ReportContext,
  type ReportKind,
  type StateFilter
} from "@issueroll/core";
import { GithubProviderClient } from "@issueroll/provider-github";
import { renderMarkdownReport } from "@issueroll/renderer-markdown";
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  formatConfigError,
  isMissingFileError,
  loadComponentConfig,
  loadConfig,
  parseProductsString,
  type IssuerollConfig
} from "./config.js";
import { writeReportFiles } from "./writer.js";

type CliCommand = "report" | "validate" | "help";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface CliRuntimeOptions {
  io?: CliIO;
  createGithubProvider?: (token: string, logger: Logger) => OrgIssueSource;
  now?: () => Date;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface ReportArgs {
  org?: string;
  repos: string[];
  state?: StateFilter;
  since?: string;
  until?: string;
  report?: ReportKind;
  groupByComponent: boolean;
  showParentChild: boolean;
  includeExternalParents: boolean;
  products?: string;
  output?: string;
  dryRun: boolean;
  logLevel: LogLevel;
}

function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (command === "report" || command === "validate") {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseStateFilter(value: string): StateFilter {
  if (value !== "open" && value !== "closed" && value !== "all") {
    throw new Error(`Invalid --state value: ${value}`);
  }
  return value;
}

function parseReportKind(value: string): ReportKind {
  if (value !== "planning" && value !== "known_bugs") {
    throw new Error(`Invalid --report value: ${value}`);
  }
  return value;
}

function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  if (normalized === "warning") {
    return "warn";
  }
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid --loglevel value: ${value}`);
  }
  return normalized;
}

function parseTimestamp(value: string, flag: string): string {
  if (toWallClockTime(value) === null) {
    throw new Error(`Invalid ${flag} value: ${value}`);
  }
  return value;
}

function parseReportArgs(args: string[]): ReportArgs {
  const result: ReportArgs = {
    repos: [],
    groupByComponent: false,
    showParentChild: false,
    includeExternalParents: false,
    dryRun: false,
    logLevel: "info"
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    switch (arg) {
      case "--dry-run":
        result.dryRun = true;
        continue;
      case "--group-by-component":
        result.groupByComponent = true;
        continue;
      case "--show-parent-child":
        result.showParentChild = true;
        continue;
      case "--include-external-parents":
        result.includeExternalParents = true;
        continue;
      case "--org":
        result.org = requireValue(args, i, arg);
        break;
      case "--repo":
        result.repos.push(requireValue(args, i, arg));
        break;
      case "--state":
        result.state = parseStateFilter(requireValue(args, i, arg));
        break;
      case "--since":
        result.since = parseTimestamp(requireValue(args, i, arg), arg);
        break;
      case "--until":
        result.until = parseTimestamp(requireValue(args, i, arg), arg);
        break;
      case "--report":
        result.report = parseReportKind(requireValue(args, i, arg));
        break;
      case "--products":
        result.products = requireValue(args, i, arg);
        break;
      case "--output":
        result.output = requireValue(args, i, arg);
        break;
      case "--loglevel":
        result.logLevel = parseLogLevel(requireValue(args, i, arg));
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
    i += 1;
  }

  const since = result.since ? toWallClockTime(result.since) : null;
  const until = result.until ? toWallClockTime(result.until) : null;
  if (since !== null && until !== null && since > until) {
    throw new Error("--since must be earlier than --until");
  }

  return result;
}

function readEnvText(raw: string): Record<string, string> {
  const envMap: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }

    const key = trimmed.slice(0, eq).trim();
    const value = trimmed.slice(eq + 1).trim();
    const unquoted = value.replace(/^"(.*)"$/, "$1").replace(/^'(.*)'$/, "$1");
    envMap[key] = unquoted;
  }
  return envMap;
}

async function loadDotEnv(cwd: string): Promise<Record<string, string>> {
  try {
    const raw = await readFile(path.join(cwd, ".env"), "utf-8");
    return readEnvText(raw);
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw error;
  }
}

async function loadToken(cwd: string, tokenKey: string): Promise<string | undefined> {
  const envFile = await loadDotEnv(cwd);
  return process.env[tokenKey] ?? envFile[tokenKey];
}

async function loadReportConfig(cwd: string, io: CliIO, logger: Logger): Promise<IssuerollConfig | null> {
  try {
    return await loadConfig(cwd);
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      logger.debug(`No ${CONFIG_FILE_NAME} found; using defaults`);
      return createDefaultConfig();
    }
    io.error(`Cannot load ${CONFIG_FILE_NAME}`);
    io.error(formatConfigError(error));
    return null;
  }
}

async function loadComponentMap(
  cwd: string,
  config: IssuerollConfig,
  args: ReportArgs,
  logger: Logger
): Promise<ComponentMap> {
  const productsPath = path.resolve(cwd, args.products ?? config.report.productsFile);
  const componentMap = buildComponentMap(await loadComponentConfig(productsPath, logger));
  if (componentMap.size === 0) {
    logger.warn("No component mapping available; reporting without component grouping");
  }
  return componentMap;
}

async function runReport(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  let parsedArgs: ReportArgs;
  try {
    parsedArgs = parseReportArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const logger = createLogger({ level: parsedArgs.logLevel, write: io.error });
  const config = await loadReportConfig(cwd, io, logger);
  if (!config) {
    return 1;
  }

  const org = parsedArgs.org ?? config.org;
  if (!org) {
    io.error(`Missing organization. Set org in ${CONFIG_FILE_NAME} or pass --org.`);
    return 1;
  }

  try {
    const tokenKey = config.providers.github.tokenEnv;
    const token = await loadToken(cwd, tokenKey);
    if (!token) {
      io.error(`Missing GitHub token. Set ${tokenKey} in environment or .env`);
      return 1;
    }

    const provider = runtimeOptions.createGithubProvider?.(token, logger) ?? new GithubProviderClient({ token, logger });
    const report = parsedArgs.report ?? config.report.type;
    const state = parsedArgs.state ?? config.report.state;
    const repos = parsedArgs.repos.length > 0 ? parsedArgs.repos : config.repos;
    const groupByComponent = parsedArgs.groupByComponent || config.report.groupByComponent;
    const showParentChild = parsedArgs.showParentChild || config.report.showParentChild;
    const includeExternalParents = parsedArgs.includeExternalParents || config.report.includeExternalParents;
    const componentMap = groupByComponent ? await loadComponentMap(cwd, config, parsedArgs, logger) : undefined;
    const now = runtimeOptions.now?.() ?? new Date();
    const { since, until } = parsedArgs;

    const ctx: ReportContext = {
      org,
      report,
      state,
      groupByComponent,
      date: now,
      logger,
      ...(since ? { since } : {}),
      ...(until ? { until } : {}),
      ...(componentMap ? { componentMap } : {}),
      ...(config.report.title ? { title: config.report.title } : {})
    };

    const result = await runReportPipeline(
      {
        collect: () =>
          collectOrgIssues(provider, {
            org,
            repos,
            state,
            logger,
            ...(since ? { since } : {}),
            ...(until ? { until } : {})
          }),
        hierarchy: (repo, issues) =>
          showParentChild
            ? resolveHierarchy(issues, provider.hierarchySource(org, repo), {
                includeExternalParents,
                logger,
                scope: `${org}/${repo}`
              })
            : emptyHierarchy(),
        render: (issueReport) => renderMarkdownReport(issueReport)
      },
      ctx
    );

    if (parsedArgs.dryRun) {
      io.log(result.output);
      return 0;
    }

    const files = await writeReportFiles({
      cwd,
      report,
      date: now.toISOString().slice(0, 10),
      content: result.output,
      ...(parsedArgs.output ? { output: parsedArgs.output } : {})
    });
    io.log(`Created ${files.reportFile}`);
    if (files.latestFile) {
      io.log(`Updated ${files.latestFile}`);
    }
    io.log(
      `Issues: ${result.report.metrics.grandTotal.total} across ${result.report.metrics.repoTotals.size} repositories`
    );
    return 0;
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runValidate(cwd: string, io: CliIO): Promise<number> {
  try {
    const config = await loadConfig(cwd);
    if (!config.org) {
      io.error("Config validation failed.");
      io.error("org is required.");
      return 1;
    }

    if (config.report.groupByComponent) {
      const productsPath = path.resolve(cwd, config.report.productsFile);
      parseProductsString(await readFile(productsPath, "utf-8"));
    }

    const tokenKey = config.providers.github.tokenEnv;
    const token = await loadToken(cwd, tokenKey);
    if (!token) {
      io.error("Config validation failed.");
      io.error(`Missing token value for ${tokenKey} in environment or .env.`);
      return 1;
    }

    io.log("Config is valid.");
    io.log(`Organization: ${config.org}`);
    io.log(`Tracked repos: ${config.repos.length === 0 ? "all" : config.repos.length}`);
    io.log(`Report: ${config.report.type}`);
    return 0;
  } catch (error: unknown) {
    io.error("Config validation failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("issueroll CLI");
  io.log("Usage: issueroll <report|validate|help>");
  io.log("Commands:");
  io.log(`  validate  validate ${CONFIG_FILE_NAME}, the products file and token availability`);
  io.log("  report    search the organization's issues and write a markdown report");
  io.log("Report options:");
  io.log("  --org <name>                  GitHub organization (overrides config)");
  io.log("  --repo <name>                 repeatable; limit to these repositories");
  io.log("  --state <open|closed|all>     issue state filter");
  io.log("  --since <ISO date/time>       start of the window");
  io.log("  --until <ISO date/time>       end of the window");
  io.log("  --report <planning|known_bugs>");
  io.log("  --group-by-component          group repositories by product");
  io.log("  --show-parent-child           nest sub-issues under their parents");
  io.log("  --include-external-parents    also list parents outside the search results");
  io.log("  --products <path>             products file (default conf/products.yaml)");
  io.log("  --output <path>               write the report to this file only");
  io.log("  --dry-run                     print the report to stdout without writing files");
  io.log("  --loglevel <debug|info|warn|error>");
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "report":
      return runReport(cwd, io, parsed.args, runtimeOptions);
    case "validate":
      return runValidate(cwd, io);
    default:
      printHelp(io);
      return 0;
  }
}
