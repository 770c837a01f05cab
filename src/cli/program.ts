import { Command, InvalidArgumentError } from "commander";
import { runtimeConfig } from "../config.js";
import type { LanguageCode, MatchOptions } from "../domain/inventory.js";
import { isLanguageCode, LANGUAGE_CODES } from "../domain/language.js";
import { ConfigError, errorMessage } from "../errors.js";
import { InventoryImporter } from "../services/inventory/inventoryImporter.js";
import { analyzeBins, formatBinAnalysis, type BinSortOrder } from "../services/inventory/binAnalysis.js";
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  renderReport,
  StockCheckService,
  type OutputFormat,
} from "../services/stockCheckService.js";
import { createLogger, logger as rootLogger } from "../utils/logger.js";

const logger = createLogger("cli");

interface CheckOptions {
  format: OutputFormat;
  language?: LanguageCode;
  languageOnly: boolean;
  verbose?: boolean;
}

interface BinsOptions {
  minFree: number;
  sort: BinSortOrder;
  verbose?: boolean;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return value;
}

function parseLanguageOption(value: string): LanguageCode {
  const code = value.trim().toLowerCase();
  if (!isLanguageCode(code)) {
    throw new InvalidArgumentError(`Expected one of: ${LANGUAGE_CODES.join(", ")}`);
  }
  return code;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer");
  }
  return n;
}

function parseSortOrder(value: string): BinSortOrder {
  if (value !== "free" && value !== "location") {
    throw new InvalidArgumentError("Expected free or location");
  }
  return value;
}

function requirePath(value: string | undefined, fallback: string | null, envVar: string, label: string): string {
  const resolved = value ?? fallback;
  if (!resolved) {
    throw new ConfigError(`No ${label} given: pass it as an argument or set ${envVar}`);
  }
  return resolved;
}

async function checkCommand(inventoryArg: string | undefined, wantlistArg: string | undefined, options: CheckOptions) {
  if (options.verbose) rootLogger.level = "debug";

  const inventoryPath = requirePath(inventoryArg, runtimeConfig.inventoryCsvPath, "INVENTORY_CSV_PATH", "inventory CSV");
  const wantlistPath = requirePath(wantlistArg, runtimeConfig.wantlistPath, "WANTLIST_PATH", "want-list");

  const matchOptions: MatchOptions = {
    language: options.language ?? runtimeConfig.preferredLanguage ?? undefined,
    languageOnly: options.languageOnly || runtimeConfig.preferredLanguageOnly,
  };

  const service = new StockCheckService(logger);
  const report = await service.check({ inventoryPath, wantlistPath, options: matchOptions });

  for (const { line, text } of report.wantlist.skipped) {
    logger.warn({ line, text }, "Skipped want-list line");
  }
  for (const { row, error } of report.inventory.errors) {
    logger.warn({ row, error }, "Skipped inventory row");
  }

  process.stdout.write(renderReport(report, options.format));
}

async function binsCommand(inventoryArg: string | undefined, options: BinsOptions) {
  if (options.verbose) rootLogger.level = "debug";

  const inventoryPath = requirePath(inventoryArg, runtimeConfig.inventoryCsvPath, "INVENTORY_CSV_PATH", "inventory CSV");
  const importer = new InventoryImporter(logger.child({ component: "inventory-importer" }));
  const { listings } = await importer.importFile(inventoryPath);

  const capacity = runtimeConfig.binCapacity;
  const bins = analyzeBins(listings, { minFreeSlots: options.minFree, capacity });
  process.stdout.write(formatBinAnalysis(bins, options.sort, capacity));
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("stock-reconciler")
    .description("Check card inventory against want-lists and plan picking");

  program
    .command("check")
    .description("Reconcile a want-list against an inventory export")
    .argument("[inventory]", "inventory CSV (defaults to INVENTORY_CSV_PATH)")
    .argument("[wantlist]", "want-list file (defaults to WANTLIST_PATH)")
    .option("-f, --format <format>", `output view: ${OUTPUT_FORMATS.join(", ")}`, parseFormat, "summary")
    .option("-l, --language <code>", `preferred language, picked first: ${LANGUAGE_CODES.join(", ")}`, parseLanguageOption)
    .option("--language-only", "only match listings in the preferred language, by their localized name", false)
    .option("-v, --verbose", "debug logging")
    .action(checkCommand);

  program
    .command("bins")
    .description("List storage bins with free slots")
    .argument("[inventory]", "inventory CSV (defaults to INVENTORY_CSV_PATH)")
    .option("--min-free <n>", "minimum free slots", parseNonNegativeInt, runtimeConfig.minFreeSlots)
    .option("--sort <order>", "free or location", parseSortOrder, "free")
    .option("-v, --verbose", "debug logging")
    .action(binsCommand);

  return program;
}

/**
 * Run the CLI against an argv vector. Resolves to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    await buildProgram().parseAsync(argv);
    return 0;
  } catch (err) {
    logger.error({ error: errorMessage(err) }, "Command failed");
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  }
}
