import { readFile } from "fs/promises";
import path from "path";
import { pathToFileURL } from "url";
import { loadEnvFiles } from "../config/load-env";
import { parseEnv } from "../config/env";
import { runIngestion } from "../etl/pipeline";
import type { GroupSpec } from "../etl/normalizer";
import { readWorkbookTable } from "../etl/sources/workbook";
import { GoogleSheetsStore } from "../etl/store/googleSheetsStore";
import { InMemorySpreadsheetStore } from "../etl/store/memoryStore";
import type { SpreadsheetStore } from "../etl/types";
import { ConfigError, isOperationalError, toError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const log = createLogger("ingest-workbook");

export interface IngestArgs {
  file: string;
  sheet?: string;
  seriesId: string;
  table?: string;
  layout: "year" | "label";
  year?: number;
  dimension: string;
  nonNegative: boolean;
  dryRun: boolean;
  help: boolean;
}

function printHelp(): void {
  console.log(`
Usage: tsx server/scripts/ingestWorkbook.ts <file.xlsx> --series <id> [options]

Options:
  --sheet <name>        Worksheet to read (default: first)
  --series <id>         Series id for the records (required)
  --table <name>        Fact table to merge into (default: FACT_TABLE)
  --layout year|label   First-column grouping of wide tables (default: year)
  --year <yyyy>         Reference year for label-grouped tables
  --dimension <name>    Dimension holding the label (default: localidade)
  --non-negative        Flag negative values
  --dry-run             Merge into an in-memory store and print the result
  -h, --help            Show this help
`);
}

export function parseIngestArgs(argv: readonly string[]): IngestArgs {
  const args: Partial<IngestArgs> & { layout: "year" | "label"; dimension: string } = {
    layout: "year",
    dimension: "localidade",
    nonNegative: false,
    dryRun: false,
    help: false,
  };

  const valueAfter = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--sheet") {
      args.sheet = valueAfter(i++, arg);
    } else if (arg === "--series") {
      args.seriesId = valueAfter(i++, arg);
    } else if (arg === "--table") {
      args.table = valueAfter(i++, arg);
    } else if (arg === "--layout") {
      const layout = valueAfter(i++, arg);
      if (layout !== "year" && layout !== "label") {
        throw new ConfigError(`--layout must be 'year' or 'label', got '${layout}'`);
      }
      args.layout = layout;
    } else if (arg === "--year") {
      const year = Number(valueAfter(i++, arg));
      if (!Number.isInteger(year)) {
        throw new ConfigError("--year must be a four-digit year");
      }
      args.year = year;
    } else if (arg === "--dimension") {
      args.dimension = valueAfter(i++, arg);
    } else if (arg === "--non-negative") {
      args.nonNegative = true;
    } else if (arg === "--dry-run") {
      args.dryRun = true;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg.startsWith("--")) {
      throw new ConfigError(`Unknown option ${arg}`);
    } else if (args.file === undefined) {
      args.file = arg;
    } else {
      throw new ConfigError(`Unexpected argument ${arg}`);
    }
  }

  if (args.help) {
    return { file: "", seriesId: "", nonNegative: false, dryRun: false, ...args, help: true };
  }
  if (!args.file) throw new ConfigError("A workbook file is required");
  if (!args.seriesId) throw new ConfigError("--series is required");
  if (args.layout === "label" && args.year === undefined) {
    throw new ConfigError("--year is required with --layout label");
  }

  return {
    file: args.file,
    sheet: args.sheet,
    seriesId: args.seriesId,
    table: args.table,
    layout: args.layout,
    year: args.year,
    dimension: args.dimension,
    nonNegative: args.nonNegative ?? false,
    dryRun: args.dryRun ?? false,
    help: false,
  };
}

export function groupFor(args: IngestArgs): GroupSpec {
  if (args.layout === "label" && args.year !== undefined) {
    return { kind: "label", dimension: args.dimension, referenceYear: args.year };
  }
  return { kind: "year" };
}

async function main(): Promise<void> {
  const args = parseIngestArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  loadEnvFiles();

  let store: SpreadsheetStore;
  let table: string;
  if (args.dryRun) {
    store = new InMemorySpreadsheetStore();
    table = args.table ?? "fact_series";
  } else {
    const env = parseEnv();
    store = GoogleSheetsStore.fromEnv(env);
    table = args.table ?? env.FACT_TABLE;
  }

  const buffer = await readFile(args.file);
  const rawTable = await readWorkbookTable(buffer, {
    sheet: args.sheet,
    name: path.basename(args.file),
    sourceUrl: pathToFileURL(path.resolve(args.file)).href,
  });

  const result = await runIngestion(
    rawTable,
    {
      table,
      normalize: { seriesId: args.seriesId, group: groupFor(args) },
      quality: { nonNegative: args.nonNegative },
    },
    { store }
  );

  console.log(JSON.stringify({
    runId: result.runId,
    status: result.status,
    shape: result.shape,
    rawRows: result.rawRowCount,
    records: result.recordCount,
    droppedZeroCells: result.droppedZeroCells,
    flags: result.flags.length,
    brandNew: result.merge?.brandNew ?? 0,
    updated: result.merge?.updated ?? 0,
    total: result.merge?.total ?? 0,
  }, null, 2));
}

const invokedDirectly = process.argv[1] !== undefined
  && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch((error: unknown) => {
    const err = toError(error);
    log.error("Ingestion failed", {
      error: err.message,
      name: err.name,
      ...(isOperationalError(err) ? {} : { stack: err.stack }),
    });
    process.exit(1);
  });
}
