#!/usr/bin/env node
import { Command } from "commander";
import path from "path";

import type { CoreError, IAppConfig, IUsageRecord } from "./types";
import { ConfigLoader } from "./core/ConfigLoader";
import { createHistoryCache } from "./core/HistorySource";
import { Logger } from "./core/Logger";
import { aggregateUsage } from "./stages/1-aggregate";
import { allocateQuantity } from "./stages/2-allocate";
import { listCategories, listDepartments, listItemNames } from "./reports/catalog";
import { buildIssuanceDraft } from "./reports/issuance";
import { buildOverview } from "./reports/overview";
import { buildUsageHistory } from "./reports/usage-history";
import { renderBarChart } from "./utils/chart";
import { parseAllocationEntry } from "./utils/entries";
import { writeAllocationCsv } from "./utils/export";
import { formatAllocationRows, formatDate, formatNumber } from "./utils/format";
import { describeIdentifier, resolveIdentifier } from "./utils/identifier";
import { renderTable } from "./utils/table";

type GlobalOptions = {
  config?: string;
  refresh?: boolean;
  quiet?: boolean;
};

type Context = {
  config: IAppConfig;
  logger: Logger;
  history: readonly IUsageRecord[];
};

const collect = (value: string, previous: string[] | undefined): string[] =>
  previous ? [...previous, value] : [value];

const parsePositive = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive number, got "${value}".`);
  }
  return parsed;
};

const parseDateOption = (value: string): string => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new Error(`Expected a date as YYYY-MM-DD, got "${value}".`);
  }
  return value;
};

const reportFailure = async (logger: Logger, error: CoreError): Promise<void> => {
  if (error.kind === "DataError") {
    await logger.error(error.message);
  } else {
    await logger.warn(error.message);
  }
};

const loadContext = async (program: Command): Promise<Context> => {
  const options = program.opts<GlobalOptions>();
  const config = await ConfigLoader.loadAppConfig(
    options.config ? path.resolve(options.config) : undefined
  );
  const logger = new Logger(path.resolve(config.output.logDir), { quiet: options.quiet });
  const cache = createHistoryCache(config, { logger });
  if (options.refresh) {
    await cache.invalidate();
  }
  const history = await cache.get(config.cache.ttlSeconds * 1000);
  if (history.length === 0) {
    throw new Error("No usage records found in the configured history source.");
  }
  return { config, logger, history };
};

const runAllocate = async (
  context: Context,
  options: { item: string[]; department?: string; csv?: boolean }
): Promise<void> => {
  const { config, logger, history } = context;
  if (options.item.length > config.allocation.maxItems) {
    throw new Error(`At most ${config.allocation.maxItems} items can be allocated at once.`);
  }
  const entries = options.item.map(parseAllocationEntry);

  for (const entry of entries) {
    const identifier = resolveIdentifier(entry.identifier);
    if (!identifier.ok) {
      await reportFailure(logger, identifier.error);
      continue;
    }
    const result = allocateQuantity(history, identifier.value, entry.quantity, {
      department: options.department,
    });
    if (!result.ok) {
      await reportFailure(logger, result.error);
      continue;
    }

    const rows = formatAllocationRows(result.value);
    console.log("");
    console.log(`Allocation for ${describeIdentifier(identifier.value)} (${entry.quantity})`);
    console.log(
      renderTable(
        [
          { header: "Department" },
          { header: "Proportion (%)", align: "right" },
          { header: "Allocated Quantity", align: "right" },
        ],
        rows.map((row) => [
          row.department,
          row.proportion.toFixed(2),
          String(row.allocatedQuantity),
        ])
      )
    );

    if (options.csv) {
      const filePath = await writeAllocationCsv({
        outputDir: path.resolve(config.output.dir),
        itemName: entry.identifier,
        rows,
      });
      await logger.info(`Saved allocation to ${filePath}`);
    }
  }
};

const runShares = async (
  context: Context,
  item: string,
  options: { department?: string; min?: number }
): Promise<void> => {
  const identifier = resolveIdentifier(item);
  if (!identifier.ok) {
    await reportFailure(context.logger, identifier.error);
    return;
  }
  const result = aggregateUsage(context.history, identifier.value, {
    department: options.department,
    minProportion: options.min ?? context.config.aggregation.minProportion,
  });
  if (!result.ok) {
    await reportFailure(context.logger, result.error);
    return;
  }
  console.log(`Usage shares for ${describeIdentifier(identifier.value)}`);
  console.log(
    renderTable(
      [
        { header: "Department" },
        { header: "Quantity", align: "right" },
        { header: "Proportion (%)", align: "right" },
        { header: "Weight", align: "right" },
      ],
      result.value.map((share) => [
        share.department,
        formatNumber(share.quantity),
        formatNumber(share.proportion),
        formatNumber(share.weight, 4),
      ])
    )
  );
};

const runOverview = (
  context: Context,
  options: {
    from?: string;
    to?: string;
    category?: string[];
    item?: string[];
    department?: string[];
    limit: number;
  }
): void => {
  const overview = buildOverview(context.history, {
    from: options.from,
    to: options.to,
    categories: options.category,
    items: options.item,
    departments: options.department,
  });

  console.log("Usage Statistics");
  console.log(`- Total Quantity Used: ${formatNumber(overview.totalQuantity)}`);
  console.log(`- Unique Items: ${overview.uniqueItems}`);
  console.log(`- Total Transactions: ${overview.transactions.toLocaleString("en-US")}`);
  console.log("");

  const preview = overview.preview.slice(0, options.limit);
  console.log(`Filtered Data Preview (${preview.length} of ${overview.transactions})`);
  console.log(
    renderTable(
      [
        { header: "Date" },
        { header: "Item" },
        { header: "Department" },
        { header: "Quantity", align: "right" },
        { header: "Unit" },
        { header: "Category" },
      ],
      preview.map((record) => [
        formatDate(record.date),
        record.itemName,
        record.department,
        formatNumber(record.quantity),
        record.unitOfMeasure,
        record.itemCategory,
      ])
    )
  );

  if (overview.departmentUsage.length > 0) {
    console.log("");
    console.log(
      renderBarChart(
        overview.departmentUsage.map((usage) => ({
          label: usage.department,
          value: usage.quantity,
        })),
        { title: "Usage Distribution by Department", formatValue: (value) => formatNumber(value) }
      )
    );
  }
};

const runHistory = async (context: Context, item: string): Promise<void> => {
  const result = buildUsageHistory(context.history, item);
  if (!result.ok) {
    await reportFailure(context.logger, result.error);
    return;
  }
  const { points, quarters } = result.value;
  console.log(
    renderBarChart(
      points.map((point) => ({ label: formatDate(point.date), value: point.quantity })),
      { title: `Historical Usage for ${item}`, formatValue: (value) => formatNumber(value) }
    )
  );
  console.log("");
  console.log(
    renderTable(
      [{ header: "Quarter" }, { header: "Quantity", align: "right" }],
      quarters.map((quarter) => [quarter.quarter, formatNumber(quarter.quantity)])
    )
  );
};

const runIssue = async (
  context: Context,
  options: {
    item: string;
    quantity: number;
    date?: string;
    department?: string;
    issuedTo?: string;
    unit?: string;
    category?: string;
    reference?: string;
    departmentCategory?: string;
    batch?: string;
    store?: string;
    receivedBy?: string;
  }
): Promise<void> => {
  const result = buildIssuanceDraft(context.history, {
    itemName: options.item,
    quantity: options.quantity,
    date: options.date ? new Date(`${options.date}T00:00:00`) : undefined,
    department: options.department,
    issuedTo: options.issuedTo,
    unitOfMeasure: options.unit,
    itemCategory: options.category,
    reference: options.reference,
    departmentCategory: options.departmentCategory,
    batchNumber: options.batch,
    store: options.store,
    receivedBy: options.receivedBy,
  });
  if (!result.ok) {
    await reportFailure(context.logger, result.error);
    return;
  }
  const draft = result.value;
  console.log("Issuance draft (not written to the data source):");
  console.log(
    renderTable(
      [{ header: "Field" }, { header: "Value" }],
      [
        ["Date", formatDate(draft.date)],
        ["Item Name", draft.itemName],
        ["Quantity", String(draft.quantity)],
        ["Department", draft.department],
        ["Issued To", draft.issuedTo],
        ["Unit of Measure", draft.unitOfMeasure],
        ["Item Category", draft.itemCategory],
        ["Reference", draft.reference],
        ["Department Category", draft.departmentCategory],
        ["Batch No.", draft.batchNumber],
        ["Store", draft.store],
        ["Received By", draft.receivedBy],
      ]
    )
  );
};

const runCatalog = (context: Context): void => {
  console.log("Items:");
  listItemNames(context.history).forEach((name) => console.log(`- ${name}`));
  console.log("");
  console.log("Departments:");
  listDepartments(context.history).forEach((name) => console.log(`- ${name}`));
  console.log("");
  console.log("Categories:");
  listCategories(context.history).forEach((name) => console.log(`- ${name}`));
};

const run = async (): Promise<void> => {
  const program = new Command();
  program
    .name("ingredient-allocation")
    .description("Allocate ingredient stock across departments by historical usage")
    .option("-c, --config <path>", "Path to the app config (default config/app.json)")
    .option("--refresh", "Reload history instead of using the cached snapshot")
    .option("--quiet", "Only print warnings and errors from the logger");

  program
    .command("allocate")
    .description("Split available quantities across departments")
    .requiredOption("-i, --item <item=qty>", "Item name or serial with quantity (repeatable)", collect)
    .option("-d, --department <name>", "Restrict to one department")
    .option("--csv", "Also write each allocation to a CSV file")
    .action(async (options: { item: string[]; department?: string; csv?: boolean }) => {
      await runAllocate(await loadContext(program), options);
    });

  program
    .command("shares <item>")
    .description("Show per-department usage proportions for an item")
    .option("-d, --department <name>", "Restrict to one department")
    .option("--min <percent>", "Significance threshold in percent", parseFloat)
    .action(async (item: string, options: { department?: string; min?: number }) => {
      await runShares(await loadContext(program), item, options);
    });

  program
    .command("overview")
    .description("Summarize usage with optional filters")
    .option("--from <date>", "Earliest date (YYYY-MM-DD)", parseDateOption)
    .option("--to <date>", "Latest date (YYYY-MM-DD)", parseDateOption)
    .option("--category <name>", "Item category (repeatable)", collect)
    .option("--item <name>", "Item name (repeatable)", collect)
    .option("--department <name>", "Department (repeatable)", collect)
    .option("--limit <rows>", "Preview rows to print", (value) => Math.floor(parsePositive(value)), 20)
    .action(
      async (options: {
        from?: string;
        to?: string;
        category?: string[];
        item?: string[];
        department?: string[];
        limit: number;
      }) => {
        runOverview(await loadContext(program), options);
      }
    );

  program
    .command("history <item>")
    .description("Show historical usage for an item")
    .action(async (item: string) => {
      await runHistory(await loadContext(program), item);
    });

  program
    .command("issue")
    .description("Prepare an issuance entry prefilled from history")
    .requiredOption("--item <name>", "Item name")
    .requiredOption("--quantity <n>", "Issued quantity", parsePositive)
    .option("--date <date>", "Issuance date (YYYY-MM-DD)", parseDateOption)
    .option("--department <name>")
    .option("--issued-to <name>")
    .option("--unit <unit>")
    .option("--category <name>")
    .option("--reference <text>")
    .option("--department-category <name>")
    .option("--batch <number>")
    .option("--store <name>")
    .option("--received-by <name>")
    .action(async (options: Parameters<typeof runIssue>[1]) => {
      await runIssue(await loadContext(program), options);
    });

  program
    .command("catalog")
    .description("List known items, departments and categories")
    .action(async () => {
      runCatalog(await loadContext(program));
    });

  await program.parseAsync(process.argv);
};

run().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Fatal error: ${message}`);
  process.exit(1);
});
