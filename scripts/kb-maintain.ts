import { writeFile } from "fs/promises";
import { logError, logger } from "../server/logger";
import {
  AGGREGATION_METHODS,
  aggregateKbEntries,
  EstimateInputError,
  loadPriceKb,
  MERGE_STRATEGIES,
  mergeKbEntries,
  type AggregationMethod,
  type MergeStrategy,
} from "../server/services/estimating";

function argValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function usageAndExit(msg?: string): never {
  if (msg) console.error(`[kb-maintain] ${msg}`);
  console.error("Usage:");
  console.error("  tsx scripts/kb-maintain.ts aggregate --kb <kb.json> --out <kb.json> [--method median|average|time-weighted]");
  console.error("  tsx scripts/kb-maintain.ts merge --kb <kb.json> --incoming <batch.json> --out <kb.json> [--strategy keep-new|keep-old|average]\n");
  process.exit(2);
}

function isAggregationMethod(value: string): value is AggregationMethod {
  return AGGREGATION_METHODS.some((m) => m === value);
}

function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES.some((s) => s === value);
}

async function main() {
  const command = process.argv[2];
  const kbPath = argValue("--kb");
  const outPath = argValue("--out");
  if (!kbPath || !outPath) usageAndExit("--kb and --out are required");

  const kb = await loadPriceKb(kbPath);

  if (command === "aggregate") {
    const method = argValue("--method") ?? "median";
    if (!isAggregationMethod(method)) usageAndExit(`unknown method: ${method}`);

    const entries = aggregateKbEntries(kb, method);
    await writeFile(outPath, JSON.stringify(entries, null, 2) + "\n", "utf8");
    logger.info("Aggregated KB", { method, before: kb.length, after: entries.length, path: outPath });
    return;
  }

  if (command === "merge") {
    const incomingPath = argValue("--incoming");
    if (!incomingPath) usageAndExit("--incoming is required for merge");
    const strategy = argValue("--strategy") ?? "keep-new";
    if (!isMergeStrategy(strategy)) usageAndExit(`unknown strategy: ${strategy}`);

    const incoming = await loadPriceKb(incomingPath);
    const merged = mergeKbEntries(kb, incoming, strategy);
    await writeFile(outPath, JSON.stringify(merged.entries, null, 2) + "\n", "utf8");
    logger.info("Merged KB", { strategy, added: merged.added, updated: merged.updated, total: merged.entries.length, path: outPath });
    return;
  }

  usageAndExit(command ? `unknown command: ${command}` : "missing command");
}

main().catch((error: unknown) => {
  if (error instanceof EstimateInputError) {
    logError(error, { code: error.code, path: error.details.path });
  } else {
    logError(error);
  }
  process.exit(1);
});
