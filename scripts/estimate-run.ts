import { readFile, writeFile } from "fs/promises";
import { logError, logger } from "../server/logger";
import {
  EstimateInputError,
  formatVerificationReport,
  loadBuildingMetrics,
  loadDictionary,
  loadEstimateItems,
  loadEstimatingConfig,
  loadPriceKb,
  loadReferenceItems,
  PricingRunService,
  verificationToCsv,
} from "../server/services/estimating";

function argValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function usageAndExit(msg?: string): never {
  if (msg) console.error(`[estimate-run] ${msg}`);
  console.error("Usage:");
  console.error(
    "  tsx scripts/estimate-run.ts --items <items.json> --kb <kb.json> [--references <reference.json>] [--metrics <metrics.json>] [--spec <spec.txt>] [--out <priced.json>] [--csv <verification.csv>]"
  );
  console.error("\nNotes:");
  console.error("  - Thresholds, concurrency and the dictionary override path come from .env (see .env.example).");
  console.error("  - --metrics takes precedence over metrics extracted from --spec.\n");
  process.exit(2);
}

async function main() {
  const itemsPath = argValue("--items");
  const kbPath = argValue("--kb");
  if (!itemsPath || !kbPath) usageAndExit("--items and --kb are required");

  const referencesPath = argValue("--references");
  const metricsPath = argValue("--metrics");
  const specPath = argValue("--spec");
  const outPath = argValue("--out");
  const csvPath = argValue("--csv");

  const config = loadEstimatingConfig();
  const dictionary = await loadDictionary(config.dictionaryPath);

  const [items, kb, references, metrics, specText] = await Promise.all([
    loadEstimateItems(itemsPath),
    loadPriceKb(kbPath),
    referencesPath ? loadReferenceItems(referencesPath) : Promise.resolve(null),
    metricsPath ? loadBuildingMetrics(metricsPath) : Promise.resolve(null),
    specPath ? readFile(specPath, "utf8") : Promise.resolve(null),
  ]);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; remaining items will not be matched");
    controller.abort();
  });

  const service = PricingRunService.fromConfig(config, dictionary);
  const report = await service.run({ items, kb, references, metrics, specText }, { signal: controller.signal });

  console.log(formatVerificationReport(report.verification));

  if (outPath) {
    await writeFile(outPath, JSON.stringify({ items: report.items, findings: report.findings }, null, 2) + "\n", "utf8");
    logger.info("Wrote priced items", { path: outPath, items: report.items.length });
  }
  if (csvPath) {
    await writeFile(csvPath, verificationToCsv(report.verification), "utf8");
    logger.info("Wrote verification CSV", { path: csvPath });
  }
}

main().catch((error: unknown) => {
  if (error instanceof EstimateInputError) {
    logError(error, { code: error.code, path: error.details.path });
  } else {
    logError(error);
  }
  process.exit(1);
});
