/**
 * Variant Prioritization CLI
 *
 * Ranks a tab-separated variant table and writes it with the same columns:
 * classification tier, then consensus tier, then confidence breakdown, then
 * computational predictors.
 *
 * Run with: npx tsx scripts/prioritize-variants.ts <input.tsv> <output.tsv>
 */

// Load environment variables from .env file
import "dotenv/config";

import { loadConfig } from "@/lib/config";
import { log, prioritizeVariantFile } from "@/lib/pipeline";
import { formatPrioritizationSummary } from "@/lib/summary";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length !== 2) {
    console.log("Usage: npx tsx scripts/prioritize-variants.ts <input.tsv> <output.tsv>");
    process.exitCode = 1;
    return;
  }

  const [inputPath, outputPath] = args;
  const config = loadConfig();
  const result = await prioritizeVariantFile(inputPath, outputPath, { config });

  console.log("");
  console.log(formatPrioritizationSummary(result.summary));
  console.log("\nSuccessfully prioritized variants");
}

main().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : "Unknown error";
  log("error", "Prioritization failed", { error: errorMessage });
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
