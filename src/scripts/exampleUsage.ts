/**
 * Example run of the labor market model
 *
 * Run with: npm run example [outDir]
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { LaborMarketModel } from "../LaborMarketModel";
import { config } from "../config/baseConfig";
import { formatComparativeStatics } from "../ui/summary";

/** First CLI argument, then the environment, then the working directory. */
export function resolveOutDir(args: readonly string[], env: Record<string, string | undefined>): string {
  return args[0] ?? env[config.outDirEnv] ?? ".";
}

export async function main(outDir: string) {
  await mkdir(outDir, { recursive: true });

  const model = new LaborMarketModel(config.exampleParams);
  console.log(model.summary());

  for (const chart of config.exampleMarketCharts) {
    console.log(`\nGenerating plot for ${chart.label}...`);
    await model.plotMarket({ t: chart.t, savePath: join(outDir, chart.file) });
  }

  console.log("\nGenerating dynamics plot...");
  await model.plotDynamics({
    numPoints: config.exampleDynamicsChart.numPoints,
    savePath: join(outDir, config.exampleDynamicsChart.file)
  });

  const rule = "=".repeat(60);
  console.log(`\n${rule}\nComparative Statics Over Time\n${rule}`);
  formatComparativeStatics(model.comparativeStatics()).forEach(line => console.log(line));
}

// Only when launched as a script, not when imported
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(resolveOutDir(process.argv.slice(2), process.env)).catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
