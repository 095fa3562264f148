import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import sharp from "sharp";
import { config } from "../config/baseConfig";
import type { Chart } from "./charts";

export type ImageFormat = "svg" | "png";

export function imageFormatFor(path: string): ImageFormat {
  const ext = extname(path).toLowerCase();
  if (ext === ".svg") return "svg";
  if (ext === ".png") return "png";
  throw new Error(`Unsupported chart format "${ext || path}": use .png or .svg`);
}

/** Writes the chart to `path`; the extension picks SVG text or a PNG raster. */
export async function saveChart(chart: Chart, path: string): Promise<void> {
  if (imageFormatFor(path) === "svg") {
    await writeFile(path, chart.svg, "utf8");
  } else {
    await sharp(Buffer.from(chart.svg), { density: config.chart.rasterDensity }).png().toFile(path);
  }
  console.info(`Figure saved to ${path}`);
}
