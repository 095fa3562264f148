import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { config } from "../config/baseConfig";
import { type MarketChartOptions, dynamicsChartData, marketChartData } from "../engine/sampling";
import type { DynamicsChartData, LaborMarketParams, MarketChartData } from "../engine/types";
import { DynamicsChart } from "./DynamicsChart";
import { MarketChart, marketChartTitle } from "./MarketChart";

export type ChartKind = "market" | "dynamics";

/** A rendered figure. Owned by the caller; nothing is kept between calls. */
export interface Chart<K extends ChartKind = ChartKind, D = MarketChartData | DynamicsChartData> {
  kind: K;
  title: string;
  width: number;
  height: number;
  data: D;
  svg: string;
}

export type MarketChartHandle = Chart<"market", MarketChartData>;
export type DynamicsChartHandle = Chart<"dynamics", DynamicsChartData>;

export function renderSvg(element: ReactElement): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n${renderToStaticMarkup(element)}`;
}

export function buildMarketChart(
  p: LaborMarketParams,
  options: Omit<MarketChartOptions, "samples"> = {}
): MarketChartHandle {
  const { width, height } = config.chart.market;
  const data = marketChartData(p, options);
  return {
    kind: "market",
    title: marketChartTitle(data.t),
    width,
    height,
    data,
    svg: renderSvg(<MarketChart data={data} width={width} height={height} />)
  };
}

export function buildDynamicsChart(p: LaborMarketParams, numPoints?: number): DynamicsChartHandle {
  const { width, height } = config.chart.dynamics;
  const data = dynamicsChartData(p, numPoints);
  return {
    kind: "dynamics",
    title: "Employment and Unemployment Over Time",
    width,
    height,
    data,
    svg: renderSvg(<DynamicsChart data={data} width={width} height={height} />)
  };
}
