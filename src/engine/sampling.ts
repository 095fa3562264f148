import { config } from "../config/baseConfig";
import {
  employmentAtFloor,
  equilibriumLabor,
  equilibriumWage,
  laborDemand,
  laborSuppliedAtFloor,
  laborSupply,
  unemployment
} from "./market";
import type { DynamicsChartData, LaborMarketParams, MarketChartData } from "./types";

/** `n` evenly spaced values from start to stop, both ends included. */
export function linspace(start: number, stop: number, n: number): number[] {
  const count = Math.max(0, Math.floor(n));
  if (count === 0) return [];
  if (count === 1) return [start];

  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

export interface MarketChartOptions {
  t?: number;
  lMax?: number;
  samples?: number;
}

export function marketChartData(p: LaborMarketParams, options: MarketChartOptions = {}): MarketChartData {
  const t = options.t ?? p.t;
  const lStar = equilibriumLabor(p);
  const wStar = equilibriumWage(p);
  const lT = employmentAtFloor(p, t);
  const lS = laborSuppliedAtFloor(p);
  const uT = unemployment(p, t);

  const lMax = options.lMax ?? Math.max(lStar * 1.5, lS * 1.2, 1);
  const grid = linspace(0, lMax, options.samples ?? config.chart.marketSamples);

  return {
    t,
    lMax,
    wMax: Math.max(p.wBar * 1.1, wStar * 1.2),
    wBar: p.wBar,
    supply: grid.map(x => ({ x, y: laborSupply(p, x) })),
    demand: grid.map(x => ({ x, y: laborDemand(p, x, t) })),
    equilibrium: { x: lStar, y: wStar },
    employment: lT > 0 ? { x: lT, y: p.wBar } : null,
    laborSupplied: { x: lS, y: p.wBar },
    unemploymentSpan: uT > 0 && lT > 0 ? { from: lT, to: lS, amount: uT } : null
  };
}

export function dynamicsChartData(
  p: LaborMarketParams,
  numPoints: number = config.chart.dynamicsPoints
): DynamicsChartData {
  const times = linspace(0, 1, numPoints);
  return {
    employment: times.map(x => ({ x, y: employmentAtFloor(p, x) })),
    unemployment: times.map(x => ({ x, y: unemployment(p, x) }))
  };
}
