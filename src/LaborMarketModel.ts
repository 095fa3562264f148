import { config } from "./config/baseConfig";
import * as market from "./engine/market";
import { createLaborMarketParams } from "./engine/params";
import type {
  ComparativeStaticsRow,
  Equilibrium,
  LaborMarketInput,
  LaborMarketParams,
  MarketSnapshot
} from "./engine/types";
import { type DynamicsChartHandle, type MarketChartHandle, buildDynamicsChart, buildMarketChart } from "./ui/charts";
import { saveChart } from "./ui/saveChart";
import { formatSummary } from "./ui/summary";

export interface PlotMarketOptions {
  t?: number;
  lMax?: number;
  savePath?: string;
}

export interface PlotDynamicsOptions {
  numPoints?: number;
  savePath?: string;
}

/**
 * Competitive labor market with a binding wage floor and a demand curve that
 * shifts inward as t runs from 0 (short run) to 1 (long run).
 *
 * Construction validates the parameters; every query afterwards is a pure
 * function of them. Methods taking `t` fall back to the stored time index.
 */
export class LaborMarketModel {
  private readonly p: Readonly<LaborMarketParams>;

  constructor(input: LaborMarketInput) {
    this.p = createLaborMarketParams(input);
  }

  get params(): Readonly<LaborMarketParams> {
    return this.p;
  }

  laborSupply(labor: number): number {
    return market.laborSupply(this.p, labor);
  }

  demandIntercept(t?: number): number {
    return market.demandIntercept(this.p, t);
  }

  laborDemand(labor: number, t?: number): number {
    return market.laborDemand(this.p, labor, t);
  }

  equilibriumLabor(): number {
    return market.equilibriumLabor(this.p);
  }

  equilibriumWage(): number {
    return market.equilibriumWage(this.p);
  }

  equilibrium(): Equilibrium {
    return market.equilibrium(this.p);
  }

  employmentAtFloor(t?: number): number {
    return market.employmentAtFloor(this.p, t);
  }

  laborSuppliedAtFloor(): number {
    return market.laborSuppliedAtFloor(this.p);
  }

  unemployment(t?: number): number {
    return market.unemployment(this.p, t);
  }

  employmentDerivative(): number {
    return market.employmentDerivative(this.p);
  }

  snapshot(t?: number): MarketSnapshot {
    return market.snapshotAt(this.p, t);
  }

  comparativeStatics(times: readonly number[] = config.comparativeStaticsTimes): ComparativeStaticsRow[] {
    return market.comparativeStatics(this.p, times);
  }

  summary(t?: number): string {
    return formatSummary(this.p, t);
  }

  marketChart(options: { t?: number; lMax?: number } = {}): MarketChartHandle {
    return buildMarketChart(this.p, options);
  }

  async plotMarket(options: PlotMarketOptions = {}): Promise<MarketChartHandle> {
    const chart = this.marketChart({ t: options.t, lMax: options.lMax });
    if (options.savePath) await saveChart(chart, options.savePath);
    return chart;
  }

  dynamicsChart(numPoints?: number): DynamicsChartHandle {
    return buildDynamicsChart(this.p, numPoints);
  }

  async plotDynamics(options: PlotDynamicsOptions = {}): Promise<DynamicsChartHandle> {
    const chart = this.dynamicsChart(options.numPoints);
    if (options.savePath) await saveChart(chart, options.savePath);
    return chart;
  }
}
