export interface LaborMarketParams {
  // Supply: w = aS + bS * L
  aS: number;
  bS: number;

  // Demand: w = aD0 - k * t - bD * L
  aD0: number;
  bD: number;
  k: number;

  // Policy
  wBar: number;

  // 0 = short run, 1 = long run
  t: number;
}

export type LaborMarketInput = Omit<LaborMarketParams, "t"> & { t?: number };

export interface Equilibrium {
  labor: number;
  wage: number;
}

export interface MarketSnapshot {
  t: number;
  demandIntercept: number;
  employment: number;
  laborSupplied: number;
  unemployment: number;
  employmentDerivative: number;
}

export interface ComparativeStaticsRow {
  t: number;
  employment: number;
  unemployment: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface MarketChartData {
  t: number;
  lMax: number;
  wMax: number;
  wBar: number;

  // Curves
  supply: Point[];
  demand: Point[];

  // Annotations
  equilibrium: Point;
  employment: Point | null;
  laborSupplied: Point;
  unemploymentSpan: { from: number; to: number; amount: number } | null;
}

export interface DynamicsChartData {
  employment: Point[];
  unemployment: Point[];
}
