import type { ComparativeStaticsRow, Equilibrium, LaborMarketParams, MarketSnapshot } from "./types";

// Every `t` below defaults to the stored time index. An explicit value outside
// [0, 1] is not rejected: the curves extrapolate linearly.

export function laborSupply(p: LaborMarketParams, labor: number): number {
  return p.aS + p.bS * labor;
}

export function demandIntercept(p: LaborMarketParams, t: number = p.t): number {
  return p.aD0 - p.k * t;
}

export function laborDemand(p: LaborMarketParams, labor: number, t: number = p.t): number {
  return demandIntercept(p, t) - p.bD * labor;
}

/** Market-clearing quantity before the floor, at t = 0. */
export function equilibriumLabor(p: LaborMarketParams): number {
  return (p.aD0 - p.aS) / (p.bS + p.bD);
}

export function equilibriumWage(p: LaborMarketParams): number {
  return laborSupply(p, equilibriumLabor(p));
}

export function equilibrium(p: LaborMarketParams): Equilibrium {
  return { labor: equilibriumLabor(p), wage: equilibriumWage(p) };
}

/**
 * Hires at the floor wage, read off the demand curve:
 *
 *   L(t) = max(0, (aD(t) - wBar) / bD)
 */
export function employmentAtFloor(p: LaborMarketParams, t: number = p.t): number {
  return Math.max(0, (demandIntercept(p, t) - p.wBar) / p.bD);
}

// Supply never shifts, so this does not depend on t.
export function laborSuppliedAtFloor(p: LaborMarketParams): number {
  return (p.wBar - p.aS) / p.bS;
}

export function unemployment(p: LaborMarketParams, t: number = p.t): number {
  return Math.max(0, laborSuppliedAtFloor(p) - employmentAtFloor(p, t));
}

/** dL/dt. Constant because demand shifts linearly in t. */
export function employmentDerivative(p: LaborMarketParams): number {
  return -p.k / p.bD;
}

export function snapshotAt(p: LaborMarketParams, t: number = p.t): MarketSnapshot {
  return {
    t,
    demandIntercept: demandIntercept(p, t),
    employment: employmentAtFloor(p, t),
    laborSupplied: laborSuppliedAtFloor(p),
    unemployment: unemployment(p, t),
    employmentDerivative: employmentDerivative(p)
  };
}

export function comparativeStatics(p: LaborMarketParams, times: readonly number[]): ComparativeStaticsRow[] {
  return times.map(t => ({
    t,
    employment: employmentAtFloor(p, t),
    unemployment: unemployment(p, t)
  }));
}
