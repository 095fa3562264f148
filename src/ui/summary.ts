import { equilibrium, snapshotAt } from "../engine/market";
import type { ComparativeStaticsRow, LaborMarketParams } from "../engine/types";
import { fmtFixed } from "./format";

const RULE = "=".repeat(50);

function trendPhrase(dLdt: number) {
  if (dLdt < 0) return "Employment declining";
  if (dLdt === 0) return "Employment constant";
  return "Employment increasing";
}

function unemploymentPhrase(u: number, dLdt: number) {
  if (u > 0 && dLdt < 0) return "Unemployment increasing";
  if (u === 0) return "No unemployment";
  return "Unemployment present";
}

export function formatSummary(p: LaborMarketParams, t: number = p.t): string {
  const eq = equilibrium(p);
  const s = snapshotAt(p, t);

  // Blank line above and below when printed
  return [
    "",
    "Labor Market Model Summary",
    RULE,
    "Parameters:",
    `  Supply intercept (aS): ${fmtFixed(p.aS)}`,
    `  Supply slope (bS): ${fmtFixed(p.bS)}`,
    `  Demand intercept at t=0 (aD0): ${fmtFixed(p.aD0)}`,
    `  Demand slope (bD): ${fmtFixed(p.bD)}`,
    `  Demand shift magnitude (k): ${fmtFixed(p.k)}`,
    `  Wage floor (wBar): ${fmtFixed(p.wBar)}`,
    `  Time index (t): ${fmtFixed(t)}`,
    "",
    "Initial Equilibrium (Pre-Wage Floor):",
    `  Equilibrium labor (L*): ${fmtFixed(eq.labor)}`,
    `  Equilibrium wage (w*): ${fmtFixed(eq.wage)}`,
    "",
    `At Time t = ${fmtFixed(t)}:`,
    `  Demand intercept (aD(t)): ${fmtFixed(s.demandIntercept)}`,
    `  Employment (L(t)): ${fmtFixed(s.employment)}`,
    `  Labor supplied (L_S): ${fmtFixed(s.laborSupplied)}`,
    `  Unemployment (U(t)): ${fmtFixed(s.unemployment)}`,
    `  Employment derivative (dL/dt): ${fmtFixed(s.employmentDerivative)}`,
    "",
    "Comparative Statics:",
    `  Employment change rate: ${fmtFixed(s.employmentDerivative)} (negative for k>0)`,
    `  ${trendPhrase(s.employmentDerivative)}`,
    `  ${unemploymentPhrase(s.unemployment, s.employmentDerivative)}`,
    RULE,
    ""
  ].join("\n");
}

export function formatComparativeStatics(rows: readonly ComparativeStaticsRow[]): string[] {
  return rows.map(
    r => `t=${fmtFixed(r.t, 2)}: Employment=${fmtFixed(r.employment)}, Unemployment=${fmtFixed(r.unemployment)}`
  );
}
