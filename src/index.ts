export { LaborMarketModel } from "./LaborMarketModel";
export type { PlotDynamicsOptions, PlotMarketOptions } from "./LaborMarketModel";
export { createLaborMarketParams } from "./engine/params";
export {
  comparativeStatics,
  demandIntercept,
  employmentAtFloor,
  employmentDerivative,
  equilibrium,
  equilibriumLabor,
  equilibriumWage,
  laborDemand,
  laborSuppliedAtFloor,
  laborSupply,
  snapshotAt,
  unemployment
} from "./engine/market";
export { dynamicsChartData, linspace, marketChartData } from "./engine/sampling";
export type { MarketChartOptions } from "./engine/sampling";
export { InvalidParameterError, LaborMarketError, NonBindingFloorError } from "./engine/errors";
export type { LaborMarketErrorKind } from "./engine/errors";
export type * from "./engine/types";
export { buildDynamicsChart, buildMarketChart, renderSvg } from "./ui/charts";
export type { Chart, ChartKind, DynamicsChartHandle, MarketChartHandle } from "./ui/charts";
export { saveChart } from "./ui/saveChart";
export { formatComparativeStatics, formatSummary } from "./ui/summary";
