import { describe, it, expect } from "vitest";
import { createLaborMarketParams } from "../engine/params";
import { marketChartData } from "../engine/sampling";
import { buildDynamicsChart, buildMarketChart } from "./charts";
import { marketChartTitle, marketLegend } from "./MarketChart";

const example = createLaborMarketParams({ aS: 5, bS: 0.5, aD0: 20, bD: 1, k: 3, wBar: 12 });
const steep = createLaborMarketParams({ aS: 1, bS: 1, aD0: 4, bD: 1, k: 20, wBar: 3 });

describe("market chart", () => {
  it("titles the chart with the time index", () => {
    expect(marketChartTitle(0)).toBe("Labor Market with Binding Wage Floor (t=0.00)");
    expect(marketChartTitle(0.5)).toBe("Labor Market with Binding Wage Floor (t=0.50)");
  });

  it("lists every series and annotation in the legend", () => {
    expect(marketLegend(marketChartData(example)).map(e => e.label)).toEqual([
      "Labor Supply",
      "Labor Demand (t=0.00)",
      "Wage Floor (w̄=12.00)",
      "Initial Equilibrium (L*=10.00, w*=10.00)",
      "Employment (L(t)=8.00)",
      "Labor Supplied (L_S=14.00)",
      "Unemployment (U=6.00)"
    ]);
  });

  it("leaves employment and unemployment out of the legend when nobody is hired", () => {
    expect(marketLegend(marketChartData(steep, { t: 1 })).map(e => e.label)).toEqual([
      "Labor Supply",
      "Labor Demand (t=1.00)",
      "Wage Floor (w̄=3.00)",
      "Initial Equilibrium (L*=1.50, w*=2.50)",
      "Labor Supplied (L_S=2.00)"
    ]);
  });

  it("renders a standalone SVG document", () => {
    const chart = buildMarketChart(example);
    expect(chart.kind).toBe("market");
    expect(chart.title).toBe("Labor Market with Binding Wage Floor (t=0.00)");
    expect(chart.width).toBe(1000);
    expect(chart.height).toBe(800);
    expect(chart.svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
    expect(chart.svg).toContain(">Labor Market with Binding Wage Floor (t=0.00)</text>");
    expect(chart.svg).toContain('clip-path="url(#market-plot)"');
    expect(chart.svg).toContain(">(L*, w*)</text>");
    expect(chart.svg).toContain(">(L(t), w̄)</text>");
    expect(chart.svg).toContain(">(L_S, w̄)</text>");
  });

  it("skips the employment marker when nobody is hired", () => {
    const chart = buildMarketChart(steep, { t: 1 });
    expect(chart.data.employment).toBeNull();
    expect(chart.svg).not.toContain(">(L(t), w̄)</text>");
  });

  it("passes t and lMax through to the data", () => {
    const chart = buildMarketChart(example, { t: 1, lMax: 30 });
    expect(chart.data.t).toBe(1);
    expect(chart.data.lMax).toBe(30);
    expect(chart.title).toBe("Labor Market with Binding Wage Floor (t=1.00)");
  });
});

describe("dynamics chart", () => {
  it("renders both panels", () => {
    const chart = buildDynamicsChart(example, 5);
    expect(chart.kind).toBe("dynamics");
    expect(chart.width).toBe(1400);
    expect(chart.height).toBe(600);
    expect(chart.data.employment).toHaveLength(5);
    expect(chart.svg).toContain(">Employment Over Time</text>");
    expect(chart.svg).toContain(">Unemployment Over Time</text>");
    expect(chart.svg).toContain('clip-path="url(#dynamics-employment)"');
    expect(chart.svg).toContain('clip-path="url(#dynamics-unemployment)"');
  });

  it("uses the default sample count", () => {
    expect(buildDynamicsChart(example).data.unemployment).toHaveLength(50);
  });
});
