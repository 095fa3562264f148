import { describe, it, expect } from "vitest";
import { createLaborMarketParams } from "./params";
import { dynamicsChartData, linspace, marketChartData } from "./sampling";

const example = createLaborMarketParams({ aS: 5, bS: 0.5, aD0: 20, bD: 1, k: 3, wBar: 12 });

describe("linspace", () => {
  it("includes both ends", () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
    expect(linspace(2, 2, 3)).toEqual([2, 2, 2]);
  });

  it("handles degenerate counts", () => {
    expect(linspace(0, 1, 1)).toEqual([0]);
    expect(linspace(0, 1, 0)).toEqual([]);
    expect(linspace(0, 1, -4)).toEqual([]);
  });

  it("lands exactly on the stop value", () => {
    const xs = linspace(0, 16.8, 1000);
    expect(xs).toHaveLength(1000);
    expect(xs[999]).toBe(16.8);
  });
});

describe("marketChartData", () => {
  it("sizes the axes around the floor and equilibrium", () => {
    const data = marketChartData(example);
    expect(data.t).toBe(0);
    expect(data.lMax).toBeCloseTo(16.8, 10);
    expect(data.wMax).toBeCloseTo(13.2, 10);
    expect(data.wBar).toBe(12);
  });

  it("samples both curves on the default grid", () => {
    const data = marketChartData(example);
    expect(data.supply).toHaveLength(1000);
    expect(data.demand).toHaveLength(1000);
    expect(data.supply[0]).toEqual({ x: 0, y: 5 });
    expect(data.demand[0]).toEqual({ x: 0, y: 20 });
    expect(data.supply[999].x).toBe(data.lMax);
  });

  it("marks equilibrium, employment, labor supplied and the unemployment span", () => {
    const data = marketChartData(example);
    expect(data.equilibrium).toEqual({ x: 10, y: 10 });
    expect(data.employment).toEqual({ x: 8, y: 12 });
    expect(data.laborSupplied).toEqual({ x: 14, y: 12 });
    expect(data.unemploymentSpan).toEqual({ from: 8, to: 14, amount: 6 });
  });

  it("honours explicit t, lMax and sample count", () => {
    const data = marketChartData(example, { t: 1, lMax: 20, samples: 5 });
    expect(data.t).toBe(1);
    expect(data.lMax).toBe(20);
    expect(data.supply).toEqual([
      { x: 0, y: 5 },
      { x: 5, y: 7.5 },
      { x: 10, y: 10 },
      { x: 15, y: 12.5 },
      { x: 20, y: 15 }
    ]);
    expect(data.demand.map(p => p.y)).toEqual([17, 12, 7, 2, -3]);
    expect(data.employment).toEqual({ x: 5, y: 12 });
  });

  it("drops employment and the span once demand falls below the floor", () => {
    const steep = createLaborMarketParams({ aS: 1, bS: 1, aD0: 4, bD: 1, k: 20, wBar: 3, t: 1 });
    const data = marketChartData(steep);
    expect(data.lMax).toBeCloseTo(2.4, 10);
    expect(data.employment).toBeNull();
    expect(data.unemploymentSpan).toBeNull();
    expect(data.laborSupplied).toEqual({ x: 2, y: 3 });
  });

  it("drops the span when there is no unemployment", () => {
    const data = marketChartData(example, { t: -3 });
    expect(data.employment).toEqual({ x: 17, y: 12 });
    expect(data.unemploymentSpan).toBeNull();
  });
});

describe("dynamicsChartData", () => {
  it("samples employment and unemployment over [0, 1]", () => {
    const data = dynamicsChartData(example, 5);
    expect(data.employment).toEqual([
      { x: 0, y: 8 },
      { x: 0.25, y: 7.25 },
      { x: 0.5, y: 6.5 },
      { x: 0.75, y: 5.75 },
      { x: 1, y: 5 }
    ]);
    expect(data.unemployment.map(p => p.y)).toEqual([6, 6.75, 7.5, 8.25, 9]);
  });

  it("defaults to 50 points", () => {
    const data = dynamicsChartData(example);
    expect(data.employment).toHaveLength(50);
    expect(data.unemployment).toHaveLength(50);
  });
});
