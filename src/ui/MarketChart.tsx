import { config } from "../config/baseConfig";
import type { MarketChartData } from "../engine/types";
import { fmtShort } from "./format";
import { Axes, ChartTitle, Curve, Legend, type LegendEntry, Marker, PlotArea, makeScale } from "./plot";

export function marketChartTitle(t: number) {
  return `Labor Market with Binding Wage Floor (t=${fmtShort(t)})`;
}

export function marketLegend(data: MarketChartData): LegendEntry[] {
  const c = config.palette;
  const entries: LegendEntry[] = [
    { label: "Labor Supply", color: c.supply, symbol: "line" },
    { label: `Labor Demand (t=${fmtShort(data.t)})`, color: c.demand, symbol: "line" },
    { label: `Wage Floor (w̄=${fmtShort(data.wBar)})`, color: c.floor, symbol: "dash" },
    {
      label: `Initial Equilibrium (L*=${fmtShort(data.equilibrium.x)}, w*=${fmtShort(data.equilibrium.y)})`,
      color: c.equilibrium,
      symbol: "marker"
    }
  ];
  if (data.employment) {
    entries.push({ label: `Employment (L(t)=${fmtShort(data.employment.x)})`, color: c.employment, symbol: "marker" });
  }
  entries.push({ label: `Labor Supplied (L_S=${fmtShort(data.laborSupplied.x)})`, color: c.laborSupplied, symbol: "marker" });
  if (data.unemploymentSpan) {
    entries.push({ label: `Unemployment (U=${fmtShort(data.unemploymentSpan.amount)})`, color: c.unemployment, symbol: "band" });
  }
  return entries;
}

export function MarketChart({ data, width, height }: { data: MarketChartData; width: number; height: number }) {
  const frame = { left: 90, top: 60, width: width - 120, height: height - 140 };
  const xDomain = [0, data.lMax] as const;
  const yDomain = [0, data.wMax] as const;
  const scale = makeScale(frame, xDomain, yDomain);
  const c = config.palette;
  const span = data.unemploymentSpan;
  const legend = marketLegend(data);

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height} viewBox={`0 0 ${width} ${height}`}>
      <rect width={width} height={height} fill="#ffffff" />
      <ChartTitle x={width / 2} y={36} text={marketChartTitle(data.t)} />
      <Axes frame={frame} scale={scale} xDomain={xDomain} yDomain={yDomain} xLabel="Labor (L)" yLabel="Wage (w)" />
      <PlotArea id="market-plot" frame={frame}>
        {span && (
          <rect
            x={scale.x(span.from)}
            y={scale.y(data.wBar) - 7}
            width={scale.x(span.to) - scale.x(span.from)}
            height={14}
            fill={c.unemployment}
          />
        )}
        <Curve points={data.supply} scale={scale} color={c.supply} />
        <Curve points={data.demand} scale={scale} color={c.demand} />
        <line
          x1={frame.left}
          y1={scale.y(data.wBar)}
          x2={frame.left + frame.width}
          y2={scale.y(data.wBar)}
          stroke={c.floor}
          strokeWidth={2.5}
          strokeDasharray="8 5"
        />
        <Marker at={data.equilibrium} scale={scale} color={c.equilibrium} label="(L*, w*)" labelFill="#ffeb3b" dx={10} dy={-10} />
        {data.employment && (
          <Marker at={data.employment} scale={scale} color={c.employment} label="(L(t), w̄)" labelFill="#add8e6" dx={10} dy={24} />
        )}
        <Marker at={data.laborSupplied} scale={scale} color={c.laborSupplied} label="(L_S, w̄)" labelFill="#90ee90" dx={10} dy={-20} />
      </PlotArea>
      <Legend entries={legend} x={frame.left + frame.width - 400} y={frame.top + 10} />
    </svg>
  );
}
