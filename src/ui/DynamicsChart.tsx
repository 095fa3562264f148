import { config } from "../config/baseConfig";
import type { DynamicsChartData, Point } from "../engine/types";
import { Axes, ChartTitle, Curve, type Frame, PlotArea, makeScale, paddedDomain } from "./plot";

export const DYNAMICS_TITLES = {
  employment: "Employment Over Time",
  unemployment: "Unemployment Over Time"
} as const;

function Panel(props: { id: string; frame: Frame; title: string; yLabel: string; points: readonly Point[]; color: string }) {
  const { frame, points } = props;
  const xDomain = [0, 1] as const;
  const yDomain = paddedDomain(points.map(p => p.y));
  const scale = makeScale(frame, xDomain, yDomain);

  return (
    <g>
      <ChartTitle x={frame.left + frame.width / 2} y={frame.top - 20} text={props.title} />
      <Axes frame={frame} scale={scale} xDomain={xDomain} yDomain={yDomain} xLabel="Time (t)" yLabel={props.yLabel} />
      <PlotArea id={props.id} frame={frame}>
        <line
          x1={frame.left}
          y1={scale.y(0)}
          x2={frame.left + frame.width}
          y2={scale.y(0)}
          stroke={config.palette.zero}
          strokeDasharray="8 5"
        />
        <Curve points={points} scale={scale} color={props.color} />
      </PlotArea>
    </g>
  );
}

export function DynamicsChart({ data, width, height }: { data: DynamicsChartData; width: number; height: number }) {
  const panelW = width / 2;
  const frameFor = (i: number): Frame => ({ left: i * panelW + 90, top: 60, width: panelW - 120, height: height - 140 });

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={height} viewBox={`0 0 ${width} ${height}`}>
      <rect width={width} height={height} fill="#ffffff" />
      <Panel
        id="dynamics-employment"
        frame={frameFor(0)}
        title={DYNAMICS_TITLES.employment}
        yLabel="Employment L(t)"
        points={data.employment}
        color={config.palette.supply}
      />
      <Panel
        id="dynamics-unemployment"
        frame={frameFor(1)}
        title={DYNAMICS_TITLES.unemployment}
        yLabel="Unemployment U(t)"
        points={data.unemployment}
        color={config.palette.demand}
      />
    </svg>
  );
}
