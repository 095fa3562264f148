import type { ReactNode } from "react";
import { config } from "../config/baseConfig";
import { linspace } from "../engine/sampling";
import type { Point } from "../engine/types";
import { fmtShort } from "./format";

export interface Frame {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type Domain = readonly [number, number];

const TICKS = 5;

export interface Scale {
  x: (v: number) => number;
  y: (v: number) => number;
}

export function makeScale(frame: Frame, xDomain: Domain, yDomain: Domain): Scale {
  const xSpan = xDomain[1] - xDomain[0] || 1;
  const ySpan = yDomain[1] - yDomain[0] || 1;
  return {
    x: v => frame.left + ((v - xDomain[0]) * frame.width) / xSpan,
    y: v => frame.top + frame.height - ((v - yDomain[0]) * frame.height) / ySpan
  };
}

export function pathData(points: readonly Point[], scale: Scale): string {
  return points
    .map((p, i) => `${i === 0 ? "M" : "L"} ${scale.x(p.x).toFixed(2)} ${scale.y(p.y).toFixed(2)}`)
    .join(" ");
}

/** Range covering the values and zero, padded by 5% on top. */
export function paddedDomain(values: readonly number[]): Domain {
  const lo = Math.min(0, ...values);
  const hi = Math.max(0, ...values);
  if (hi === lo) return [lo, lo + 1];
  return [lo, hi + (hi - lo) * 0.05];
}

export function ChartTitle({ x, y, text }: { x: number; y: number; text: string }) {
  return (
    <text x={x} y={y} textAnchor="middle" fontFamily={config.chart.font} fontSize={20} fontWeight="bold">
      {text}
    </text>
  );
}

export function Axes(props: {
  frame: Frame;
  scale: Scale;
  xDomain: Domain;
  yDomain: Domain;
  xLabel: string;
  yLabel: string;
}) {
  const { frame, scale, xDomain, yDomain, xLabel, yLabel } = props;
  const n = TICKS;
  const bottom = frame.top + frame.height;
  const right = frame.left + frame.width;
  const xTicks = linspace(xDomain[0], xDomain[1], n + 1);
  const yTicks = linspace(yDomain[0], yDomain[1], n + 1);
  const font = config.chart.font;

  return (
    <g>
      {xTicks.map(v => (
        <g key={`x${v}`}>
          <line x1={scale.x(v)} y1={frame.top} x2={scale.x(v)} y2={bottom} stroke={config.palette.grid} />
          <text x={scale.x(v)} y={bottom + 20} textAnchor="middle" fontFamily={font} fontSize={12}>
            {fmtShort(v)}
          </text>
        </g>
      ))}
      {yTicks.map(v => (
        <g key={`y${v}`}>
          <line x1={frame.left} y1={scale.y(v)} x2={right} y2={scale.y(v)} stroke={config.palette.grid} />
          <text x={frame.left - 8} y={scale.y(v) + 4} textAnchor="end" fontFamily={font} fontSize={12}>
            {fmtShort(v)}
          </text>
        </g>
      ))}
      <rect x={frame.left} y={frame.top} width={frame.width} height={frame.height} fill="none" stroke={config.palette.axis} />
      <text x={frame.left + frame.width / 2} y={bottom + 48} textAnchor="middle" fontFamily={font} fontSize={15}>
        {xLabel}
      </text>
      <text
        x={frame.left - 56}
        y={frame.top + frame.height / 2}
        textAnchor="middle"
        fontFamily={font}
        fontSize={15}
        transform={`rotate(-90 ${frame.left - 56} ${frame.top + frame.height / 2})`}
      >
        {yLabel}
      </text>
    </g>
  );
}

// Everything drawn inside the plot area is clipped to it.
export function PlotArea({ id, frame, children }: { id: string; frame: Frame; children: ReactNode }) {
  return (
    <g>
      <defs>
        <clipPath id={id}>
          <rect x={frame.left} y={frame.top} width={frame.width} height={frame.height} />
        </clipPath>
      </defs>
      <g clipPath={`url(#${id})`}>{children}</g>
    </g>
  );
}

export function Curve(props: { points: readonly Point[]; scale: Scale; color: string }) {
  return <path d={pathData(props.points, props.scale)} fill="none" stroke={props.color} strokeWidth={2.5} />;
}

export function Marker(props: {
  at: Point;
  scale: Scale;
  color: string;
  label: string;
  labelFill: string;
  dx: number;
  dy: number;
}) {
  const cx = props.scale.x(props.at.x);
  const cy = props.scale.y(props.at.y);
  const boxW = props.label.length * 7.5 + 12;

  return (
    <g>
      <circle cx={cx} cy={cy} r={7} fill={props.color} />
      <rect x={cx + props.dx} y={cy + props.dy - 15} width={boxW} height={21} rx={6} fill={props.labelFill} fillOpacity={0.5} />
      <text x={cx + props.dx + 6} y={cy + props.dy} fontFamily={config.chart.font} fontSize={13}>
        {props.label}
      </text>
    </g>
  );
}

export type LegendSymbol = "line" | "dash" | "marker" | "band";

export interface LegendEntry {
  label: string;
  color: string;
  symbol: LegendSymbol;
}

function LegendSwatch({ entry, x, y }: { entry: LegendEntry; x: number; y: number }) {
  switch (entry.symbol) {
    case "marker":
      return <circle cx={x + 14} cy={y} r={6} fill={entry.color} />;
    case "band":
      return <rect x={x} y={y - 6} width={28} height={12} fill={entry.color} />;
    default:
      return (
        <line
          x1={x}
          y1={y}
          x2={x + 28}
          y2={y}
          stroke={entry.color}
          strokeWidth={2.5}
          strokeDasharray={entry.symbol === "dash" ? "8 5" : undefined}
        />
      );
  }
}

export function Legend({ entries, x, y }: { entries: readonly LegendEntry[]; x: number; y: number }) {
  const rowH = 22;
  const width = Math.max(...entries.map(e => e.label.length)) * 7.2 + 56;

  return (
    <g>
      <rect x={x} y={y} width={width} height={entries.length * rowH + 12} rx={6} fill="#ffffff" fillOpacity={0.85} stroke={config.palette.grid} />
      {entries.map((e, i) => (
        <g key={e.label}>
          <LegendSwatch entry={e} x={x + 10} y={y + 17 + i * rowH} />
          <text x={x + 46} y={y + 21 + i * rowH} fontFamily={config.chart.font} fontSize={13}>
            {e.label}
          </text>
        </g>
      ))}
    </g>
  );
}
