export const config = {
  // Example market: w* = 10, so a floor of 12 binds
  exampleParams: {
    aS: 5,
    bS: 0.5,
    aD0: 20,
    bD: 1,
    k: 3,
    wBar: 12,
    t: 0
  },

  // Example run
  comparativeStaticsTimes: [0, 0.25, 0.5, 0.75, 1] as const,
  exampleMarketCharts: [
    { t: 0, label: "t=0 (short run)", file: "labor_market_t0.png" },
    { t: 0.5, label: "t=0.5 (intermediate)", file: "labor_market_t05.png" },
    { t: 1, label: "t=1.0 (long run)", file: "labor_market_t1.png" }
  ],
  exampleDynamicsChart: { numPoints: 100, file: "labor_market_dynamics.png" },
  outDirEnv: "LABOR_MARKET_OUT_DIR",

  // Charts
  chart: {
    marketSamples: 1000,
    dynamicsPoints: 50,
    market: { width: 1000, height: 800 },
    dynamics: { width: 1400, height: 600 },
    // SVG user units are read at 72 dpi; 216 gives a 3x raster
    rasterDensity: 216,
    font: "DejaVu Sans, Helvetica, Arial, sans-serif"
  },

  palette: {
    supply: "#1f5fbf",
    demand: "#d62728",
    floor: "#2ca02c",
    equilibrium: "#111111",
    employment: "#d62728",
    laborSupplied: "#1f5fbf",
    unemployment: "rgba(214,39,40,.3)",
    grid: "rgba(0,0,0,.12)",
    axis: "#333333",
    zero: "rgba(0,0,0,.5)"
  }
};
