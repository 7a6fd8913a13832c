import ejs from "ejs";
import fs from "fs";
import path from "path";
import { config } from "../config.js";
import type { ObservationLogRow } from "../types.js";

const WIDTH = 960;
const PLOT_LEFT = 140;
const PLOT_RIGHT = 90; // room for the value label after the longest bar
const PLOT_TOP = 50;
const PLOT_BOTTOM = 50;
const BAR_HEIGHT = 24;
const BAR_GAP = 10;
const TICK_COUNT = 4;

export interface ChartBar {
  label: string;
  y: number;
  width: number;
  valueLabel: string;
}

export interface ChartTick {
  x: number;
  label: string;
}

export interface ChartLayout {
  title: string;
  width: number;
  height: number;
  plotLeft: number;
  plotTop: number;
  plotWidth: number;
  plotHeight: number;
  barHeight: number;
  bars: ChartBar[];
  ticks: ChartTick[];
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

/**
 * Geometry for a horizontal bar chart of ground times. `rows` come in
 * ascending order; the first row sits at the bottom.
 */
export function layoutChart(rows: readonly ObservationLogRow[], airportName: string): ChartLayout {
  const slots = Math.max(rows.length, 1);
  const plotWidth = WIDTH - PLOT_LEFT - PLOT_RIGHT;
  const plotHeight = slots * (BAR_HEIGHT + BAR_GAP);
  const maxMinutes = Math.max(1, ...rows.map((r) => r.minutes_on_ground));

  const bars = rows.map((row, i) => ({
    label: row.callsign,
    y: PLOT_TOP + (rows.length - 1 - i) * (BAR_HEIGHT + BAR_GAP),
    width: round2((Math.max(0, row.minutes_on_ground) / maxMinutes) * plotWidth),
    valueLabel: ` ${row.minutes_on_ground.toFixed(1)} min`,
  }));

  const ticks: ChartTick[] = [];
  for (let k = 0; k <= TICK_COUNT; k++) {
    ticks.push({
      x: round2(PLOT_LEFT + (plotWidth * k) / TICK_COUNT),
      label: String(Math.round((maxMinutes * k) / TICK_COUNT)),
    });
  }

  return {
    title: `Top ${rows.length} Longest Ground Times at ${airportName}`,
    width: WIDTH,
    height: PLOT_TOP + plotHeight + PLOT_BOTTOM,
    plotLeft: PLOT_LEFT,
    plotTop: PLOT_TOP,
    plotWidth,
    plotHeight,
    barHeight: BAR_HEIGHT,
    bars,
    ticks,
  };
}

/** Render the ranked chart as a standalone SVG document. */
export function renderChart(
  rows: readonly ObservationLogRow[],
  airportName: string,
  viewsDir: string = config.viewsDir
): string {
  const filename = path.join(viewsDir, "chart.ejs");
  const template = fs.readFileSync(filename, "utf-8");
  return ejs.render(template, { chart: layoutChart(rows, airportName) }, { filename, async: false });
}
