import type { PayoffTable } from "../core/payoff/table";

export interface ChartLabels {
  title: string;
  subtitle: string;
  axisLabels: { x: string; y: string };
  caption: string;
}

export interface ChartBar {
  spot: number;
  pnl: number;
  profitable: boolean;
  label: string;
  fill: string;
  stroke: string;
}

export interface PayoffChart extends ChartLabels {
  bars: ChartBar[];
}

export const PROFIT_COLORS = { fill: "#B0E0E6", stroke: "#483D8B" } as const;
export const LOSS_COLORS = { fill: "#FFCCCC", stroke: "#CD1076" } as const;

export const DEFAULT_AXIS_LABELS = {
  x: "Spot Price($) at Expiration",
  y: "PnL($) at Expiration",
} as const;

export const DEFAULT_CAPTION = "Per-unit PnL at expiration";

export const buildPayoffChart = (table: PayoffTable, labels: ChartLabels): PayoffChart => ({
  ...labels,
  axisLabels: { ...labels.axisLabels },
  bars: table.map((point) => {
    const colors = point.profitable ? PROFIT_COLORS : LOSS_COLORS;
    return {
      spot: point.spot,
      pnl: point.pnl,
      profitable: point.profitable,
      label: String(point.pnl),
      fill: colors.fill,
      stroke: colors.stroke,
    };
  }),
});
