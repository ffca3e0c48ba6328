import type { ReactElement, SVGProps } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import {
  Bar,
  CartesianGrid,
  Cell,
  ComposedChart,
  LabelList,
  Line,
  ReferenceLine,
  XAxis,
  YAxis,
} from "recharts";
import type { PayoffChart } from "./model";

export interface RenderChartOptions {
  width: number;
  height: number;
}

interface PayoffChartViewProps extends RenderChartOptions {
  chart: PayoffChart;
}

interface MarkerProps {
  cx?: number;
  cy?: number;
  index?: number;
}

interface BarLabelProps {
  x?: number | string;
  y?: number | string;
  width?: number | string;
  height?: number | string;
  index?: number;
}

const toPx = (value: number | string | undefined): number => Number(value ?? 0);

/** PnL label above a profit bar or below a loss bar, in the bar's stroke color. */
export const barLabelRenderer =
  (chart: PayoffChart) =>
  ({ x, y, width, height, index }: BarLabelProps): ReactElement<SVGProps<SVGTextElement>> | null => {
    const bar = index === undefined ? undefined : chart.bars[index];
    if (bar === undefined) return null;
    const top = Math.min(toPx(y), toPx(y) + toPx(height));
    const bottom = Math.max(toPx(y), toPx(y) + toPx(height));
    return (
      <text
        x={toPx(x) + toPx(width) / 2}
        y={bar.profitable ? top - 4 : bottom + 10}
        fill={bar.stroke}
        fontSize={9}
        textAnchor="middle"
      >
        {bar.label}
      </text>
    );
  };

const PAGE_CSS = `
body { font-family: sans-serif; background: #E8F4FF; margin: 24px; }
figure { background: #F4F9FF; border: 1px dashed #458B74; padding: 16px; margin: 0; display: inline-block; }
h1 { color: #CD3333; font-size: 20px; margin: 0; }
h2 { color: #191970; font-size: 14px; font-weight: normal; margin: 4px 0 12px; }
figcaption { color: #C4C4C4; font-size: 11px; text-align: right; }
`;

export const PayoffChartView = ({ chart, width, height }: PayoffChartViewProps) => {
  // Marker color follows the bar's stroke.
  const renderMarker = ({ cx, cy, index }: MarkerProps) => {
    const bar = index === undefined ? undefined : chart.bars[index];
    return <circle key={`marker-${index ?? 0}`} cx={cx} cy={cy} r={3} fill={bar?.stroke ?? "none"} stroke="none" />;
  };

  return (
    <ComposedChart width={width} height={height} data={chart.bars} margin={{ top: 16, right: 24, bottom: 32, left: 16 }}>
      <CartesianGrid strokeDasharray="3 3" stroke="#E6E6FA" />
      <XAxis
        dataKey="spot"
        fontSize={11}
        stroke="#191970"
        label={{ value: chart.axisLabels.x, position: "insideBottom", offset: -16, fill: "#191970" }}
      />
      <YAxis
        fontSize={11}
        stroke="#191970"
        label={{ value: chart.axisLabels.y, angle: -90, position: "insideLeft", fill: "#191970" }}
      />
      <ReferenceLine y={0} stroke="#999999" />
      <Bar dataKey="pnl" isAnimationActive={false}>
        {chart.bars.map((bar) => (
          <Cell key={`bar-${bar.spot}`} fill={bar.fill} stroke={bar.stroke} />
        ))}
        <LabelList dataKey="label" content={barLabelRenderer(chart)} />
      </Bar>
      <Line
        dataKey="pnl"
        stroke="none"
        isAnimationActive={false}
        dot={renderMarker}
        activeDot={false}
        legendType="none"
      />
    </ComposedChart>
  );
};

/** Standalone HTML page: title, subtitle, the SVG chart and its caption. */
export const renderPayoffChartHtml = (chart: PayoffChart, options: RenderChartOptions): string => {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{chart.title}</title>
        <style dangerouslySetInnerHTML={{ __html: PAGE_CSS }} />
      </head>
      <body>
        <figure>
          <h1>{chart.title}</h1>
          <h2>{chart.subtitle}</h2>
          <PayoffChartView chart={chart} width={options.width} height={options.height} />
          <figcaption>{chart.caption}</figcaption>
        </figure>
      </body>
    </html>
  );
  return `<!DOCTYPE html>${markup}`;
};
