import {
  JADE_LIZARD_DEFAULT_HL,
  JADE_LIZARD_DEFAULT_HU,
  REVERSE_JADE_LIZARD_DEFAULT_HL,
  REVERSE_JADE_LIZARD_DEFAULT_HU,
  jadeLizardTable,
  reverseJadeLizardTable,
} from "./core";
import { DEFAULT_AXIS_LABELS, DEFAULT_CAPTION, buildPayoffChart, type ChartLabels, type PayoffChart } from "./chart/model";

export const JADE_LIZARD_LABELS: ChartLabels = {
  title: "Jade Lizard Option Strategy",
  subtitle: "Bullish to Neutral Outlook",
  axisLabels: DEFAULT_AXIS_LABELS,
  caption: DEFAULT_CAPTION,
};

export const REVERSE_JADE_LIZARD_LABELS: ChartLabels = {
  title: "Reverse Jade Lizard Option Strategy",
  subtitle: "Bearish to Neutral Outlook",
  axisLabels: DEFAULT_AXIS_LABELS,
  caption: DEFAULT_CAPTION,
};

/**
 * Jade Lizard: short OTM put plus an OTM bear call spread. Charts per-unit PnL at
 * expiration for spot prices from floor(ST * hl) to floor(ST * hu).
 *
 * @example jadeLizardPnL(40, 45, 34, 40, 2, 6, 11, 0.25, 1.25)
 */
export const jadeLizardPnL = (
  ST: number,
  XHU: number,
  XHL: number,
  XM: number,
  lcp: number,
  scp: number,
  spp: number,
  hl = JADE_LIZARD_DEFAULT_HL,
  hu = JADE_LIZARD_DEFAULT_HU
): PayoffChart =>
  buildPayoffChart(
    jadeLizardTable({
      spot: ST,
      longCallStrike: XHU,
      shortCallStrike: XHL,
      shortPutStrike: XM,
      longCallPremium: lcp,
      shortCallPremium: scp,
      shortPutPremium: spp,
      hl,
      hu,
    }),
    JADE_LIZARD_LABELS
  );

/**
 * Reverse Jade Lizard: OTM bull put spread plus a short OTM call.
 *
 * @example reverseJadeLizardPnL(46, 42, 47, 50, 5, 9, 3, 0.8, 1.65)
 */
export const reverseJadeLizardPnL = (
  ST: number,
  XLL: number,
  XLU: number,
  XH: number,
  lpp: number,
  spp: number,
  scp: number,
  hl = REVERSE_JADE_LIZARD_DEFAULT_HL,
  hu = REVERSE_JADE_LIZARD_DEFAULT_HU
): PayoffChart =>
  buildPayoffChart(
    reverseJadeLizardTable({
      spot: ST,
      longPutStrike: XLL,
      shortPutStrike: XLU,
      shortCallStrike: XH,
      longPutPremium: lpp,
      shortPutPremium: spp,
      shortCallPremium: scp,
      hl,
      hu,
    }),
    REVERSE_JADE_LIZARD_LABELS
  );

export * from "./core";
export * from "./errors";
export * from "./chart/model";
export { barLabelRenderer, renderPayoffChartHtml, type RenderChartOptions } from "./chart/html";
