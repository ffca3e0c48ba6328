import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { loadConfig, type ChartConfig } from "../config";
import {
  jadeLizardProfit,
  jadeLizardSummary,
  jadeLizardTable,
  reverseJadeLizardSummary,
  reverseJadeLizardTable,
  type PayoffTable,
  type StrategySummary,
} from "../core";
import { buildPayoffChart, type ChartLabels } from "../chart/model";
import { renderPayoffChartHtml } from "../chart/html";
import { JADE_LIZARD_LABELS, REVERSE_JADE_LIZARD_LABELS } from "../index";
import { formatZodError, jadeLizardFlagsSchema, parseArgs, reverseJadeLizardFlagsSchema, type ArgMap } from "./args";
import { formatBound, formatUSD } from "./render/format";
import { buildPayoffTable } from "./render/table";

interface StrategyReport {
  heading: string;
  table: PayoffTable;
  labels: ChartLabels;
  summary: StrategySummary;
  riskLine: string;
}

const printUsage = (): void => {
  console.log(`
Jade Lizard / Reverse Jade Lizard payoff calculator

Usage:
  lizard-payoff jade --spot <num> --xhu <num> --xhl <num> --xm <num> --lcp <num> --scp <num> --spp <num>
  lizard-payoff reverse --spot <num> --xll <num> --xlu <num> --xh <num> --lpp <num> --spp <num> --scp <num>

Jade lizard (short put + bear call spread):
  --xhu <num>   Strike of the call you buy
  --xhl <num>   Strike of the call you sell (below --xhu)
  --xm <num>    Strike of the put you sell
  --lcp/--scp/--spp <num>   Long call, short call, short put premiums

Reverse jade lizard (bull put spread + short call):
  --xll <num>   Strike of the put you buy
  --xlu <num>   Strike of the put you sell (above --xll)
  --xh <num>    Strike of the call you sell
  --lpp/--spp/--scp <num>   Long put, short put, short call premiums

Optional:
  --hl <num>    Lower range multiplier of --spot (jade 0, reverse 0.4)
  --hu <num>    Upper range multiplier of --spot (jade 1.9, reverse 2.5)
  --out [file]  Write the bar chart as an HTML page (default from LIZARD_CHART_OUT)

Examples:
  lizard-payoff jade --spot 10 --xhu 17 --xhl 12 --xm 15 --lcp 1 --scp 2 --spp 5
  lizard-payoff reverse --spot 15 --xll 11 --xlu 14 --xh 17 --lpp 3 --spp 8 --scp 1 --out chart.html
`);
};

const jadeReport = (flags: ArgMap): StrategyReport => {
  const args = jadeLizardFlagsSchema.parse(flags);
  const summary = jadeLizardSummary(args);
  return {
    heading: `Jade Lizard: short put ${args.shortPutStrike}, call spread ${args.shortCallStrike}/${args.longCallStrike}`,
    table: jadeLizardTable(args),
    labels: JADE_LIZARD_LABELS,
    summary,
    riskLine: `Upside risk: ${summary.upsideRisk ? "yes (credit is below the call spread width)" : "none"}`,
  };
};

const reverseReport = (flags: ArgMap): StrategyReport => {
  const args = reverseJadeLizardFlagsSchema.parse(flags);
  const summary = reverseJadeLizardSummary(args);
  return {
    heading: `Reverse Jade Lizard: put spread ${args.longPutStrike}/${args.shortPutStrike}, short call ${args.shortCallStrike}`,
    table: reverseJadeLizardTable(args),
    labels: REVERSE_JADE_LIZARD_LABELS,
    summary,
    riskLine: `Downside risk: ${summary.downsideRisk ? "yes (credit is below the put spread width)" : "none"}`,
  };
};

const buildReport = (strategy: string, flags: ArgMap): StrategyReport => {
  if (strategy === "jade") return jadeReport(flags);
  if (strategy === "reverse") return reverseReport(flags);
  throw new Error(`Unknown strategy "${strategy}". Use "jade" or "reverse".`);
};

export const runCli = async (argv: string[], config: ChartConfig = loadConfig()): Promise<number> => {
  const { positionals, flags } = parseArgs(argv);
  const strategy = positionals[0];

  if (strategy === undefined || flags["help"]) {
    printUsage();
    console.log("Example:");
    const demo = jadeLizardProfit({
      longCallStrike: 17,
      shortCallStrike: 12,
      shortPutStrike: 15,
      longCallPremium: 1,
      shortCallPremium: 2,
      shortPutPremium: 5,
      priceAtExpiry: 15,
    });
    console.log(`  12/17 call spread + 15 put, credit $6 @ $15 -> ${formatUSD(demo)} per unit`);
    return 0;
  }

  try {
    const report = buildReport(strategy, flags);
    const { summary } = report;

    console.log(`\nPayoff table (per unit at expiration): ${report.heading}\n`);
    const built = buildPayoffTable(report.table);
    console.log(built.headers.join("\t"));
    for (const row of built.rows) console.log(row.join("\t"));

    console.log(`\nNet credit: ${formatUSD(summary.netCredit)}`);
    console.log(`Max profit: ${formatBound(summary.maxProfit)}`);
    console.log(`Max loss: ${formatBound(summary.maxLoss)}`);
    console.log(
      `Breakeven prices: ${summary.breakevens.length > 0 ? summary.breakevens.map(formatUSD).join(", ") : "none"}`
    );
    console.log(report.riskLine);

    const out = flags["out"];
    if (out !== undefined) {
      const target = resolve(typeof out === "string" ? out : config.LIZARD_CHART_OUT);
      const chart = buildPayoffChart(report.table, report.labels);
      const html = renderPayoffChartHtml(chart, {
        width: config.LIZARD_CHART_WIDTH,
        height: config.LIZARD_CHART_HEIGHT,
      });
      await writeFile(target, html, "utf8");
      console.log(`\nChart written to ${target}`);
    }
    return 0;
  } catch (err) {
    const msg = err instanceof ZodError ? formatZodError(err) : err instanceof Error ? err.message : String(err);
    console.error("Error:", msg);
    return 1;
  }
};
