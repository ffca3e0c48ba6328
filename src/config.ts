const trim = (s: string | undefined): string | undefined => (s && s.trim() ? s.trim() : undefined);

export interface ChartConfig {
  LIZARD_CHART_WIDTH: number;
  LIZARD_CHART_HEIGHT: number;
  LIZARD_CHART_OUT: string;
}

export const DEFAULT_CONFIG: ChartConfig = {
  LIZARD_CHART_WIDTH: 960,
  LIZARD_CHART_HEIGHT: 540,
  LIZARD_CHART_OUT: "payoff-chart.html",
};

const positiveInt = (
  source: NodeJS.ProcessEnv,
  name: "LIZARD_CHART_WIDTH" | "LIZARD_CHART_HEIGHT"
): number => {
  const raw = trim(source[name]);
  if (raw === undefined) return DEFAULT_CONFIG[name];
  const n = Number(raw);
  if (Number.isInteger(n) && n > 0) return n;
  console.warn(`Warning: ${name}="${raw}" is not a positive integer; using ${DEFAULT_CONFIG[name]}.`);
  return DEFAULT_CONFIG[name];
};

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): ChartConfig => ({
  LIZARD_CHART_WIDTH: positiveInt(source, "LIZARD_CHART_WIDTH"),
  LIZARD_CHART_HEIGHT: positiveInt(source, "LIZARD_CHART_HEIGHT"),
  LIZARD_CHART_OUT: trim(source.LIZARD_CHART_OUT) ?? DEFAULT_CONFIG.LIZARD_CHART_OUT,
});
