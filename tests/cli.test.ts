import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { parseArgs } from "../src/cli/args";
import { runCli } from "../src/cli/main";
import { buildPayoffTable } from "../src/cli/render/table";
import { formatBound, formatUSD } from "../src/cli/render/format";
import { DEFAULT_CONFIG } from "../src/config";

const jadeArgs = ["jade", "--spot", "10", "--xhu", "17", "--xhl", "12", "--xm", "15", "--lcp", "1", "--scp", "2", "--spp", "5"];
const reverseArgs = ["reverse", "--spot", "15", "--xll", "11", "--xlu", "14", "--xh", "17", "--lpp", "3", "--spp", "8", "--scp", "1"];

describe("parseArgs", () => {
  it("splits positionals from flags", () => {
    expect(parseArgs(["jade", "--spot", "10", "--lcp", "-1", "--help"])).toEqual({
      positionals: ["jade"],
      flags: { spot: "10", lcp: "-1", help: true },
    });
  });
});

describe("formatting", () => {
  it("formats dollars and unbounded values", () => {
    expect(formatUSD(-9)).toBe("-$9");
    expect(formatUSD(1234.567)).toBe("$1,234.57");
    expect(formatBound(null)).toBe("unbounded");
    expect(formatBound(3)).toBe("$3");
  });

  it("builds tab-ready table rows", () => {
    expect(
      buildPayoffTable([
        { spot: 8, pnl: -1, profitable: false },
        { spot: 9, pnl: 0, profitable: true },
      ])
    ).toEqual({
      headers: ["Spot", "PnL", "Outcome"],
      rows: [
        ["8", "-$1", "loss"],
        ["9", "$0", "profit"],
      ],
    });
  });
});

describe("runCli", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the jade lizard table and summary", async () => {
    expect(await runCli(jadeArgs, DEFAULT_CONFIG)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("Spot\tPnL\tOutcome");
    expect(console.log).toHaveBeenCalledWith("0\t-$9\tloss");
    expect(console.log).toHaveBeenCalledWith("15\t$3\tprofit");
    expect(console.log).toHaveBeenCalledWith("\nNet credit: $6");
    expect(console.log).toHaveBeenCalledWith("Max profit: $3");
    expect(console.log).toHaveBeenCalledWith("Max loss: -$9");
    expect(console.log).toHaveBeenCalledWith("Breakeven prices: $9");
    expect(console.log).toHaveBeenCalledWith("Upside risk: none");
    expect(console.error).not.toHaveBeenCalled();
  });

  it("prints the reverse jade lizard summary", async () => {
    expect(await runCli(reverseArgs, DEFAULT_CONFIG)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("6\t$3\tprofit");
    expect(console.log).toHaveBeenCalledWith("37\t-$14\tloss");
    expect(console.log).toHaveBeenCalledWith("Max loss: unbounded");
    expect(console.log).toHaveBeenCalledWith("Breakeven prices: $23");
    expect(console.log).toHaveBeenCalledWith("Downside risk: none");
  });

  it("prints usage and an example without arguments", async () => {
    expect(await runCli([], DEFAULT_CONFIG)).toBe(0);
    expect(console.log).toHaveBeenCalledWith("  12/17 call spread + 15 put, credit $6 @ $15 -> $3 per unit");
  });

  it("reports every missing flag", async () => {
    expect(await runCli(["jade", "--spot", "10"], DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "Error:",
      "--xhu is required; --xhl is required; --xm is required; --lcp is required; --scp is required; --spp is required"
    );
  });

  it("rejects malformed and negative numbers", async () => {
    const badSpot = [...jadeArgs];
    badSpot[2] = "abc";
    expect(await runCli(badSpot, DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith("Error:", "--spot must be a number");

    const negativePremium = [...jadeArgs];
    negativePremium[10] = "-1";
    expect(await runCli(negativePremium, DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith("Error:", "--lcp cannot be negative");
  });

  it("surfaces range and strike ordering errors", async () => {
    expect(await runCli([...jadeArgs, "--hl", "1", "--hu", "1"], DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith("Error:", "hu (1) must be greater than hl (1).");

    const swapped = [...jadeArgs];
    swapped[6] = "18";
    expect(await runCli(swapped, DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith(
      "Error:",
      "For a jade lizard, the short call strike (18) must be LESS than the long call strike (17)."
    );
  });

  it("rejects unknown strategies", async () => {
    expect(await runCli(["iron", "--spot", "10"], DEFAULT_CONFIG)).toBe(1);
    expect(console.error).toHaveBeenLastCalledWith("Error:", 'Unknown strategy "iron". Use "jade" or "reverse".');
  });

  describe("--out", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "lizard-payoff-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the chart to the given file", async () => {
      const target = join(dir, "jade.html");
      expect(await runCli([...jadeArgs, "--out", target], DEFAULT_CONFIG)).toBe(0);
      const html = await readFile(target, "utf8");
      expect(html).toContain("<h1>Jade Lizard Option Strategy</h1>");
      expect(console.log).toHaveBeenCalledWith(`\nChart written to ${target}`);
    });

    it("falls back to the configured file name", async () => {
      const target = join(dir, "default.html");
      const config = { ...DEFAULT_CONFIG, LIZARD_CHART_OUT: target };
      expect(await runCli([...reverseArgs, "--out"], config)).toBe(0);
      const html = await readFile(target, "utf8");
      expect(html).toContain("<h1>Reverse Jade Lizard Option Strategy</h1>");
    });
  });
});
