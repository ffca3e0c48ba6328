#!/usr/bin/env node

/**
 * index.ts: Jade Lizard / Reverse Jade Lizard CLI entry point.
 *
 * Usage examples:
 *   lizard-payoff jade --spot 10 --xhu 17 --xhl 12 --xm 15 --lcp 1 --scp 2 --spp 5
 *   lizard-payoff reverse --spot 15 --xll 11 --xlu 14 --xh 17 --lpp 3 --spp 8 --scp 1 --out chart.html
 */

import "dotenv/config";
import { runCli } from "./src/cli/main";

const main = async (): Promise<void> => {
  process.exitCode = await runCli(process.argv.slice(2));
};

if (require.main === module) void main();
