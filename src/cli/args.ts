import { z } from "zod";
import type { JadeLizardTableArgs, ReverseJadeLizardTableArgs } from "../core";

export type ArgMap = Record<string, string | boolean>;

export interface ParsedArgs {
  positionals: string[];
  flags: ArgMap;
}

export const parseArgs = (argv: string[]): ParsedArgs => {
  const positionals: string[] = [];
  const flags: ArgMap = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (a.startsWith("--")) {
      const key = a.slice(2);
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        flags[key] = true; // boolean flag
      } else {
        flags[key] = next;
        i++;
      }
    } else {
      positionals.push(a);
    }
  }
  return { positionals, flags };
};

const numberFlag = (flag: string, refine: (n: z.ZodNumber) => z.ZodNumber = (n) => n) =>
  z
    .string({ required_error: `--${flag} is required`, invalid_type_error: `--${flag} needs a value` })
    .trim()
    .min(1, `--${flag} needs a value`)
    .pipe(
      refine(
        z.coerce
          .number({ invalid_type_error: `--${flag} must be a number` })
          .finite(`--${flag} must be a finite number`)
      )
    );

const spotFlag = numberFlag("spot", (n) => n.positive("--spot must be positive"));
const premiumFlag = (flag: string) => numberFlag(flag, (n) => n.nonnegative(`--${flag} cannot be negative`));
const multiplierFlag = (flag: string) =>
  numberFlag(flag, (n) => n.nonnegative(`--${flag} cannot be negative`)).optional();

export const jadeLizardFlagsSchema = z
  .object({
    spot: spotFlag,
    xhu: numberFlag("xhu"),
    xhl: numberFlag("xhl"),
    xm: numberFlag("xm"),
    lcp: premiumFlag("lcp"),
    scp: premiumFlag("scp"),
    spp: premiumFlag("spp"),
    hl: multiplierFlag("hl"),
    hu: multiplierFlag("hu"),
  })
  .transform(
    (f): JadeLizardTableArgs => ({
      spot: f.spot,
      longCallStrike: f.xhu,
      shortCallStrike: f.xhl,
      shortPutStrike: f.xm,
      longCallPremium: f.lcp,
      shortCallPremium: f.scp,
      shortPutPremium: f.spp,
      hl: f.hl,
      hu: f.hu,
    })
  );

export const reverseJadeLizardFlagsSchema = z
  .object({
    spot: spotFlag,
    xll: numberFlag("xll"),
    xlu: numberFlag("xlu"),
    xh: numberFlag("xh"),
    lpp: premiumFlag("lpp"),
    spp: premiumFlag("spp"),
    scp: premiumFlag("scp"),
    hl: multiplierFlag("hl"),
    hu: multiplierFlag("hu"),
  })
  .transform(
    (f): ReverseJadeLizardTableArgs => ({
      spot: f.spot,
      longPutStrike: f.xll,
      shortPutStrike: f.xlu,
      shortCallStrike: f.xh,
      longPutPremium: f.lpp,
      shortPutPremium: f.spp,
      shortCallPremium: f.scp,
      hl: f.hl,
      hu: f.hu,
    })
  );

export const formatZodError = (error: z.ZodError): string => error.issues.map((issue) => issue.message).join("; ");
