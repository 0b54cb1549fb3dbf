/**
 * Best-effort scrubbing of personal data for public builds.
 *
 * Rules are regular expressions over the raw text of well-known Kodi files
 * (add-on settings.xml, sources.xml). This is not a security boundary: values
 * stored under unexpected setting ids or in other files pass through
 * untouched.
 */
import fs from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { compileGlobs, type PathMatcher } from "./patterns.js";
import type { RedactionProfile, RedactionRule, RedactionTarget } from "../types.js";

export const DEFAULT_PROFILE_URL = new URL("../../presets/public.json", import.meta.url);

const RuleSchema = z.object({
  pattern: z.string().min(1),
  replacement: z.string(),
  flags: z.string().optional(),
});

export const RedactionProfileSchema = z.object({
  description: z.string().default(""),
  exclude: z.array(z.string()).default([]),
  targets: z
    .array(
      z.object({
        name: z.string().min(1),
        files: z.array(z.string()).min(1),
        rules: z.array(RuleSchema),
      })
    )
    .default([]),
});

export async function loadRedactionProfile(file?: string): Promise<RedactionProfile> {
  const where = file ?? DEFAULT_PROFILE_URL;
  const label = typeof where === "string" ? where : where.pathname;
  let raw: string;
  try {
    raw = await fs.readFile(where, "utf8");
  } catch (e) {
    throw new ConfigError(label, `cannot read redaction profile (${e instanceof Error ? e.message : String(e)})`);
  }
  return parseRedactionProfile(raw, label);
}

export function parseRedactionProfile(raw: string, label: string): RedactionProfile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(label, `not valid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  const parsed = RedactionProfileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(label, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  // reject bad expressions up front rather than halfway through an archive
  for (const target of parsed.data.targets) {
    for (const rule of target.rules) toRegExp(rule, label);
  }
  return parsed.data;
}

function toRegExp(rule: RedactionRule, label = "redaction rule"): RegExp {
  const flags = rule.flags ?? "g";
  try {
    return new RegExp(rule.pattern, flags.includes("g") ? flags : flags + "g");
  } catch (e) {
    throw new ConfigError(label, `bad pattern ${JSON.stringify(rule.pattern)} (${e instanceof Error ? e.message : String(e)})`);
  }
}

export function redactText(text: string, rules: readonly RedactionRule[]): { text: string; replacements: number } {
  let out = text;
  let replacements = 0;
  for (const rule of rules) {
    const re = toRegExp(rule);
    const hits = out.match(re)?.length ?? 0;
    if (hits === 0) continue;
    out = out.replace(re, rule.replacement);
    replacements += hits;
  }
  return { text: out, replacements };
}

export interface CompiledProfile {
  profile: RedactionProfile;
  targetFor(relPath: string): RedactionTarget | undefined;
}

export function compileProfile(profile: RedactionProfile): CompiledProfile {
  const matchers: { target: RedactionTarget; match: PathMatcher }[] = profile.targets.map((target) => ({
    target,
    match: compileGlobs(target.files),
  }));
  return {
    profile,
    targetFor(relPath) {
      return matchers.find((m) => m.match(relPath))?.target;
    },
  };
}
