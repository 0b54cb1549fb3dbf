/**
 * Parse human-readable sizes to bytes.
 *
 * Accepts raw bytes ("1024") or a number with a binary unit suffix:
 * B, K/KB/KiB, M/MB/MiB, G/GB/GiB, T/TB/TiB. Case-insensitive, spaces optional.
 *
 * @example
 *   parseSize("95MB")  // 99614720
 *   parseSize("1.5GB") // 1610612736
 *   parseSize("0")     // 0
 */

const UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  kb: 1024,
  kib: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  t: 1024 ** 4,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
};

export function parseSize(input: string | number): number {
  if (typeof input === "number") {
    if (!Number.isInteger(input) || input < 0) {
      throw new Error(`Invalid size: ${input}. Expected a non-negative whole number of bytes`);
    }
    return input;
  }

  const trimmed = input.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);

  const match = /^(\d+(?:\.\d+)?)\s*([a-z]+)$/.exec(trimmed);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid size format: "${input}". Use formats like: 95MB, 1GB, 512K`);
  }

  const multiplier = UNITS[match[2]];
  if (multiplier === undefined) {
    throw new Error(`Unknown size unit: "${match[2]}". Use: B, KB, MB, GB, TB`);
  }
  return Math.floor(parseFloat(match[1]) * multiplier);
}
