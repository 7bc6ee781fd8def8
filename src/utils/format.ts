/**
 * Byte and duration formatting, plus parsing of engine-reported sizes
 */

const BINARY_UNITS = ["B", "KiB", "MiB", "GiB", "TiB"] as const;

export const MIB = 1024 * 1024;
export const GIB = 1024 * MIB;

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0 B";
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const digits = unit === 0 ? 0 : 2;
  return `${value.toFixed(digits)} ${BINARY_UNITS[unit]}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = Math.floor(ms / 1000);
  if (totalSeconds < 60) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}

// Container engines print sizes with decimal SI prefixes ("1.2GB", "512kB").
const SIZE_MULTIPLIERS: Record<string, number> = {
  b: 1,
  kb: 1e3,
  mb: 1e6,
  gb: 1e9,
  tb: 1e12,
  pb: 1e15,
  kib: 1024,
  mib: MIB,
  gib: GIB,
  tib: 1024 * GIB,
};

/**
 * Parse a human-readable size such as "1.2GB" or "512 kB" into bytes.
 * Returns null when the text is not a size.
 */
export function parseHumanSize(text: string): number | null {
  const match = text.trim().match(/^(\d+(?:\.\d+)?)\s*([a-zA-Z]*)$/);
  if (!match) {
    return null;
  }

  const amount = Number.parseFloat(match[1] ?? "");
  const unit = (match[2] || "b").toLowerCase();
  const multiplier = SIZE_MULTIPLIERS[unit];

  if (multiplier === undefined || Number.isNaN(amount)) {
    return null;
  }

  return Math.round(amount * multiplier);
}

export function mibToBytes(mib: number): number {
  return Math.round(mib * MIB);
}
