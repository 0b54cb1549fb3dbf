export function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export function humanBytes(n: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let i = 0;
  let v = n;
  while (v >= 1024 && i < units.length - 1) {
    v /= 1024;
    i++;
  }
  return `${v.toFixed(i === 0 ? 0 : v < 10 ? 1 : 0)} ${units[i]}`;
}

const pad2 = (n: number) => String(n).padStart(2, "0");

/** Local-time stamp in the form YYYYMMDD_HHMMSS. */
export function timestamp(d: Date): string {
  const day = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `${day}_${time}`;
}

// Minimal ANSI escape stripper for width calculations
const ANSI_PATTERN = /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g;

export function stripAnsi(s: string): string {
  return s.replace(ANSI_PATTERN, "");
}

export function padPlain(s: string, w: number): string {
  const plain = stripAnsi(s);
  if (plain.length > w) return plain.slice(0, Math.max(1, w - 1)) + "…";
  return plain.padEnd(w);
}
