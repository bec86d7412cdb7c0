function pad2(n: number) { return n.toString().padStart(2, "0"); }
function pad3(n: number) { return n.toString().padStart(3, "0"); }

/** `MM:SS`, or `HH:MM:SS` once the offset reaches an hour. */
export function formatTimestamp(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return h > 0 ? `${pad2(h)}:${pad2(m)}:${pad2(s)}` : `${pad2(m)}:${pad2(s)}`;
}

export function fmtSrtTime(ms: number): string {
  return fmtClock(ms, ",");
}

export function fmtVttTime(ms: number): string {
  return fmtClock(ms, ".");
}

function fmtClock(ms: number, sep: string): string {
  const total = Math.max(0, Math.round(ms));
  const h = Math.floor(total / 3600000);
  const m = Math.floor((total % 3600000) / 60000);
  const s = Math.floor((total % 60000) / 1000);
  const msPart = total % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}${sep}${pad3(msPart)}`;
}

/** Local `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(date: Date): string {
  const d = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const t = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${d} ${t}`;
}

export function generateSafeFilename(title: string, videoId: string, extension: string): string {
  const safeTitle = title
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/[-\s]+/g, "_")
    .slice(0, 50);
  return `${safeTitle}_${videoId}.${extension}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
