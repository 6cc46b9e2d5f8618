const pad2 = (n: number) => String(n).padStart(2, '0');

/** 1530 → "25:30:00". Hours are not wrapped at 24. */
export function formatHhmmss(minutes: number): string {
  const total = Math.max(0, Math.round(minutes * 60));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}`;
}

/** 270 → "04:30" */
export function formatHhmm(minutes: number): string {
  return formatHhmmss(minutes).slice(0, -3);
}
