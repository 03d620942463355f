/**
 * Metric value coercion. Export tools write numbers as "1,234", "4.5%" or blank;
 * anything that is not a number afterwards is left out rather than zeroed.
 */

export function parseMetricValue(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;

  let text = value.trim().replace(/,/g, '').replace(/\s+/g, '');
  if (text === '') return undefined;

  const percent = text.endsWith('%');
  if (percent) text = text.slice(0, -1);
  if (text === '') return undefined;

  const parsed = Number(text);
  if (!Number.isFinite(parsed)) return undefined;
  return percent ? parsed / 100 : parsed;
}
