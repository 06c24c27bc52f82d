/**
 * Numeric and label formatting shared by the aggregator and report builder
 *
 * All calendar bucketing is done in UTC so output does not depend on the
 * host's time zone.
 */

/**
 * Round half away from zero to `decimals` places
 */
export function roundTo(value: number, decimals: number): number {
	if (!Number.isFinite(value)) return 0;
	const factor = 10 ** decimals;
	const scaled = Math.abs(value) * factor;
	// Nudge values like 1.005 that sit just under .5 in binary
	const rounded = Math.round(scaled + scaled * Number.EPSILON) / factor;
	return value < 0 ? -rounded : rounded;
}

/**
 * `part` as a percentage of `whole`; 0 when `whole` is 0
 */
export function percentage(part: number, whole: number, decimals = 1): number {
	if (whole <= 0) return 0;
	return roundTo((part / whole) * 100, decimals);
}

/**
 * 3725 → "1h 2m 5s"; 0 → "0 seconds"
 */
export function formatDuration(seconds: number): string {
	const total = Math.floor(seconds);
	if (!Number.isFinite(total) || total <= 0) return '0 seconds';

	const hours = Math.floor(total / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	const remaining = total % 60;

	const parts: string[] = [];
	if (hours > 0) parts.push(`${hours}h`);
	if (minutes > 0) parts.push(`${minutes}m`);
	if (remaining > 0) parts.push(`${remaining}s`);
	return parts.join(' ');
}

/**
 * "surface_scratch" / "surface-scratch" → "Surface Scratch"
 */
export function formatDefectLabel(label: string | null | undefined): string {
	const source = label && label.trim() !== '' ? label : 'unknown';
	return source
		.replace(/[_-]+/g, ' ')
		.trim()
		.split(/\s+/)
		.map((word) => word.charAt(0).toUpperCase() + word.slice(1))
		.join(' ');
}

function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

/** "YYYY-MM-DD" (UTC) */
export function utcDayKey(timestamp: number): string {
	return new Date(timestamp).toISOString().slice(0, 10);
}

/** "YYYY-MM-DD HH:00" (UTC) */
export function utcHourKey(timestamp: number): string {
	const date = new Date(timestamp);
	return `${utcDayKey(timestamp)} ${pad2(date.getUTCHours())}:00`;
}

/** "00".."23" (UTC hour of day) */
export function utcHourOfDay(timestamp: number): string {
	return pad2(new Date(timestamp).getUTCHours());
}

/**
 * Copy a count map into a frozen plain object with sorted keys
 *
 * Keys become own properties even when they shadow Object.prototype
 * (`__proto__`, `constructor`).
 */
export function sortedRecord(counts: ReadonlyMap<string, number>): Readonly<Record<string, number>> {
	const keys = [...counts.keys()].sort();
	return Object.freeze(Object.fromEntries(keys.map((key) => [key, counts.get(key) ?? 0])));
}
