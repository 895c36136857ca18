import type { MetricName } from "@weather-station/common";

/**
 * Latest reading per metric; NaN means nothing recorded yet.
 */
export type MetricSnapshot = Readonly<Record<MetricName, number>>;

export const ABSENT = Number.NaN;

export function emptySnapshot(): MetricSnapshot {
	return {
		temperature: ABSENT,
		pressure: ABSENT
	};
}

/**
 * Holds the most recent value of each metric. Writers overwrite one slot,
 * the publish cycle copies all slots; nothing is ever cleared.
 */
export class LatestValueCache {
	private readonly values: Record<MetricName, number> = { ...emptySnapshot() };

	set(metric: MetricName, value: number): void {
		this.values[metric] = value;
	}

	get(metric: MetricName): number {
		return this.values[metric];
	}

	has(metric: MetricName): boolean {
		return !Number.isNaN(this.values[metric]);
	}

	snapshot(): MetricSnapshot {
		return { ...this.values };
	}
}
