const DAY_MS = 24 * 60 * 60 * 1000;

function dayPhase(now: number): number {
	return (now % DAY_MS) / DAY_MS; // 0..1
}

/**
 * Value following a daily sine wave; phase 0 = midnight UTC, peak at ~12:00.
 */
export function dailySine(now: number, base: number, amplitude: number): number {
	const phaseShift = -0.25;
	const phase = 2 * Math.PI * (dayPhase(now) + phaseShift);
	return base + amplitude * Math.sin(phase);
}

export function jitter(max: number, random: () => number = Math.random): number {
	return (random() * 2 - 1) * max;
}

export function round2(value: number): number {
	return Math.round(value * 100) / 100;
}
