import type { SensorModule } from "./types";
import RandomTempSensor from "./random-temp";
import RandomPressureSensor from "./random-pressure";
import PiCpuTempSensor from "./pi-cpu-temp";

const MODULES: readonly SensorModule[] = [RandomTempSensor, RandomPressureSensor, PiCpuTempSensor];

const registry = new Map(MODULES.map(m => [m.type, m] as const));

/**
 * Module for a configured sensor type; throws for types the station does not know.
 */
export function getSensorModule(type: string): SensorModule {
	const found = registry.get(type);
	if (!found) {
		throw new Error(`Unsupported sensor type '${type}'`);
	}
	return found;
}

export function sensorTypes(): string[] {
	return MODULES.map(m => m.type);
}
