import type { SensorConfig } from "../lib/config";

/**
 * A kind of sensor the station can poll, selected by `type` in the config file.
 *
 * Feeds call `defaults` and `validate` once before polling starts, then
 * `read` every `intervalMs`. A reading is a plain number in the unit of the
 * metric the sensor feeds (°C for temperature, hPa for pressure).
 */
export interface SensorModule {
	readonly type: string;

	// Fills in unit and module-specific settings the file left out
	defaults?(config: SensorConfig): void;

	// Throws when the sensor cannot feed the configured metric
	validate(config: SensorConfig): void;

	read(config: SensorConfig): Promise<number>;
}
