import type { SensorConfig } from "../lib/config";
import { dailySine, jitter, round2 } from "./daily-cycle";
import type { SensorModule } from "./types";

// Standard sea-level pressure, hPa
const BASE_HPA = 1013.25;

const RandomPressureSensor: SensorModule = {
	type: "random_pressure",

	defaults(config: SensorConfig): void {
		if (!config.unit) {
			config.unit = "hPa";
		}
	},

	validate(config: SensorConfig): void {
		if (config.metric !== "pressure") {
			throw new Error("random_pressure sensor must feed metric 'pressure'");
		}
		if (config.unit !== "hPa") {
			throw new Error("random_pressure sensor only reports hPa");
		}
	},

	async read(): Promise<number> {
		return round2(dailySine(Date.now(), BASE_HPA, 1.5) + jitter(0.05));
	}
};

export default RandomPressureSensor;
