import type { SensorConfig } from "../lib/config";
import { dailySine, jitter, round2 } from "./daily-cycle";
import type { SensorModule } from "./types";

const RandomTempSensor: SensorModule = {
	type: "random_temp",

	defaults(config: SensorConfig): void {
		if (!config.unit) {
			config.unit = "C";
		}
	},

	validate(config: SensorConfig): void {
		if (config.metric !== "temperature") {
			throw new Error("random_temp sensor must feed metric 'temperature'");
		}
	},

	async read(): Promise<number> {
		// base indoor temperature ~21C, daily swing ~3C
		const temp = dailySine(Date.now(), 21.0, 3.0) + jitter(0.1);
		return round2(temp);
	}
};

export default RandomTempSensor;
