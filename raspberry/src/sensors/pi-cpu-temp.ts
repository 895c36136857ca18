import fs from "node:fs/promises";

import type { SensorConfig } from "../lib/config";
import { round2 } from "./daily-cycle";
import type { SensorModule } from "./types";

// Raspberry Pi SoC thermal zone; holds millidegrees Celsius, e.g. "45321\n"
export const DEFAULT_SYSFS_TEMP_PATH = "/sys/class/thermal/thermal_zone0/temp";

async function readMillidegrees(file: string): Promise<number> {
	const content = (await fs.readFile(file, "utf8")).trim();
	const value = Number(content);
	if (content === "" || !Number.isFinite(value)) {
		throw new Error(`Invalid CPU temperature value '${content}' from ${file}`);
	}
	return value;
}

const PiCpuTempSensor: SensorModule = {
	type: "pi_cpu_temp",

	defaults(config: SensorConfig): void {
		if (!config.unit) config.unit = "C";
		if (!config.sysfsPath) config.sysfsPath = DEFAULT_SYSFS_TEMP_PATH;
	},

	validate(config: SensorConfig): void {
		if (config.metric !== "temperature") {
			throw new Error("pi_cpu_temp sensor must feed metric 'temperature'");
		}
	},

	async read(config: SensorConfig): Promise<number> {
		const milli = await readMillidegrees(config.sysfsPath ?? DEFAULT_SYSFS_TEMP_PATH);
		return round2(milli / 1000);
	}
};

export default PiCpuTempSensor;
