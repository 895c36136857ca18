import "dotenv/config";
import fs from "node:fs";
import os from "node:os";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { METRIC_NAMES, formatIssues } from "@weather-station/common";
import type { MetricName } from "@weather-station/common";

import { DEFAULT_BROKER_URL, DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_RECONNECT_PERIOD_MS } from "../publisher/publisher";
import { DEFAULT_PUBLISH_INTERVAL_MS } from "../publisher/scheduler";
import { getSensorModule, sensorTypes } from "../sensors/index";
import { configError, errorMessage } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export interface SensorConfig {
	sensorId: string;
	type: string;
	metric: MetricName;
	unit?: string;
	location?: string;

	intervalMs: number;

	// Sensor settings
	sysfsPath?: string;
}

export interface AppConfig {
	device: {
		deviceId: string; // DEVICE_ID, config file, or host name
		location?: string;
	};

	broker: {
		url: string;
		topic: string;
		appName: string;
		username?: string; // MQTT_USERNAME
		password?: string; // MQTT_PASSWORD
		reconnectPeriodMs: number;
		connectTimeoutMs: number;
	};

	publish: {
		intervalMs: number;
	};

	connectivity: {
		// Interfaces that count as "online"; empty = any non-loopback interface
		interfaces: string[];
	};

	paths: {
		logDir: string;
	};

	logLevel: LogLevel;

	sensors: SensorConfig[];
}

/* ---------- defaults ---------- */

const DEFAULT_APP_NAME = "weather-station";
const DEFAULT_LOG_DIR = "/var/log/weather-station";
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const BROKER_PROTOCOLS: ReadonlySet<string> = new Set(["mqtt:", "mqtts:", "tcp:", "tls:", "ws:", "wss:"]);

/* ---------- file shape ---------- */

const SensorFileSchema = z.object({
	sensorId: z.string(),
	type: z.string(),
	metric: z.enum(METRIC_NAMES),
	unit: z.string().optional(),
	location: z.string().optional(),
	intervalMs: z.number(),
	sysfsPath: z.string().optional()
});

const ConfigFileSchema = z.object({
	device: z
		.object({
			deviceId: z.string().optional(),
			location: z.string().optional()
		})
		.optional(),
	broker: z.object({
		url: z.string().optional(),
		topic: z.string(),
		appName: z.string().optional(),
		reconnectPeriodMs: z.number().optional(),
		connectTimeoutMs: z.number().optional()
	}),
	publish: z
		.object({
			intervalMs: z.number().optional()
		})
		.optional(),
	connectivity: z
		.object({
			interfaces: z.array(z.string()).optional()
		})
		.optional(),
	paths: z
		.object({
			logDir: z.string().optional()
		})
		.optional(),
	logLevel: z.string().optional(),
	sensors: z.array(SensorFileSchema).optional()
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;
type SensorFile = z.infer<typeof SensorFileSchema>;

function parseCommandLine(argv: string[]): { configPath: string } {
	const program = new Command();

	program
		.requiredOption("-c, --config <path>", "Path to configuration file")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(argv);

	const opts = program.opts<{ config: string }>();
	return { configPath: opts.config };
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function optionalEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(l => l === value);
}

function applySensorDefaults(s: SensorFile, deviceLocation?: string): SensorConfig {
	const out: SensorConfig = { ...s };

	// If not specified, inherit the location from the device
	if (!out.location && deviceLocation) {
		out.location = deviceLocation;
	}

	return out;
}

function readConfigFile(configPath: string): ConfigFile {
	let raw: string;
	try {
		raw = fs.readFileSync(configPath, "utf8");
	} catch (err) {
		throw configError(`Cannot read config file ${configPath}`, err);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw) as unknown;
	} catch {
		throw configError(`Config file ${configPath} is not valid JSON`);
	}

	const res = ConfigFileSchema.safeParse(parsed);
	if (!res.success) {
		throw configError(`Config file ${configPath} is invalid: ${formatIssues(res.error)}`);
	}
	return res.data;
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	if (!cfg.device.deviceId.trim()) {
		throw configError("device.deviceId must not be empty");
	}

	if (!cfg.broker.topic.trim()) {
		throw configError("config.broker.topic is required");
	}

	let protocol: string;
	try {
		protocol = new URL(cfg.broker.url).protocol;
	} catch {
		throw configError(`config.broker.url is not a valid URL: ${cfg.broker.url}`);
	}
	if (!BROKER_PROTOCOLS.has(protocol)) {
		throw configError(`config.broker.url must use one of: ${Array.from(BROKER_PROTOCOLS).join(", ")}`);
	}

	if (!cfg.broker.appName.trim()) {
		throw configError("config.broker.appName must not be empty");
	}

	const positive: Array<[string, number]> = [
		["config.broker.reconnectPeriodMs", cfg.broker.reconnectPeriodMs],
		["config.broker.connectTimeoutMs", cfg.broker.connectTimeoutMs],
		["config.publish.intervalMs", cfg.publish.intervalMs]
	];
	for (const [name, value] of positive) {
		if (!Number.isFinite(value) || value <= 0) {
			throw configError(`${name} must be a positive number`);
		}
	}

	const seen = new Set<string>();
	for (const s of cfg.sensors) {
		if (!s.sensorId) throw configError("sensor.sensorId is required");
		if (seen.has(s.sensorId)) throw configError(`sensor ${s.sensorId}: duplicate sensorId`);
		seen.add(s.sensorId);

		if (!s.type) throw configError(`sensor ${s.sensorId}: type missing`);
		if (!Number.isFinite(s.intervalMs) || s.intervalMs <= 0) {
			throw configError(`sensor ${s.sensorId}: invalid intervalMs`);
		}

		if (!sensorTypes().includes(s.type)) {
			throw configError(`sensor ${s.sensorId}: unsupported type '${s.type}'`);
		}
		const module = getSensorModule(s.type);
		module.defaults?.(s);
		try {
			module.validate(s);
		} catch (err) {
			throw configError(`sensor ${s.sensorId}: ${errorMessage(err)}`);
		}
	}
}

/* ---------- public API ---------- */

/**
 * Build the configuration from a JSON file plus environment overrides.
 * Throws CONFIG_ERROR on anything invalid.
 */
export function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = readConfigFile(configPath);

	const logLevel = (parsed.logLevel ?? DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw configError(`config.logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
	}

	const cfg: AppConfig = {
		device: {
			deviceId: optionalEnv(env, "DEVICE_ID") ?? parsed.device?.deviceId ?? os.hostname(),
			location: parsed.device?.location
		},
		broker: {
			url: parsed.broker.url ?? DEFAULT_BROKER_URL,
			topic: parsed.broker.topic,
			appName: parsed.broker.appName ?? DEFAULT_APP_NAME,
			username: optionalEnv(env, "MQTT_USERNAME"),
			password: optionalEnv(env, "MQTT_PASSWORD"),
			reconnectPeriodMs: parsed.broker.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS,
			connectTimeoutMs: parsed.broker.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
		},
		publish: {
			intervalMs: parsed.publish?.intervalMs ?? DEFAULT_PUBLISH_INTERVAL_MS
		},
		connectivity: {
			interfaces: parsed.connectivity?.interfaces ?? []
		},
		paths: {
			logDir: parsed.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel,
		sensors: (parsed.sensors ?? []).map(s => applySensorDefaults(s, parsed.device?.location))
	};

	validateConfig(cfg);

	return cfg;
}

export function loadConfig(argv: string[] = process.argv): AppConfig {
	const { configPath } = parseCommandLine(argv);
	const cfg = loadConfigFile(configPath);

	// Verify that dirs exist
	ensureDir(cfg.paths.logDir);

	return cfg;
}
