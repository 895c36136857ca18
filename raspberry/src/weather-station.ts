import type winston from "winston";

import { loadConfig } from "./lib/config";
import { asAppError } from "./lib/errors";
import { createLogger } from "./lib/log";

import { TelemetryPublisher, createInterfaceConnectivityGate } from "./publisher";
import { createSensorFeeds } from "./sensors/feed";

const STATUS_LOG_INTERVAL_MS = 60_000;

function waitForShutdown(logger: winston.Logger): Promise<string> {
	return new Promise(resolve => {
		const onSignal = (signal: string) => {
			logger.info("Stopping weather station (signal=%s)", signal);
			resolve(signal);
		};
		process.once("SIGINT", () => onSignal("SIGINT")); // Ctrl+C
		process.once("SIGTERM", () => onSignal("SIGTERM")); // systemd stop
	});
}

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "weather-station",
		level: config.logLevel
	});

	logger.info("Weather station starting");
	logger.info("deviceId=%s topic=%s broker=%s", config.device.deviceId, config.broker.topic, config.broker.url);

	const publisher = new TelemetryPublisher({
		appName: config.broker.appName,
		topic: config.broker.topic,
		deviceId: config.device.deviceId,
		logger,
		broker: {
			url: config.broker.url,
			username: config.broker.username,
			password: config.broker.password,
			reconnectPeriodMs: config.broker.reconnectPeriodMs,
			connectTimeoutMs: config.broker.connectTimeoutMs
		},
		intervalMs: config.publish.intervalMs,
		connectivity: createInterfaceConnectivityGate({ interfaces: config.connectivity.interfaces })
	});

	const feeds = createSensorFeeds(config.sensors, metric => publisher.getListener(metric), logger);
	if (feeds.length === 0) {
		logger.warn("No sensors configured; nothing will be published until readings arrive");
	}

	publisher.start();
	for (const feed of feeds) {
		feed.start();
	}

	const status = setInterval(() => {
		logger.info(
			"Status: session=%s scheduler=%s buffered=%d",
			publisher.sessionState,
			publisher.schedulerState,
			publisher.bufferedCount
		);
	}, STATUS_LOG_INTERVAL_MS);

	try {
		await waitForShutdown(logger);
	} finally {
		clearInterval(status);
		await Promise.all(feeds.map(f => f.stop()));
		await publisher.close();
		logger.info("Weather station exiting");
	}
}

main()
	.then(() => process.exit(0))
	.catch((err: unknown) => {
		const failure = asAppError(err);
		console.error(`${failure.code}: ${failure.message}`);
		process.exit(1);
	});
