export type ErrorCode =
	| "CONFIG_ERROR"
	| "CONSTRUCTION_ERROR"
	| "CONNECT_ERROR"
	| "PUBLISH_ERROR"
	| "SERIALIZATION_ERROR"
	| "SENSOR_ERROR"
	| "STATE_ERROR"
	| "INTERNAL_ERROR";

export type PublishFailureReason = "NOT_CONNECTED" | "BUFFER_FULL" | "SESSION_CLOSED" | "DELIVERY_FAILED";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function constructionError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "CONSTRUCTION_ERROR",
		message,
		cause
	});
}

export function connectError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "CONNECT_ERROR",
		message,
		cause
	});
}

export function publishError(reason: PublishFailureReason, topic: string, cause?: unknown): AppError {
	const messages: Record<PublishFailureReason, string> = {
		NOT_CONNECTED: "Client is not connected and the disconnected buffer is not enabled",
		BUFFER_FULL: "Disconnected buffer is full; message dropped",
		SESSION_CLOSED: "Broker session has been closed",
		DELIVERY_FAILED: "Message delivery failed"
	};

	return new AppError({
		code: "PUBLISH_ERROR",
		message: messages[reason],
		details: { reason, topic },
		cause
	});
}

export function serializationError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "SERIALIZATION_ERROR",
		message,
		cause
	});
}

export function sensorError(sensorId: string, cause: unknown): AppError {
	return new AppError({
		code: "SENSOR_ERROR",
		message: `Sensor '${sensorId}' read failed: ${errorMessage(cause)}`,
		details: { sensorId },
		cause
	});
}

export function stateError(message: string): AppError {
	return new AppError({
		code: "STATE_ERROR",
		message
	});
}
