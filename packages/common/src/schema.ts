import { z } from "zod";

import { TELEMETRY_CHANNEL } from "./telemetry";

const metricValue = z.string().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, "must be a string-encoded number");

export const TelemetryDataSchema = z
    .object({
        temperature: metricValue.optional(),
        pressure: metricValue.optional()
    })
    .strict()
    .refine(d => Object.keys(d).length > 0, "data must contain at least one metric");

export const TelemetrySchema = z
    .object({
        deviceId: z.string().min(1),
        channel: z.literal(TELEMETRY_CHANNEL),
        timestamp: z.number().int().nonnegative(),
        data: TelemetryDataSchema.optional()
    })
    .strict();

export type TelemetryMessage = z.infer<typeof TelemetrySchema>;

/**
 * Compact, single-line summary of the first few schema issues.
 */
export function formatIssues(error: z.ZodError, max = 5): string {
    return error.issues
        .slice(0, max)
        .map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
        .join("; ");
}

/**
 * Parse a telemetry payload as received from the broker.
 * Throws on invalid JSON or on a schema mismatch.
 */
export function parseTelemetryMessage(payloadJson: string): TelemetryMessage {
    let parsed: unknown;
    try {
        parsed = JSON.parse(payloadJson) as unknown;
    } catch (e) {
        throw new Error("Invalid JSON in telemetry payload", { cause: e });
    }

    const res = TelemetrySchema.safeParse(parsed);
    if (!res.success) {
        throw new Error(`Telemetry schema validation failed: ${formatIssues(res.error)}`);
    }

    return res.data;
}
