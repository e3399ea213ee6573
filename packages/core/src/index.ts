// Admission control
export { AdmissionController, DEFAULT_RETENTION_FACTOR } from "./admission/controller.js";
export type { AdmissionControllerOptions } from "./admission/controller.js";
export { AdmissionError, InvalidPolicyError, UnconfiguredError } from "./admission/errors.js";
export type { AdmissionErrorCode } from "./admission/errors.js";

// Telemetry
export { createInMemoryMetrics, InMemoryCounter } from "./telemetry/metrics.js";
export type { AdmissionMetrics, Counter } from "./telemetry/metrics.js";
