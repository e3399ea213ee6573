/**
 * Sanitizes error messages before returning them to API clients.
 * Prevents leaking internal details like stack traces, file paths
 * and IP addresses.
 */

const SENSITIVE_PATTERNS = [
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack traces
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/, // IPv4
  /(?:^|\s)\/(?:[\w.-]+\/)+[\w.-]+/, // absolute paths
  /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|ECONNRESET|EADDRINUSE/i, // Node network errors
];

export function sanitizeErrorMessage(err: unknown, statusCode: number): string {
  if (statusCode >= 500) {
    return "Internal server error";
  }

  const message = messageOf(err);

  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return "Request failed";
    }
  }

  return message;
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  // Plugins such as @fastify/rate-limit throw plain objects with a message.
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}
