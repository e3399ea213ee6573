export type AdmissionErrorCode = "INVALID_POLICY" | "UNCONFIGURED";

export class AdmissionError extends Error {
  constructor(
    public readonly code: AdmissionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AdmissionError";
  }
}

export class InvalidPolicyError extends AdmissionError {
  constructor(public readonly issues: string[]) {
    super("INVALID_POLICY", `Invalid rate limit policy: ${issues.join("; ")}`);
    this.name = "InvalidPolicyError";
  }
}

export class UnconfiguredError extends AdmissionError {
  constructor() {
    super("UNCONFIGURED", "Admission control is not configured");
    this.name = "UnconfiguredError";
  }
}
