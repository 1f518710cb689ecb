export interface CheckResult {
  readonly id: string;
  readonly name: string;
  readonly passed: boolean;
  readonly detail?: string;
}

export interface VerificationReport {
  readonly passed: number;
  readonly failed: number;
  readonly results: readonly CheckResult[];
}
