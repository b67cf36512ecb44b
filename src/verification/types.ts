export interface CheckOutcome {
  passed: boolean;
  detail: string;
}

export interface VerificationCheck {
  name: string;
  run(): Promise<CheckOutcome>;
}

export interface CheckResult extends CheckOutcome {
  name: string;
}

export interface VerificationReport {
  passed: boolean;
  results: CheckResult[];
}
