// Shared type definitions

export type CheckStatus = 'ok' | 'error';

export type ProbeOutcome =
  | { kind: 'success'; notBefore: Date; notAfter: Date }
  | { kind: 'failure'; reason: string };

export interface CheckResult {
  hostname: string;
  notBefore: Date;
  notAfter: Date;
  status: CheckStatus;
}

export interface FormattedRow {
  hostname: string;
  notBeforeDisplay: string;
  notAfterDisplay: string;
  daysRemaining: number | 'error';
  status: CheckStatus;
}
