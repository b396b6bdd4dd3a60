import { InterruptionType, Severity } from '../types/session';

export const LOW_SEVERITY_LIMIT_SECONDS = 30;
export const MEDIUM_SEVERITY_LIMIT_SECONDS = 120;

/**
 * Severity from duration: <30s low, <120s medium, otherwise high
 */
export function classifySeverity(durationSeconds: number): Severity {
  if (Number.isNaN(durationSeconds) || durationSeconds < LOW_SEVERITY_LIMIT_SECONDS) {
    return 'low';
  }
  if (durationSeconds < MEDIUM_SEVERITY_LIMIT_SECONDS) {
    return 'medium';
  }
  return 'high';
}

/**
 * Preset severity for externally reported interruptions
 */
export function externalSeverity(kind: string): Severity {
  return kind === 'phone_call' || kind === 'urgent_message' ? 'high' : 'medium';
}

export function externalType(kind: string): InterruptionType {
  return `external:${kind}`;
}
