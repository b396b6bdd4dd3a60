import { ActiveSession, FocusLevel } from '../types/session';
import { clamp, mean, nonNegative, round1, stdDev } from '../utils/stats';
import { secondsBetween } from '../utils/clock';

/**
 * Session length at which duration-driven scores peak
 */
export const OPTIMAL_SESSION_MINUTES = 25;

export const FOCUS_WEIGHTS = {
  duration: 0.3,
  interruptionResistance: 0.25,
  interactionPattern: 0.2,
  timeConsistency: 0.15,
  completion: 0.1,
} as const;

export type FocusFactor = keyof typeof FOCUS_WEIGHTS;

const FOCUS_FACTORS: readonly FocusFactor[] = [
  'duration',
  'interruptionResistance',
  'interactionPattern',
  'timeConsistency',
  'completion',
];

export interface TickInput {
  elapsedMinutes: number;
  interruptionCount: number;
  interactionCount: number;
}

export interface LiveFocusInput {
  elapsedSeconds: number;
  interruptionCount: number;
  /** Seconds since session start of each interaction, in order */
  interactionOffsets: readonly number[];
}

export interface LiveFocusScore {
  score: number;
  level: FocusLevel;
  factors: Record<FocusFactor, number>;
}

/**
 * Score sampled on every tick.
 * Rises to 100 at 25 minutes, then decays slowly (floor 70) past it;
 * each interruption costs 10 (max 40) and interactions beyond 10 cost 2 each (max 20).
 */
export function calculateTickScore(input: TickInput): number {
  const minutes = nonNegative(input.elapsedMinutes);
  const interruptions = nonNegative(input.interruptionCount);
  const interactions = nonNegative(input.interactionCount);

  const base = minutes <= OPTIMAL_SESSION_MINUTES
    ? 50 + (minutes / OPTIMAL_SESSION_MINUTES) * 50
    : Math.max(70, 100 - (minutes - OPTIMAL_SESSION_MINUTES) * 0.5);

  const interruptionPenalty = Math.min(40, interruptions * 10);
  const interactionPenalty = interactions > 10 ? Math.min(20, (interactions - 10) * 2) : 0;

  return round1(clamp(base - interruptionPenalty - interactionPenalty, 0, 100));
}

function durationFactor(minutes: number): number {
  if (minutes <= OPTIMAL_SESSION_MINUTES) {
    return (minutes / OPTIMAL_SESSION_MINUTES) * 100;
  }
  return 100 - Math.min(20, (minutes - OPTIMAL_SESSION_MINUTES) * 0.8);
}

function interruptionResistanceFactor(interruptions: number, minutes: number): number {
  // Interruptions per 15 minutes
  const rate = (interruptions * 15) / Math.max(minutes, 1);
  if (rate <= 1) {
    return 100;
  }
  return Math.max(20, 100 - (rate - 1) * 20);
}

function interactionPatternFactor(interactions: number, minutes: number): number {
  const perMinute = interactions / Math.max(minutes, 1);
  if (perMinute < 1) {
    return 60 + perMinute * 40;
  }
  if (perMinute <= 3) {
    return 100;
  }
  return Math.max(40, 100 - (perMinute - 3) * 15);
}

function timeConsistencyFactor(offsets: readonly number[]): number {
  if (offsets.length < 3) {
    return 100;
  }

  const gaps: number[] = [];
  for (let i = 1; i < offsets.length; i++) {
    gaps.push(Math.abs(offsets[i] - offsets[i - 1]));
  }

  return Math.max(50, 100 - Math.min(50, stdDev(gaps) / 6));
}

function completionFactor(minutes: number): number {
  return Math.min(1, minutes / OPTIMAL_SESSION_MINUTES) * 100;
}

/**
 * Weighted multi-factor score published to the live display
 */
export function calculateLiveFocusScore(input: LiveFocusInput): LiveFocusScore {
  const minutes = nonNegative(input.elapsedSeconds) / 60;
  const interruptions = nonNegative(input.interruptionCount);
  const offsets = input.interactionOffsets.map(nonNegative);

  const factors: Record<FocusFactor, number> = {
    duration: round1(durationFactor(minutes)),
    interruptionResistance: round1(interruptionResistanceFactor(interruptions, minutes)),
    interactionPattern: round1(interactionPatternFactor(offsets.length, minutes)),
    timeConsistency: round1(timeConsistencyFactor(offsets)),
    completion: round1(completionFactor(minutes)),
  };

  let weighted = 0;
  for (const factor of FOCUS_FACTORS) {
    weighted += factors[factor] * FOCUS_WEIGHTS[factor];
  }

  const score = round1(clamp(weighted, 0, 100));
  return { score, level: focusLevel(score), factors };
}

export function focusLevel(score: number): FocusLevel {
  if (score >= 80) {
    return 'high';
  }
  if (score >= 60) {
    return 'medium';
  }
  return 'low';
}

/**
 * Live score for a session in progress
 */
export function scoreActiveSession(session: ActiveSession, now: Date): LiveFocusScore {
  return calculateLiveFocusScore({
    elapsedSeconds: secondsBetween(session.startTime, now),
    interruptionCount: session.interruptions.length,
    interactionOffsets: session.interactions.map((interaction) => interaction.sessionTimeSeconds),
  });
}

/**
 * Final focus score: the mean of the samples taken during the session
 */
export function meanSampleScore(scores: readonly number[]): number {
  return round1(clamp(mean(scores), 0, 100));
}

export interface RecommendationInput {
  score: number;
  interruptionCount: number;
  interactionCount: number;
  elapsedMinutes: number;
}

/**
 * Advice for the current session
 */
export function generateFocusRecommendations(input: RecommendationInput): string[] {
  const recommendations: string[] = [];

  if (input.score < 60) {
    recommendations.push('Focus is slipping. Close unrelated tabs and pick a single next step.');
  }
  if (input.interruptionCount > 3) {
    recommendations.push('Frequent interruptions this session. Silence notifications until the timer ends.');
  }
  if (input.interactionCount > 30) {
    recommendations.push('Lots of timer interactions. Try leaving the timer alone and trusting the schedule.');
  }
  if (input.elapsedMinutes < 10) {
    recommendations.push('Early in the session. Give yourself a few minutes to settle into the task.');
  }

  if (recommendations.length === 0) {
    recommendations.push('Great focus. Keep the current rhythm going.');
  }

  return recommendations;
}
