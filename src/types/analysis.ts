/**
 * Result of an analytical query that needs a minimum amount of history.
 * Falling short is a normal outcome, not an error.
 */
export type AnalysisResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'insufficient_data'; required: number; available: number; message: string };

export function ok<T>(data: T): AnalysisResult<T> {
  return { status: 'ok', data };
}

export function insufficientData<T>(
  required: number,
  available: number,
  subject: string
): AnalysisResult<T> {
  return {
    status: 'insufficient_data',
    required,
    available,
    message: `Insufficient data: ${subject} needs at least ${required}, found ${available}`,
  };
}
