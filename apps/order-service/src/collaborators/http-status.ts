import { AxiosError } from 'axios';
import { Observable, OperatorFunction, catchError, of, throwError } from 'rxjs';

export function hasHttpStatus(error: unknown, ...statuses: number[]): boolean {
  return error instanceof AxiosError && error.response !== undefined && statuses.includes(error.response.status);
}

/**
 * Maps the listed HTTP statuses to `null` inside the circuit breaker's operation.
 * Those answers never count as collaborator failures.
 */
export function answerNullOn<T>(...statuses: number[]): OperatorFunction<T, T | null> {
  return catchError(
    (error: unknown): Observable<null> => (hasHttpStatus(error, ...statuses) ? of(null) : throwError(() => error)),
  );
}
