/**
 * Liveness and readiness endpoints.
 */

export interface HealthResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * Anything reporting how many job runs have started, normally the {@link Scheduler}.
 */
export interface DispatchState {
  readonly dispatched: number;
}

const textResponse = (status: number, body: string): HealthResponse => ({
  status,
  body,
  headers: { 'Content-Type': 'text/plain' },
});

/**
 * Liveness: the process is up and serving HTTP.
 */
export function handleHealth(): HealthResponse {
  return textResponse(200, 'OK');
}

/**
 * Readiness: at least one job run has been dispatched since startup.
 */
export function handleReady(state: DispatchState): HealthResponse {
  return state.dispatched > 0 ? textResponse(200, 'Ready') : textResponse(503, 'Not Ready');
}
