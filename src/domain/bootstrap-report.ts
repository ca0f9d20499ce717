/** Outcome of constructing one startup resource. */
export interface ResourceOutcome {
  readonly resource: string;
  readonly status: 'ok' | 'failed';
  readonly error?: unknown;
}
