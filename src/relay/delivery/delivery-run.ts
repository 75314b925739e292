import { DeliveryState, canTransition, isTerminal } from './delivery-state';

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: DeliveryState,
    readonly to: DeliveryState,
  ) {
    super(`Illegal delivery transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/**
 * State of one send, from validation to a terminal outcome.
 */
export class DeliveryRun {
  private current = DeliveryState.Validating;
  private readonly trail: DeliveryState[] = [DeliveryState.Validating];
  private attemptCount = 0;
  private failure = '';

  get state(): DeliveryState {
    return this.current;
  }

  get history(): readonly DeliveryState[] {
    return this.trail;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  /** Failure text of the most recent attempt */
  get lastError(): string {
    return this.failure;
  }

  get finished(): boolean {
    return isTerminal(this.current);
  }

  transition(to: DeliveryState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }

  /** Enter Delivering and count the attempt. */
  beginAttempt(): number {
    this.transition(DeliveryState.Delivering);
    this.attemptCount++;
    return this.attemptCount;
  }

  recordFailure(reason: string): void {
    this.failure = reason;
  }
}
