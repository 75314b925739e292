export enum DeliveryState {
  Validating = 'validating',
  Resolving = 'resolving',
  NotFound = 'not_found',
  Delivering = 'delivering',
  Retrying = 'retrying',
  Succeeded = 'succeeded',
  Exhausted = 'exhausted',
  Cancelled = 'cancelled',
}

const TRANSITIONS: Readonly<Record<DeliveryState, readonly DeliveryState[]>> = {
  [DeliveryState.Validating]: [DeliveryState.Resolving],
  [DeliveryState.Resolving]: [DeliveryState.NotFound, DeliveryState.Delivering],
  [DeliveryState.Delivering]: [DeliveryState.Succeeded, DeliveryState.Retrying, DeliveryState.Exhausted],
  [DeliveryState.Retrying]: [DeliveryState.Delivering, DeliveryState.Cancelled],
  [DeliveryState.NotFound]: [],
  [DeliveryState.Succeeded]: [],
  [DeliveryState.Exhausted]: [],
  [DeliveryState.Cancelled]: [],
};

export function canTransition(from: DeliveryState, to: DeliveryState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: DeliveryState): boolean {
  return TRANSITIONS[state].length === 0;
}
