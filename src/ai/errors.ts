/** step() outside a running episode. */
export class EnvUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvUsageError';
  }
}

/** Malformed action, rejected before any physics call. */
export class ActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActionError';
  }
}

/** Placement could not satisfy the minimum separation within its attempt cap. */
export class PlacementError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlacementError';
  }
}
