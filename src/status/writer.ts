/**
 * Status submission
 * Validates a state transition and persists it; the only mutation
 * triggered from outside the display.
 */

import type { IClock, IStatusStore } from '../types/interfaces.js';
import { isPresenceState, type StatusRecord } from '../types/index.js';
import { systemClock } from '../infra/clock.js';
import { InvalidStateError } from '../errors.js';

export class StatusWriter {
  constructor(
    private store: IStatusStore,
    private clock: IClock = systemClock
  ) {}

  /**
   * Record a new state. Throws InvalidStateError for an unknown state name
   * without touching the store.
   */
  submit(stateName: string, message: string = ''): StatusRecord {
    const state = stateName.trim().toLowerCase();
    if (!isPresenceState(state)) {
      throw new InvalidStateError(stateName);
    }

    return this.store.write({
      state,
      message: message.trim(),
      updatedAt: this.clock.now().getTime(),
    });
  }
}
