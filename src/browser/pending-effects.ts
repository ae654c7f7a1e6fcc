/**
 * Pending Effects
 *
 * Tracks in-flight asynchronous operations that may write to session stores,
 * so a reset can wait them out before clearing.
 */

import { extractErrorMessage } from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

export class PendingEffects {
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(private readonly logger: Logger = getLogger()) {}

  /**
   * Register an effect. Returns the same promise so callers can keep awaiting it.
   */
  track<T>(effect: Promise<T>): Promise<T> {
    const settled = effect.then(
      () => undefined,
      (error: unknown) => {
        // The owner of the effect sees the rejection; drain only needs it settled
        this.logger.debug('Tracked effect rejected', { error: extractErrorMessage(error) });
      },
    );
    this.inFlight.add(settled);
    void settled.finally(() => this.inFlight.delete(settled));
    return effect;
  }

  get size(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every effect tracked so far, and any tracked while waiting, has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }
}
