/**
 * Programmer errors raised by the compute-or-fetch protocol.
 *
 * These are never returned through a plugin's failure channel: they signal
 * a defect in the calling code and are thrown immediately.
 */

export class ReentrantComputationError extends Error {
  readonly code = 'REENTRANT_COMPUTATION';
  readonly key: string;

  constructor(key: string) {
    super(
      `Plugin "${key}" was requested while it is already being computed on the same host. ` +
        'A plugin must not request its own value from evaluate().'
    );
    this.name = 'ReentrantComputationError';
    this.key = key;
    Object.setPrototypeOf(this, ReentrantComputationError.prototype);
  }
}

export class PluginContractError extends Error {
  readonly code = 'PLUGIN_CONTRACT_VIOLATION';
  readonly key: string;

  constructor(key: string) {
    super(
      `Plugin "${key}" wrote its own entry into the host's extensions during evaluate(). ` +
        'Return the value instead; the cache stores it.'
    );
    this.name = 'PluginContractError';
    this.key = key;
    Object.setPrototypeOf(this, PluginContractError.prototype);
  }
}

export class StaleSlotError extends Error {
  readonly code = 'STALE_SLOT';
  readonly key: string;

  constructor(key: string) {
    super(
      `Slot for "${key}" is no longer attached: its entry was removed or replaced. ` +
        'Request a fresh slot with getMut().'
    );
    this.name = 'StaleSlotError';
    this.key = key;
    Object.setPrototypeOf(this, StaleSlotError.prototype);
  }
}
