import * as log from './util/log';

/**
 * Where a cache operation reports progress, and how it learns it should stop
 */
export interface ISyncContext {
  /**
   * Aborting this signal cancels the operation at its next wait
   */
  readonly signal?: AbortSignal;

  readonly isCancelled: boolean;

  log(message: string): void;
  warn(message: string): void;
  setCancelled(): void;
}

/**
 * Sends progress to the terminal
 */
export class ConsoleSyncContext implements ISyncContext {
  private cancelled = false;

  constructor(public readonly signal?: AbortSignal) {
  }

  public get isCancelled() { return this.cancelled; }

  public log(message: string) {
    log.info(message);
  }

  public warn(message: string) {
    log.warning(message);
  }

  public setCancelled() {
    this.cancelled = true;
  }
}
