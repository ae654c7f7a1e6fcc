/**
 * Driver Registry
 *
 * Named session recipes. A test suite registers a driver once (for example a
 * default driver and one that keeps storage across resets) and asks for
 * fresh sessions by name.
 */

import type { BackendConnection } from './backend-connection.interface.js';
import type { SessionController } from './session-controller.js';
import { HarnessError } from '../shared/errors/index.js';
import { getLogger } from '../shared/services/logging.service.js';

export type DriverFactory = () => SessionController<BackendConnection>;

const drivers = new Map<string, DriverFactory>();
const logger = getLogger();

/**
 * Register (or replace) a driver under a name
 */
export function registerDriver(name: string, factory: DriverFactory): void {
  if (drivers.has(name)) {
    logger.debug('Replacing registered driver', { name });
  }
  drivers.set(name, factory);
}

export function hasDriver(name: string): boolean {
  return drivers.has(name);
}

export function listDrivers(): string[] {
  return [...drivers.keys()];
}

/**
 * Build a new session from a registered driver. The browser starts lazily.
 *
 * @throws HarnessError(DRIVER_NOT_REGISTERED) for unknown names
 */
export function createSession(name: string): SessionController<BackendConnection> {
  const factory = drivers.get(name);
  if (!factory) {
    throw HarnessError.driverNotRegistered(name, listDrivers());
  }
  return factory();
}

/**
 * Remove every registration (for testing)
 */
export function clearDrivers(): void {
  drivers.clear();
}
