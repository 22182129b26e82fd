// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Logging facility used by the stage and every actor environment.
 *
 * The stage owns one Logger (see StageConfig.logger) and hands it to each
 * actor it creates. Supply a custom implementation to route runtime output
 * elsewhere, or use NoOpLogger to silence it.
 */
export interface Logger {
  /**
   * Logs an informational message.
   * @param message The message to log
   * @param args Additional values to log
   */
  log(message: string, ...args: unknown[]): void

  /**
   * Logs a debug message.
   * @param message The message to log
   * @param args Additional values to log
   */
  debug(message: string, ...args: unknown[]): void

  /**
   * Logs a warning.
   * @param message The message to log
   * @param args Additional values to log
   */
  warn(message: string, ...args: unknown[]): void

  /**
   * Logs an error.
   * @param message The message to log
   * @param args Additional values, typically the Error instance
   */
  error(message: string, ...args: unknown[]): void
}

/**
 * Console-backed logger used when no other logger is configured.
 */
export const DefaultLogger: Logger = {
  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args)
  },

  debug(message: string, ...args: unknown[]): void {
    console.debug(message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args)
  }
}

/**
 * Logger that discards everything.
 */
export const NoOpLogger: Logger = {
  log(): void {},
  debug(): void {},
  warn(): void {},
  error(): void {}
}
