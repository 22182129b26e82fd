// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Logger } from '../Logger.js'

export type LogLevel = 'log' | 'debug' | 'warn' | 'error'

export interface LogEntry {
  readonly level: LogLevel
  readonly message: string
  readonly args: readonly unknown[]
}

/**
 * Logger that records every entry instead of printing it.
 *
 * ```typescript
 * const logger = new TestLogger()
 * const testStage = new LocalStage({ logger })
 * // ...
 * expect(logger.messages('error')).toContain('Message processing failed: boom')
 * ```
 */
export class TestLogger implements Logger {
  private readonly entries: LogEntry[] = []

  log(message: string, ...args: unknown[]): void {
    this.record('log', message, args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.record('debug', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.record('warn', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.record('error', message, args)
  }

  /**
   * Messages logged at `level`, oldest first.
   */
  messages(level: LogLevel): string[] {
    return this.entries
      .filter(entry => entry.level === level)
      .map(entry => entry.message)
  }

  private record(level: LogLevel, message: string, args: unknown[]): void {
    this.entries.push({ level, message, args })
  }
}
