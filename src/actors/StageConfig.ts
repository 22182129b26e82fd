// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { AddressFactory } from './Address.js'
import { type DirectoryConfig, DirectoryConfigs } from './Directory.js'
import { DefaultLogger, type Logger, NoOpLogger } from './Logger.js'
import type { Supervisor } from './Supervisor.js'
import { Uuid7Address } from './Uuid7Address.js'

/**
 * What happens to a message that no registration of the active behavior
 * accepts.
 *
 * - 'dead-letter': logged as a warning and sent to dead letters listeners
 * - 'log': logged as a warning only
 * - 'drop': silently discarded
 *
 * An unhandled message never faults the actor.
 */
export type UnhandledPolicy = 'dead-letter' | 'log' | 'drop'

/**
 * Configuration of a LocalStage.
 */
export interface StageConfig {
  /** Logger of the stage and of every actor on it */
  logger: Logger
  /** Source of actor addresses */
  addressFactory: AddressFactory
  /** Default for actors created without ActorOptions.unhandledPolicy */
  unhandledPolicy: UnhandledPolicy
  /** Supervisor registered as 'default'; a RestartingSupervisor if absent */
  defaultSupervisor?: Supervisor
  directory: DirectoryConfig
}

export class StageConfigs {
  static readonly DEFAULT: StageConfig = {
    logger: DefaultLogger,
    addressFactory: { unique: () => Uuid7Address.unique() },
    unhandledPolicy: 'dead-letter',
    directory: DirectoryConfigs.DEFAULT
  }

  /**
   * DEFAULT without log output.
   */
  static readonly QUIET: StageConfig = {
    ...StageConfigs.DEFAULT,
    logger: NoOpLogger
  }
}
