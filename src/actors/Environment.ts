// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from './Address.js'
import type { Definition } from './Definition.js'
import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import type { UnhandledPolicy } from './StageConfig.js'
import type { StageInternal } from './StageInternal.js'

/**
 * Runtime context of one actor: identity, mailbox, logger, stage,
 * supervisor name and unhandled-message policy.
 *
 * Created by the stage during actor instantiation and injected into the
 * Actor base class through setCurrentEnvironment()/retrieveEnvironment(),
 * so actor constructors need no runtime parameters.
 */
export class Environment {
  // INTERNAL: intended for use by the current Actor being created
  private static _currentEnvironment: Environment | undefined = undefined

  /**
   * Sets the environment for the actor about to be instantiated.
   *
   * INTERNAL: called by the stage before the protocol's instantiator
   *
   * @param environment The environment to make available
   */
  static setCurrentEnvironment(environment: Environment): void {
    Environment._currentEnvironment = environment
  }

  /**
   * Drops a pending environment that no actor constructor retrieved.
   *
   * INTERNAL: called by the stage after the protocol's instantiator returns or throws
   */
  static clearCurrentEnvironment(): void {
    Environment._currentEnvironment = undefined
  }

  /**
   * Retrieves and clears the pending environment.
   *
   * INTERNAL: called by the Actor constructor
   *
   * @returns The environment for the actor being constructed
   * @throws Error if no environment is available
   */
  static retrieveEnvironment(): Environment {
    const environment = Environment._currentEnvironment
    if (!environment) {
      throw new Error('No environment available - actor must be created via Stage.actorFor()')
    }
    Environment._currentEnvironment = undefined
    return environment
  }

  private readonly _address: Address
  private readonly _definition: Definition
  private readonly _logger: Logger
  private readonly _mailbox: Mailbox
  private readonly _stage: StageInternal
  private readonly _supervisorName: string
  private readonly _unhandledPolicy: UnhandledPolicy

  /**
   * @param stage The stage managing this actor
   * @param address The actor's unique address
   * @param definition The actor's definition
   * @param mailbox The actor's mailbox
   * @param logger The logger for this actor
   * @param supervisorName Name of the supervisor informed of faults
   * @param unhandledPolicy What to do with messages no registration accepts
   */
  constructor(
    stage: StageInternal,
    address: Address,
    definition: Definition,
    mailbox: Mailbox,
    logger: Logger,
    supervisorName: string = 'default',
    unhandledPolicy: UnhandledPolicy = 'dead-letter'
  ) {
    this._stage = stage
    this._address = address
    this._definition = definition
    this._mailbox = mailbox
    this._logger = logger
    this._supervisorName = supervisorName
    this._unhandledPolicy = unhandledPolicy
  }

  address(): Address {
    return this._address
  }

  definition(): Definition {
    return this._definition
  }

  logger(): Logger {
    return this._logger
  }

  mailbox(): Mailbox {
    return this._mailbox
  }

  stage(): StageInternal {
    return this._stage
  }

  supervisorName(): string {
    return this._supervisorName
  }

  unhandledPolicy(): UnhandledPolicy {
    return this._unhandledPolicy
  }
}
