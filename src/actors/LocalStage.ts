// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Actor } from './Actor.js'
import type { ActorRef, MessageOf } from './ActorRef.js'
import type { Address } from './Address.js'
import { ArrayMailbox } from './ArrayMailbox.js'
import { DeadLetters } from './DeadLetters.js'
import { RestartingSupervisor } from './DefaultSupervisor.js'
import { Definition } from './Definition.js'
import { Directory } from './Directory.js'
import { Environment } from './Environment.js'
import { LocalEnvelope } from './LocalEnvelope.js'
import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import type { Message } from './Message.js'
import type { Protocol } from './Protocol.js'
import type { ActorOptions } from './Stage.js'
import { type StageConfig, StageConfigs } from './StageConfig.js'
import type { StageInternal } from './StageInternal.js'
import type { Supervised, Supervisor } from './Supervisor.js'

/**
 * Thrown by supervisor(name) when no supervisor is registered under `name`.
 */
export class SupervisorNotFoundError extends Error {
  constructor(name: string) {
    super(`Supervisor not found: ${name}`)
    this.name = 'SupervisorNotFoundError'
  }
}

/**
 * In-process stage.
 *
 * Owns the actor directory, dead letters, the supervisor registry and the
 * value registry. Every LocalStage is independent, so tests usually create
 * their own:
 *
 * ```typescript
 * const testStage = new LocalStage({ logger: new TestLogger(), addressFactory: { unique: () => NumericAddress.unique() } })
 * const chart = testStage.actorFor(MetricsChartProtocol)
 * ```
 */
export class LocalStage implements StageInternal {
  private readonly _config: StageConfig
  private readonly _deadLetters: DeadLetters
  private readonly _directory: Directory
  private readonly _supervisors: Map<string, Supervisor>
  private readonly _registeredValues: Map<string, unknown>

  /**
   * @param config Overrides of StageConfigs.DEFAULT
   */
  constructor(config: Partial<StageConfig> = {}) {
    this._config = { ...StageConfigs.DEFAULT, ...config }
    this._deadLetters = new DeadLetters(this._config.logger)
    this._directory = new Directory(this._config.directory)
    this._supervisors = new Map<string, Supervisor>()
    this._registeredValues = new Map<string, unknown>()

    this._supervisors.set('default', this._config.defaultSupervisor ?? new RestartingSupervisor())
  }

  /**
   * Creates and starts an actor.
   *
   * 1. Creates the Definition and Environment
   * 2. Instantiates the actor through the protocol, with the environment pending
   * 3. Registers the actor's reference in the directory
   * 4. Installs initial state and behavior, calls beforeStart()
   * 5. Enqueues the start hook as the first mailbox entry
   */
  actorFor<M extends Message, S>(protocol: Protocol<M, S>, options: ActorOptions = {}): ActorRef<M> {
    const address = this._config.addressFactory.unique()
    const definition = new Definition(protocol.type(), address)
    const mailbox = options.mailbox ?? this.mailbox()

    const environment = new Environment(
      this,
      address,
      definition,
      mailbox,
      this._config.logger,
      options.supervisorName ?? 'default',
      options.unhandledPolicy ?? this._config.unhandledPolicy
    )

    Environment.setCurrentEnvironment(environment)

    const actor = this.instantiate(protocol, definition)

    const ref = actor.self()

    this._directory.set(address, ref)

    try {
      actor.initialize()
    } catch (error: unknown) {
      this._directory.remove(address)
      mailbox.close()
      throw error
    }

    mailbox.send(new LocalEnvelope<M, S>(actor, started => started.runStartHook(), 'started()'))

    return ref
  }

  async actorOf(address: Address): Promise<ActorRef<Message> | undefined> {
    return this._directory.get(address)
  }

  send<R extends ActorRef<Message>>(to: R, message: MessageOf<R>): void {
    to.tell(message)
  }

  address(): Address {
    return this._config.addressFactory.unique()
  }

  deadLetters(): DeadLetters {
    return this._deadLetters
  }

  directory(): Directory {
    return this._directory
  }

  /**
   * Informs the named supervisor, falling back to 'default' if it is not
   * registered. Supervisor failures are logged.
   */
  handleFailureOf(supervised: Supervised, supervisorName: string): void {
    const supervisor = this._supervisors.get(supervisorName) ?? this.supervisor()

    supervisor.inform(supervised.error(), supervised)
      .catch((error: unknown) => {
        const errorObj = error instanceof Error ? error : new Error(String(error))
        this._config.logger.error(
          `Supervisor failed to handle actor failure: ${errorObj.message}`,
          errorObj
        )
      })
  }

  idFrom(environment: Environment): string {
    return 'To: ' + environment.definition().type() +
           ' At: ' + environment.address()
  }

  logger(): Logger {
    return this._config.logger
  }

  mailbox(): Mailbox {
    return new ArrayMailbox()
  }

  registerSupervisor(name: string, supervisor: Supervisor): void {
    this._supervisors.set(name, supervisor)
  }

  supervisor(name: string = 'default'): Supervisor {
    const supervisor = this._supervisors.get(name)
    if (supervisor === undefined) {
      throw new SupervisorNotFoundError(name)
    }
    return supervisor
  }

  registerValue<V>(name: string, value: V): void {
    this._registeredValues.set(name, value)
  }

  registeredValue<V>(name: string): V {
    if (!this._registeredValues.has(name)) {
      throw new Error(`No value registered with name: ${name}`)
    }
    return this._registeredValues.get(name) as V
  }

  deregisterValue<V>(name: string): V | undefined {
    const value = this._registeredValues.get(name) as V | undefined
    this._registeredValues.delete(name)
    return value
  }

  removeFromDirectory(address: Address): void {
    this._directory.remove(address)
  }

  /**
   * Runs the protocol's instantiator. The pending environment never outlives
   * the call, even when the factory throws before constructing an actor.
   */
  private instantiate<M extends Message, S>(protocol: Protocol<M, S>, definition: Definition): Actor<M, S> {
    try {
      return protocol.instantiator().instantiate(definition)
    } finally {
      Environment.clearCurrentEnvironment()
    }
  }

  /**
   * Stops every actor. A failure to stop one actor is logged and does not
   * keep the others running.
   */
  async close(): Promise<void> {
    this._config.logger.log('Stage: Stopping actors...')

    for (const actor of this._directory.all()) {
      try {
        await actor.stop()
      } catch (error: unknown) {
        const errorObj = error instanceof Error ? error : new Error(String(error))
        this._config.logger.error(`Failed to stop actor ${actor.type()}: ${errorObj.message}`, errorObj)
      }
    }

    this._config.logger.log('Stage: All actors stopped')
  }
}
