// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

export { Actor } from './actors/Actor.js'
export { ActorStoppedError } from './actors/ActorRef.js'
export type { ActorRef, BehaviorSnapshot, MessageOf } from './actors/ActorRef.js'
export type { Address, AddressFactory } from './actors/Address.js'
export { ArrayMailbox } from './actors/ArrayMailbox.js'
export { StaleBehaviorContextError } from './actors/BehaviorContext.js'
export type { BehaviorContext } from './actors/BehaviorContext.js'
export { BehaviorStack, UninitializedBehaviorStackError } from './actors/BehaviorStack.js'
export { DeadLetter, DeadLetters } from './actors/DeadLetters.js'
export type { DeadLetterReason, DeadLettersListener } from './actors/DeadLetters.js'
export { DefaultSupervisor, RestartingSupervisor } from './actors/DefaultSupervisor.js'
export { Definition } from './actors/Definition.js'
export { Directory, DirectoryConfigs } from './actors/Directory.js'
export type { DirectoryConfig } from './actors/Directory.js'
export { dispatch } from './actors/Dispatcher.js'
export type { DispatchOutcome, Handled, Unhandled } from './actors/Dispatcher.js'
export { EmptyEnvelope } from './actors/Envelope.js'
export type { Envelope } from './actors/Envelope.js'
export { HandlerSet, HandlerSetBuilder, HandlerSetSealedError, handlers } from './actors/HandlerSet.js'
export type { Action, Guard, Registration } from './actors/HandlerSet.js'
export { ActorStatus } from './actors/LifeCycle.js'
export { LocalStage, SupervisorNotFoundError } from './actors/LocalStage.js'
export { DefaultLogger, NoOpLogger } from './actors/Logger.js'
export type { Logger } from './actors/Logger.js'
export type { Mailbox } from './actors/Mailbox.js'
export { isMessageOfType, representationOf } from './actors/Message.js'
export type { Message, MessageOfType, MessageType } from './actors/Message.js'
export { NumericAddress } from './actors/NumericAddress.js'
export { ObservableState } from './actors/ObservableState.js'
export { protocolOf } from './actors/Protocol.js'
export type { Protocol, ProtocolInstantiator } from './actors/Protocol.js'
export { stage } from './actors/Stage.js'
export type { ActorOptions, Stage } from './actors/Stage.js'
export { StageConfigs } from './actors/StageConfig.js'
export type { StageConfig, UnhandledPolicy } from './actors/StageConfig.js'
export {
  DefaultSupervisionStrategy,
  ForeverSupervisionStrategy,
  SupervisionDirective,
  SupervisionStrategy
} from './actors/Supervisor.js'
export type { Supervised, Supervisor } from './actors/Supervisor.js'
export { Uuid7Address } from './actors/Uuid7Address.js'
