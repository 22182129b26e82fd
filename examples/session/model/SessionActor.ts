// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  Actor,
  type ActorRef,
  type BehaviorContext,
  type HandlerSet,
  handlers,
  ObservableState,
  type Protocol,
  protocolOf
} from '../../../src/index.js'
import type { AuthenticatorMessage, ChatRoomMessage, SessionMessage } from './SessionTypes.js'

export interface SessionState {
  readonly room: ActorRef<ChatRoomMessage>
  user: string | undefined
  /** Texts received before authentication completed */
  deferred: string[]
  forwarded: number
  ignored: number
  rejection: string | undefined
}

const closed: HandlerSet<SessionMessage, SessionState> = handlers<SessionMessage, SessionState>('Closed')
  .match('Logout', () => {
    // already closed
  })
  .build()

const rejected: HandlerSet<SessionMessage, SessionState> = handlers<SessionMessage, SessionState>('Rejected')
  .match('Logout', (_logout, context) => context.become(closed))
  .build()

const authenticated: HandlerSet<SessionMessage, SessionState> = handlers<SessionMessage, SessionState>('Authenticated')
  .matchWhen('IncomingMessage', incoming => incoming.text.trim().length === 0, (_incoming, { state }) => {
    state.ignored++
  })
  .match('IncomingMessage', (incoming, context) => {
    const state = context.state
    context.send(state.room, { type: 'Post', user: state.user ?? 'anonymous', text: incoming.text })
    state.forwarded++
  })
  .match('Logout', (_logout, context) => context.become(closed))
  .build()

const authenticating: HandlerSet<SessionMessage, SessionState> = handlers<SessionMessage, SessionState>('Authenticating')
  .match('IncomingMessage', (incoming, { state }) => {
    state.deferred.push(incoming.text)
  })
  .match('AuthenticationSuccess', (success, context) => {
    const state = context.state
    state.user = success.user
    for (const text of state.deferred) {
      context.send(state.room, { type: 'Post', user: success.user, text })
    }
    state.forwarded += state.deferred.length
    state.deferred = []
    context.become(authenticated)
  })
  .match('AuthenticationFailure', (failure, context) => {
    const state = context.state
    state.rejection = failure.reason
    state.deferred = []
    context.become(rejected)
  })
  .build()

/**
 * A chat session that authenticates before it talks to the room.
 *
 * Authenticating: messages are deferred until the authenticator answers.
 * Authenticated: messages go to the room, blank ones are ignored.
 * Rejected and Closed: messages are not handled.
 */
export class SessionActor extends Actor<SessionMessage, SessionState> {
  private readonly token: string
  private readonly authenticator: ActorRef<AuthenticatorMessage>
  private readonly room: ActorRef<ChatRoomMessage>

  constructor(token: string, authenticator: ActorRef<AuthenticatorMessage>, room: ActorRef<ChatRoomMessage>) {
    super()
    this.token = token
    this.authenticator = authenticator
    this.room = room
  }

  protected initialState(): SessionState {
    return {
      room: this.room,
      user: undefined,
      deferred: [],
      forwarded: 0,
      ignored: 0,
      rejection: undefined
    }
  }

  protected initialBehavior(): HandlerSet<SessionMessage, SessionState> {
    return authenticating
  }

  protected override started(context: BehaviorContext<SessionMessage, SessionState>): void {
    context.send(this.authenticator, { type: 'Authenticate', token: this.token, replyTo: context.self() })
  }

  protected override observableState(state: Readonly<SessionState>): ObservableState {
    return new ObservableState()
      .putValue('user', state.user)
      .putValue('deferred', [...state.deferred])
      .putValue('forwarded', state.forwarded)
      .putValue('ignored', state.ignored)
      .putValue('rejection', state.rejection)
  }
}

export const sessionProtocol = (
  token: string,
  authenticator: ActorRef<AuthenticatorMessage>,
  room: ActorRef<ChatRoomMessage>
): Protocol<SessionMessage, SessionState> =>
  protocolOf('Session', () => new SessionActor(token, authenticator, room))

export const SessionBehaviors = { authenticating, authenticated, rejected, closed } as const
