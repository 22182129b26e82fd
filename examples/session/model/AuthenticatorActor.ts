// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Actor, type HandlerSet, handlers, ObservableState, type Protocol, protocolOf } from '../../../src/index.js'
import type { AuthenticatorMessage } from './SessionTypes.js'

interface AuthenticatorState {
  /** token -> user */
  readonly accounts: ReadonlyMap<string, string>
  attempts: number
}

const verifying: HandlerSet<AuthenticatorMessage, AuthenticatorState> =
  handlers<AuthenticatorMessage, AuthenticatorState>('Verifying')
    .match('Authenticate', (authenticate, context) => {
      const state = context.state
      state.attempts++

      const user = state.accounts.get(authenticate.token)
      if (user === undefined) {
        context.send(authenticate.replyTo, { type: 'AuthenticationFailure', reason: 'Unknown token' })
      } else {
        context.send(authenticate.replyTo, { type: 'AuthenticationSuccess', user })
      }
    })
    .build()

/**
 * Answers Authenticate requests from a fixed table of tokens.
 */
export class AuthenticatorActor extends Actor<AuthenticatorMessage, AuthenticatorState> {
  private readonly accounts: ReadonlyMap<string, string>

  constructor(accounts: ReadonlyMap<string, string>) {
    super()
    this.accounts = accounts
  }

  protected initialState(): AuthenticatorState {
    return { accounts: this.accounts, attempts: 0 }
  }

  protected initialBehavior(): HandlerSet<AuthenticatorMessage, AuthenticatorState> {
    return verifying
  }

  protected override observableState(state: Readonly<AuthenticatorState>): ObservableState {
    return new ObservableState().putValue('attempts', state.attempts)
  }
}

export const authenticatorProtocol = (accounts: ReadonlyMap<string, string>): Protocol<AuthenticatorMessage, AuthenticatorState> =>
  protocolOf('Authenticator', () => new AuthenticatorActor(accounts))
