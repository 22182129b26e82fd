// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorRef } from '../../../src/index.js'

/**
 * Messages a chat session accepts.
 */
export type SessionMessage =
  | { readonly type: 'IncomingMessage', readonly text: string }
  | { readonly type: 'AuthenticationSuccess', readonly user: string }
  | { readonly type: 'AuthenticationFailure', readonly reason: string }
  | { readonly type: 'Logout' }

export type AuthenticatorMessage =
  | { readonly type: 'Authenticate', readonly token: string, readonly replyTo: ActorRef<SessionMessage> }

export type ChatRoomMessage =
  | { readonly type: 'Post', readonly user: string, readonly text: string }

export interface Post {
  readonly user: string
  readonly text: string
}
