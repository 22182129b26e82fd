// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Actor, type HandlerSet, handlers, ObservableState, type Protocol, protocolOf } from '../../../src/index.js'
import type { ChatRoomMessage, Post } from './SessionTypes.js'

interface ChatRoomState {
  posts: Post[]
}

const open: HandlerSet<ChatRoomMessage, ChatRoomState> = handlers<ChatRoomMessage, ChatRoomState>('Open')
  .match('Post', (post, { state }) => {
    state.posts.push({ user: post.user, text: post.text })
  })
  .build()

/**
 * Keeps the posts forwarded by sessions, in arrival order.
 */
export class ChatRoomActor extends Actor<ChatRoomMessage, ChatRoomState> {
  constructor() {
    super()
  }

  protected initialState(): ChatRoomState {
    return { posts: [] }
  }

  protected initialBehavior(): HandlerSet<ChatRoomMessage, ChatRoomState> {
    return open
  }

  protected override observableState(state: Readonly<ChatRoomState>): ObservableState {
    return new ObservableState().putValue('posts', [...state.posts])
  }
}

export const ChatRoomProtocol: Protocol<ChatRoomMessage, ChatRoomState> =
  protocolOf('ChatRoom', () => new ChatRoomActor())
