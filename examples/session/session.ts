// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { awaitSnapshot } from '../../src/actors/testkit/TestAwaitAssist.js'
import { stage } from '../../src/index.js'
import { authenticatorProtocol } from './model/AuthenticatorActor.js'
import { ChatRoomProtocol } from './model/ChatRoomActor.js'
import { sessionProtocol } from './model/SessionActor.js'

/**
 * Chat session walkthrough.
 *
 * Two sessions connect to one room. The first presents a known token and
 * replays what it was told while authenticating; the second is rejected.
 */
async function main(): Promise<void> {
  const accounts = new Map([['token-ada', 'ada']])

  const authenticator = stage().actorFor(authenticatorProtocol(accounts))
  const room = stage().actorFor(ChatRoomProtocol)

  const ada = stage().actorFor(sessionProtocol('token-ada', authenticator, room))
  ada.tell({ type: 'IncomingMessage', text: 'hello' })
  ada.tell({ type: 'IncomingMessage', text: 'is anyone here?' })

  const intruder = stage().actorFor(sessionProtocol('token-unknown', authenticator, room))
  intruder.tell({ type: 'IncomingMessage', text: 'let me in' })

  const adaSession = await awaitSnapshot(ada, snapshot => snapshot.current === 'Authenticated')
  console.log(`ada: ${adaSession.behaviors.join(' > ')} forwarded: ${String(adaSession.state['forwarded'])}`)

  const intruderSession = await awaitSnapshot(intruder, snapshot => snapshot.current === 'Rejected')
  console.log(`intruder: ${intruderSession.behaviors.join(' > ')} because: ${String(intruderSession.state['rejection'])}`)

  ada.tell({ type: 'IncomingMessage', text: 'bye' })
  ada.tell({ type: 'Logout' })

  const roomSnapshot = await awaitSnapshot(room, snapshot => {
    const posts = snapshot.state['posts']
    return Array.isArray(posts) && posts.length === 3
  })
  console.log('room posts:', roomSnapshot.state['posts'])

  await stage().close()
}

main().catch((error: unknown) => {
  console.error('Session example failed:', error)
  process.exitCode = 1
})
