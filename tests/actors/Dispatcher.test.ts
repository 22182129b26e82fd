// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect, vi } from 'vitest'
import type { ActorRef, MessageOf } from '../../src/actors/ActorRef.js'
import type { BehaviorContext } from '../../src/actors/BehaviorContext.js'
import { dispatch } from '../../src/actors/Dispatcher.js'
import { type HandlerSet, handlers } from '../../src/actors/HandlerSet.js'
import { type Logger, NoOpLogger } from '../../src/actors/Logger.js'
import type { Message } from '../../src/actors/Message.js'
import type { Stage } from '../../src/actors/Stage.js'

type Order =
  | { readonly type: 'Place', readonly quantity: number }
  | { readonly type: 'Cancel' }

interface OrderState {
  limit: number
  placed: number[]
}

// Context outside any actor: enough for the dispatcher, which only reads
// state and hands the context to the action.
class FixedContext implements BehaviorContext<Order, OrderState> {
  constructor(readonly state: OrderState, private readonly behavior: HandlerSet<Order, OrderState>) {}

  self(): ActorRef<Order> {
    throw new Error('No actor')
  }

  logger(): Logger {
    return NoOpLogger
  }

  stage(): Stage {
    throw new Error('No stage')
  }

  currentBehavior(): HandlerSet<Order, OrderState> {
    return this.behavior
  }

  become(): void {}

  unbecome(): void {}

  send<R extends ActorRef<Message>>(to: R, message: MessageOf<R>): void {
    to.tell(message)
  }
}

const contextFor = (behavior: HandlerSet<Order, OrderState>, state: OrderState = { limit: 10, placed: [] }): FixedContext =>
  new FixedContext(state, behavior)

describe('Dispatcher', () => {
  it('should invoke the first registration whose type matches', () => {
    const first = vi.fn()
    const second = vi.fn()
    const set = handlers<Order, OrderState>('Ordering')
      .match('Cancel', () => {})
      .match('Place', first)
      .match('Place', second)
      .build()

    const outcome = dispatch(set, { type: 'Place', quantity: 2 }, contextFor(set))

    expect(outcome.kind).toBe('handled')
    expect(outcome.kind === 'handled' && outcome.index).toBe(1)
    expect(first).toHaveBeenCalledTimes(1)
    expect(second).not.toHaveBeenCalled()
  })

  it('should pass over a registration whose guard is false', () => {
    const large = vi.fn()
    const small = vi.fn()
    const set = handlers<Order, OrderState>('Ordering')
      .matchWhen('Place', (place, state) => place.quantity > state.limit, large)
      .matchWhen('Place', (place, state) => place.quantity <= state.limit, small)
      .build()

    const outcome = dispatch(set, { type: 'Place', quantity: 3 }, contextFor(set))

    expect(outcome.kind === 'handled' && outcome.index).toBe(1)
    expect(large).not.toHaveBeenCalled()
    expect(small).toHaveBeenCalledWith({ type: 'Place', quantity: 3 }, expect.any(FixedContext))
  })

  it('should not evaluate guards after the match', () => {
    const laterGuard = vi.fn(() => true)
    const set = handlers<Order, OrderState>('Ordering')
      .match('Place', () => {})
      .matchWhen('Place', laterGuard, () => {})
      .build()

    dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set))

    expect(laterGuard).not.toHaveBeenCalled()
  })

  it('should not evaluate guards of other types', () => {
    const cancelGuard = vi.fn(() => true)
    const set = handlers<Order, OrderState>('Ordering')
      .matchWhen('Cancel', cancelGuard, () => {})
      .match('Place', () => {})
      .build()

    dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set))

    expect(cancelGuard).not.toHaveBeenCalled()
  })

  it('should give guards the current state', () => {
    const set = handlers<Order, OrderState>('Ordering')
      .matchWhen('Place', (_place, state) => state.placed.length < 2, () => {})
      .build()

    const open = dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set, { limit: 10, placed: [1] }))
    const full = dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set, { limit: 10, placed: [1, 1] }))

    expect(open.kind).toBe('handled')
    expect(full.kind).toBe('unhandled')
  })

  it('should hand the action the context it was given', () => {
    const set = handlers<Order, OrderState>('Ordering')
      .match('Place', (place, context) => {
        context.state.placed.push(place.quantity)
      })
      .build()
    const context = contextFor(set)

    dispatch(set, { type: 'Place', quantity: 4 }, context)
    dispatch(set, { type: 'Place', quantity: 6 }, context)

    expect(context.state.placed).toEqual([4, 6])
  })

  it('should report unhandled when no registration has the type', () => {
    const set = handlers<Order, OrderState>('Ordering')
      .match('Place', () => {})
      .build()
    const cancel: Order = { type: 'Cancel' }

    const outcome = dispatch(set, cancel, contextFor(set))

    expect(outcome.kind).toBe('unhandled')
    expect(outcome.handlerSet).toBe(set)
    expect(outcome.kind === 'unhandled' && outcome.message).toBe(cancel)
  })

  it('should report unhandled when every guard is false', () => {
    const action = vi.fn()
    const set = handlers<Order, OrderState>('Ordering')
      .matchWhen('Place', () => false, action)
      .matchWhen('Place', () => false, action)
      .build()

    const outcome = dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set))

    expect(outcome.kind).toBe('unhandled')
    expect(action).not.toHaveBeenCalled()
  })

  it('should expose the promise of an async action', async () => {
    let finished = false
    const set = handlers<Order, OrderState>('Ordering')
      .match('Place', async () => {
        await Promise.resolve()
        finished = true
      })
      .match('Cancel', () => {})
      .build()

    const placed = dispatch(set, { type: 'Place', quantity: 1 }, contextFor(set))
    const cancelled = dispatch(set, { type: 'Cancel' }, contextFor(set))

    expect(placed.kind === 'handled' && placed.completion).toBeInstanceOf(Promise)
    expect(cancelled.kind === 'handled' && cancelled.completion).toBeUndefined()

    if (placed.kind === 'handled') {
      await placed.completion
    }
    expect(finished).toBe(true)
  })

  it('should propagate a failing action', () => {
    const set = handlers<Order, OrderState>('Ordering')
      .match('Cancel', () => {
        throw new Error('cannot cancel')
      })
      .build()

    expect(() => dispatch(set, { type: 'Cancel' }, contextFor(set))).toThrow('cannot cancel')
  })

  it('should propagate a failing guard without running its action', () => {
    const action = vi.fn()
    const set = handlers<Order, OrderState>('Ordering')
      .matchWhen('Cancel', () => {
        throw new Error('guard failed')
      }, action)
      .build()

    expect(() => dispatch(set, { type: 'Cancel' }, contextFor(set))).toThrow('guard failed')
    expect(action).not.toHaveBeenCalled()
  })
})
