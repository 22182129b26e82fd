// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { beforeEach, describe, it, expect } from 'vitest'
import { BehaviorStack, UninitializedBehaviorStackError } from '../../src/actors/BehaviorStack.js'
import { handlers } from '../../src/actors/HandlerSet.js'

type Light = { readonly type: 'Toggle' }

const off = handlers<Light>('Off').match('Toggle', () => {}).build()
const on = handlers<Light>('On').match('Toggle', () => {}).build()
const blinking = handlers<Light>('Blinking').match('Toggle', () => {}).build()

describe('BehaviorStack', () => {
  let stack: BehaviorStack<Light, undefined>

  beforeEach(() => {
    stack = new BehaviorStack<Light, undefined>()
  })

  describe('Uninitialized', () => {
    it('should have no current behavior', () => {
      expect(stack.depth()).toBe(0)
      expect(stack.isInitialized()).toBe(false)
      expect(() => stack.current()).toThrow(UninitializedBehaviorStackError)
    })

    it('should push on become without discarding', () => {
      stack.become(on)

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(on)
    })
  })

  describe('Initialized', () => {
    beforeEach(() => {
      stack.reset(off)
    })

    it('should start with exactly the initial behavior', () => {
      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(off)
      expect(stack.names()).toEqual(['Off'])
    })

    it('should replace the top on become by default', () => {
      stack.become(on)

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(on)
      expect(stack.names()).toEqual(['On'])
    })

    it('should not bring back a discarded behavior on unbecome', () => {
      stack.become(on, false)
      stack.become(blinking)

      expect(stack.names()).toEqual(['Off', 'Blinking'])

      stack.unbecome()

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(off)
    })

    it('should push on become without discard and restore the prior top on unbecome', () => {
      stack.become(on, false)

      expect(stack.depth()).toBe(2)
      expect(stack.current()).toBe(on)

      stack.unbecome()

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(off)
    })

    it('should ignore unbecome at depth 1, any number of times', () => {
      stack.become(on)

      for (let i = 0; i < 5; i++) {
        stack.unbecome()
      }

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(on)
    })

    it('should reset to exactly one behavior regardless of depth', () => {
      stack.become(on, false)
      stack.become(blinking, false)
      stack.become(on, false)

      expect(stack.depth()).toBe(4)

      stack.reset(off)

      expect(stack.depth()).toBe(1)
      expect(stack.current()).toBe(off)
    })

    it('should allow the same behavior more than once', () => {
      stack.become(off, false)

      expect(stack.names()).toEqual(['Off', 'Off'])
    })

    it('should clear', () => {
      stack.become(on, false)
      stack.clear()

      expect(stack.depth()).toBe(0)
      expect(stack.isInitialized()).toBe(false)
    })

    it('should describe bottom to top', () => {
      stack.become(on, false)
      stack.become(blinking, false)

      expect(stack.toString()).toBe('BehaviorStack[Off > On > Blinking]')
    })
  })
})
