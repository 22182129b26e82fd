// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { HandlerSet, HandlerSetSealedError, handlers } from '../../src/actors/HandlerSet.js'

type Greeting =
  | { readonly type: 'Hello', readonly name: string }
  | { readonly type: 'Bye' }

interface GreeterState {
  greeted: string[]
}

describe('HandlerSet', () => {
  describe('Building', () => {
    it('should keep name and registrations in declaration order', () => {
      const set = handlers<Greeting, GreeterState>('Greeting')
        .match('Hello', () => {})
        .matchWhen('Bye', (_bye, state) => state.greeted.length > 0, () => {})
        .match('Hello', () => {})
        .build()

      expect(set.name()).toBe('Greeting')
      expect(set.size()).toBe(3)
      expect(set.registrations().map(registration => registration.type)).toEqual(['Hello', 'Bye', 'Hello'])
      expect(set.registrations().map(registration => registration.hasGuard())).toEqual([false, true, false])
    })

    it('should allow duplicate types without validation', () => {
      const set = handlers<Greeting>('Twice')
        .match('Bye', () => {})
        .match('Bye', () => {})
        .build()

      expect(set.size()).toBe(2)
    })

    it('should build an empty behavior', () => {
      const set = handlers<Greeting>('Silent').build()

      expect(set.size()).toBe(0)
      expect(set.handles('Hello')).toBe(false)
    })

    it('should build from a registration sequence', () => {
      const source = handlers<Greeting>('Source')
        .match('Hello', () => {})
        .build()

      const copy = HandlerSet.build('Copy', source.registrations())

      expect(copy.name()).toBe('Copy')
      expect(copy.registrations()).toEqual(source.registrations())
    })
  })

  describe('Immutability', () => {
    it('should freeze its registrations', () => {
      const set = handlers<Greeting>('Frozen')
        .match('Hello', () => {})
        .build()

      expect(Object.isFrozen(set.registrations())).toBe(true)
    })

    it('should not see registrations added to the source array after build', () => {
      const first = handlers<Greeting>('First').match('Hello', () => {}).build()
      const registrations = [...first.registrations()]

      const set = HandlerSet.build('Snapshot', registrations)
      registrations.push(...handlers<Greeting>('Other').match('Bye', () => {}).build().registrations())

      expect(set.size()).toBe(1)
      expect(set.handles('Bye')).toBe(false)
    })

    it('should refuse a second build', () => {
      const builder = handlers<Greeting>('Once').match('Hello', () => {})
      builder.build()

      expect(() => builder.build()).toThrow(HandlerSetSealedError)
      expect(() => builder.build()).toThrow('HandlerSet already built: Once')
    })

    it('should refuse registrations after build', () => {
      const builder = handlers<Greeting>('Closed')
      builder.build()

      expect(() => builder.match('Bye', () => {})).toThrow(HandlerSetSealedError)
    })
  })

  describe('Registrations', () => {
    it('should admit only its own type', () => {
      const set = handlers<Greeting>('Typed').match('Hello', () => {}).build()
      const registration = set.registrations()[0]

      expect(registration?.admits({ type: 'Hello', name: 'ada' }, undefined)).toBe(true)
      expect(registration?.admits({ type: 'Bye' }, undefined)).toBe(false)
    })

    it('should admit by guard over message and state', () => {
      const set = handlers<Greeting, GreeterState>('Guarded')
        .matchWhen('Hello', (hello, state) => !state.greeted.includes(hello.name), () => {})
        .build()
      const registration = set.registrations()[0]

      expect(registration?.admits({ type: 'Hello', name: 'ada' }, { greeted: [] })).toBe(true)
      expect(registration?.admits({ type: 'Hello', name: 'ada' }, { greeted: ['ada'] })).toBe(false)
    })
  })

  describe('Description', () => {
    it('should mark guarded registrations', () => {
      const set = handlers<Greeting>('Greeting')
        .match('Hello', () => {})
        .matchWhen('Bye', () => true, () => {})
        .build()

      expect(set.toString()).toBe('HandlerSet[Greeting: Hello, Bye?]')
    })

    it('should report handled types regardless of guards', () => {
      const set = handlers<Greeting>('Greeting')
        .matchWhen('Bye', () => false, () => {})
        .build()

      expect(set.handles('Bye')).toBe(true)
      expect(set.handles('Hello')).toBe(false)
    })
  })
})
