// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import type { ActorRef } from '../../src/actors/ActorRef.js'
import { DefaultSupervisor, RestartingSupervisor } from '../../src/actors/DefaultSupervisor.js'
import { ActorStatus } from '../../src/actors/LifeCycle.js'
import { LocalStage, SupervisorNotFoundError } from '../../src/actors/LocalStage.js'
import type { Message } from '../../src/actors/Message.js'
import { NumericAddress } from '../../src/actors/NumericAddress.js'
import {
  type Supervised,
  SupervisionDirective,
  SupervisionStrategy
} from '../../src/actors/Supervisor.js'
import { awaitAssert } from '../../src/actors/testkit/TestAwaitAssist.js'
import { TestDeadLettersListener } from '../../src/actors/testkit/TestDeadLettersListener.js'
import { TestLogger } from '../../src/actors/testkit/TestLogger.js'
import {
  failingStartProbeProtocol,
  ProbeBehaviors,
  ProbeProtocol,
  recordsOf,
  startingProbeProtocol
} from './ProbeActor.js'

class ResumingSupervisor extends DefaultSupervisor {
  readonly informed: string[] = []
  readonly faulted: ActorRef<Message>[] = []

  protected decideDirective(error: Error, supervised: Supervised): SupervisionDirective {
    this.informed.push(error.message)
    this.faulted.push(supervised.actor())
    return SupervisionDirective.Resume
  }
}

class StoppingSupervisor extends DefaultSupervisor {
  protected decideDirective(): SupervisionDirective {
    return SupervisionDirective.Stop
  }
}

// DefaultSupervisionStrategy: one restart per 5 seconds
class LimitedRestartSupervisor extends DefaultSupervisor {
  protected decideDirective(_error: Error, _supervised: Supervised, _strategy: SupervisionStrategy): SupervisionDirective {
    return SupervisionDirective.Restart
  }
}

class ShortWindowStrategy extends SupervisionStrategy {
  intensity(): number {
    return 1
  }

  period(): number {
    return 30
  }
}

class ShortWindowSupervisor extends DefaultSupervisor {
  override supervisionStrategy(): Promise<SupervisionStrategy> {
    return Promise.resolve(new ShortWindowStrategy())
  }

  protected decideDirective(): SupervisionDirective {
    return SupervisionDirective.Restart
  }
}

const pause = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

describe('Supervision', () => {
  let logger: TestLogger
  let testStage: LocalStage

  beforeEach(() => {
    logger = new TestLogger()
    testStage = new LocalStage({ logger, addressFactory: NumericAddress })
  })

  afterEach(async () => {
    await testStage.close()
  })

  describe('Default supervisor', () => {
    it('should restart a faulted actor with its initial behavior and fresh state', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      probe.tell({ type: 'Record', value: 'before' })
      probe.tell({ type: 'Push' })
      probe.tell({ type: 'Fail', reason: 'boom' })

      const snapshot = await probe.inspect()

      expect(snapshot.depth).toBe(1)
      expect(snapshot.current).toBe('Primary')
      expect(snapshot.status).toBe(ActorStatus.Running)
      expect(recordsOf(snapshot.state)).toEqual([])
    })

    it('should log the fault and the directive', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      probe.tell({ type: 'Fail', reason: 'boom' })

      await probe.inspect()

      const address = probe.address().valueAsString()
      expect(logger.messages('error')).toContain('Message processing failed: boom')
      expect(logger.messages('error')).toContain(
        `RestartingSupervisor: Failure of: ${address} because: boom Action: Restarting.`
      )
    })

    it('should keep processing messages queued behind the fault', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      probe.tell({ type: 'Fail', reason: 'boom' })
      probe.tell({ type: 'Record', value: 'after' })

      const snapshot = await probe.inspect()

      expect(recordsOf(snapshot.state)).toEqual(['primary:after'])
    })

    it('should restart without limit', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      for (let i = 0; i < 5; i++) {
        probe.tell({ type: 'Fail', reason: 'again' })
      }

      const snapshot = await probe.inspect()

      expect(probe.isStopped()).toBe(false)
      expect(snapshot.depth).toBe(1)
      expect(logger.messages('log').filter(message => message.endsWith(' subject: restart()'))).toHaveLength(5)
    })

    it('should run the start hook after a supervised restart', async () => {
      const probe = testStage.actorFor(startingProbeProtocol(ProbeBehaviors.alternate))
      probe.tell({ type: 'Fail', reason: 'boom' })

      const snapshot = await probe.inspect()

      expect(recordsOf(snapshot.state)).toEqual(['started'])
      expect(snapshot.behaviors).toEqual(['Primary', 'Alternate'])
    })

    it('should drop behavior changes requested before the fault', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      probe.tell({ type: 'PushThenFail' })

      const snapshot = await probe.inspect()

      expect(snapshot.behaviors).toEqual(['Primary'])
    })

    it('should restart an actor whose start hook fails', async () => {
      const probe = testStage.actorFor(failingStartProbeProtocol(1))

      const snapshot = await probe.inspect()

      expect(snapshot.status).toBe(ActorStatus.Running)
      expect(snapshot.behaviors).toEqual(['Primary', 'Alternate'])
      expect(recordsOf(snapshot.state)).toEqual(['started'])
      expect(logger.messages('error')).toContain('Message processing failed: start failed')
      expect(logger.messages('log').filter(message => message.endsWith(' subject: restart()'))).toHaveLength(1)
    })

    it('should restart an actor whose action rejects asynchronously', async () => {
      const probe = testStage.actorFor(ProbeProtocol)
      probe.tell({ type: 'Record', value: 'lost' })
      probe.tell({ type: 'SlowPushThenFail' })

      const snapshot = await probe.inspect()

      expect(snapshot.behaviors).toEqual(['Primary'])
      expect(recordsOf(snapshot.state)).toEqual([])
      expect(logger.messages('error')).toContain('Message processing failed: failed after slow push')
    })

    it('should fall back to the default supervisor for an unknown name', async () => {
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'unregistered' })
      probe.tell({ type: 'Push' })
      probe.tell({ type: 'Fail', reason: 'boom' })

      const snapshot = await probe.inspect()

      expect(snapshot.depth).toBe(1)
    })
  })

  describe('Resume', () => {
    it('should keep state and behaviors but drop the faulted changes', async () => {
      const supervisor = new ResumingSupervisor()
      testStage.registerSupervisor('resuming', supervisor)
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'resuming' })

      probe.tell({ type: 'Record', value: 'a' })
      probe.tell({ type: 'PushThenFail' })
      probe.tell({ type: 'Record', value: 'b' })

      const snapshot = await probe.inspect()

      expect(snapshot.behaviors).toEqual(['Primary'])
      expect(recordsOf(snapshot.state)).toEqual(['primary:a', 'primary:b'])
      expect(supervisor.informed).toEqual(['failed after push'])
      expect(supervisor.faulted).toEqual([probe])
      expect(logger.messages('log')).toContain('Actor resumed after error: failed after push')
    })

    it('should enter Running when a failed start hook is resumed', async () => {
      const supervisor = new ResumingSupervisor()
      testStage.registerSupervisor('resuming', supervisor)
      const probe = testStage.actorFor(failingStartProbeProtocol(1), { supervisorName: 'resuming' })
      probe.tell({ type: 'Record', value: 'after start' })

      const snapshot = await probe.inspect()

      expect(snapshot.status).toBe(ActorStatus.Running)
      expect(snapshot.behaviors).toEqual(['Primary'])
      expect(recordsOf(snapshot.state)).toEqual(['primary:after start'])
      expect(supervisor.informed).toEqual(['start failed'])
    })

    it('should drop changes requested before an asynchronous rejection', async () => {
      const supervisor = new ResumingSupervisor()
      testStage.registerSupervisor('resuming', supervisor)
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'resuming' })

      probe.tell({ type: 'Record', value: 'a' })
      probe.tell({ type: 'SlowPushThenFail' })
      probe.tell({ type: 'Record', value: 'b' })

      const snapshot = await probe.inspect()

      expect(snapshot.behaviors).toEqual(['Primary'])
      expect(recordsOf(snapshot.state)).toEqual(['primary:a', 'primary:b'])
      expect(supervisor.informed).toEqual(['failed after slow push'])
    })

    it('should treat a failing guard as a fault of the message', async () => {
      const supervisor = new ResumingSupervisor()
      testStage.registerSupervisor('resuming', supervisor)
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'resuming' })

      probe.tell({ type: 'Record', value: 'a' })
      probe.tell({ type: 'Check' })
      probe.tell({ type: 'Record', value: 'b' })

      const snapshot = await probe.inspect()

      expect(snapshot.status).toBe(ActorStatus.Running)
      expect(recordsOf(snapshot.state)).toEqual(['primary:a', 'primary:b'])
      expect(supervisor.informed).toEqual(['guard failed'])
      expect(logger.messages('error')).toContain('Message processing failed: guard failed')
    })

    it('should keep a pushed behavior when a later message faults', async () => {
      testStage.registerSupervisor('resuming', new ResumingSupervisor())
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'resuming' })

      probe.tell({ type: 'Push' })
      probe.tell({ type: 'Fail', reason: 'in alternate' })
      probe.tell({ type: 'Record', value: 'kept' })

      const snapshot = await probe.inspect()

      expect(snapshot.behaviors).toEqual(['Primary', 'Alternate'])
      expect(recordsOf(snapshot.state)).toEqual(['current:Primary', 'alternate:kept'])
    })
  })

  describe('Stop', () => {
    it('should stop the actor and dead-letter its queued messages', async () => {
      const listener = new TestDeadLettersListener()
      testStage.deadLetters().registerListener(listener)
      testStage.registerSupervisor('stopping', new StoppingSupervisor())
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'stopping' })

      probe.tell({ type: 'Fail', reason: 'fatal' })
      probe.tell({ type: 'Record', value: 'queued' })

      await awaitAssert(() => {
        expect(probe.isStopped()).toBe(true)
      })
      expect(listener.findByReason('stopped').map(deadLetter => deadLetter.representation()))
        .toEqual(['Record{"value":"queued"}'])
      expect(await testStage.actorOf(probe.address())).toBeUndefined()
    })
  })

  describe('Restart limit', () => {
    it('should stop an actor that faults more often than its strategy permits', async () => {
      testStage.registerSupervisor('limited', new LimitedRestartSupervisor())
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'limited' })

      probe.tell({ type: 'Fail', reason: 'first' })
      const restarted = await probe.inspect()
      expect(restarted.status).toBe(ActorStatus.Running)

      probe.tell({ type: 'Fail', reason: 'second' })

      await awaitAssert(() => {
        expect(probe.isStopped()).toBe(true)
      })
      expect(logger.messages('error')).toContain(
        `Restart limit of 1 within 5000ms exceeded by: ${probe.address().valueAsString()} Action: Stopping.`
      )
    })

    it('should forget actors whose restarts fall outside the period', async () => {
      const supervisor = new ShortWindowSupervisor()
      testStage.registerSupervisor('short', supervisor)
      const first = testStage.actorFor(ProbeProtocol, { supervisorName: 'short' })
      const second = testStage.actorFor(ProbeProtocol, { supervisorName: 'short' })

      first.tell({ type: 'Fail', reason: 'first' })
      await first.inspect()
      expect(supervisor.trackedActorCount()).toBe(1)

      await pause(40)

      second.tell({ type: 'Fail', reason: 'second' })
      await second.inspect()

      expect(supervisor.trackedActorCount()).toBe(1)
      expect(first.isStopped()).toBe(false)
      expect(second.isStopped()).toBe(false)
    })

    it('should drop the history of an actor it stops', async () => {
      const supervisor = new LimitedRestartSupervisor()
      testStage.registerSupervisor('limited', supervisor)
      const probe = testStage.actorFor(ProbeProtocol, { supervisorName: 'limited' })

      probe.tell({ type: 'Fail', reason: 'first' })
      await probe.inspect()
      expect(supervisor.trackedActorCount()).toBe(1)

      probe.tell({ type: 'Fail', reason: 'second' })
      await awaitAssert(() => {
        expect(probe.isStopped()).toBe(true)
      })

      expect(supervisor.trackedActorCount()).toBe(0)
    })

    it('should count restarts per actor', async () => {
      testStage.registerSupervisor('limited', new LimitedRestartSupervisor())
      const first = testStage.actorFor(ProbeProtocol, { supervisorName: 'limited' })
      const second = testStage.actorFor(ProbeProtocol, { supervisorName: 'limited' })

      first.tell({ type: 'Fail', reason: 'first' })
      second.tell({ type: 'Fail', reason: 'second' })

      await first.inspect()
      await second.inspect()

      expect(first.isStopped()).toBe(false)
      expect(second.isStopped()).toBe(false)
    })
  })

  describe('Registry', () => {
    it('should register a RestartingSupervisor as default', () => {
      expect(testStage.supervisor()).toBeInstanceOf(RestartingSupervisor)
    })

    it('should use a configured default supervisor', () => {
      const stopping = new StoppingSupervisor()
      const configured = new LocalStage({ logger, defaultSupervisor: stopping })

      expect(configured.supervisor('default')).toBe(stopping)
    })

    it('should return registered supervisors by name', () => {
      const resuming = new ResumingSupervisor()
      testStage.registerSupervisor('resuming', resuming)

      expect(testStage.supervisor('resuming')).toBe(resuming)
    })

    it('should throw for an unregistered name', () => {
      expect(() => testStage.supervisor('missing')).toThrow(SupervisorNotFoundError)
      expect(() => testStage.supervisor('missing')).toThrow('Supervisor not found: missing')
    })
  })
})
