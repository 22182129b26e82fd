// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  DefaultSupervisionStrategy,
  ForeverSupervisionStrategy,
  type Supervised,
  SupervisionDirective,
  SupervisionStrategy,
  type Supervisor
} from './Supervisor.js'

/**
 * Base class for supervisors.
 *
 * inform() asks decideDirective() what to do and applies it. Restarts are
 * counted per actor against the strategy: an actor that faults more than
 * intensity() times within period() is stopped instead of restarted.
 *
 * ```typescript
 * class ValidationSupervisor extends DefaultSupervisor {
 *   protected decideDirective(error: Error): SupervisionDirective {
 *     return error instanceof ValidationError
 *       ? SupervisionDirective.Resume
 *       : SupervisionDirective.Restart
 *   }
 * }
 *
 * stage().registerSupervisor('validation', new ValidationSupervisor())
 * ```
 */
export abstract class DefaultSupervisor implements Supervisor {
  private readonly restarts: Map<string, number[]> = new Map()

  async inform(error: Error, supervised: Supervised): Promise<void> {
    const strategy = await this.supervisionStrategy()
    const directive = this.decideDirective(error, supervised, strategy)

    switch (directive) {
      case SupervisionDirective.Restart:
        if (this.restartPermitted(supervised, strategy)) {
          await supervised.restart()
        } else {
          supervised.logger().error(
            `Restart limit of ${strategy.intensity()} within ${strategy.period()}ms exceeded by: ${supervised.address().valueAsString()} Action: Stopping.`
          )
          await supervised.stop()
        }
        break

      case SupervisionDirective.Resume:
        supervised.resume()
        break

      case SupervisionDirective.Stop:
        this.restarts.delete(supervised.address().valueAsString())
        await supervised.stop()
        break
    }
  }

  supervisionStrategy(): Promise<SupervisionStrategy> {
    return Promise.resolve(new DefaultSupervisionStrategy())
  }

  /**
   * Number of actors with restarts counted against the current period.
   */
  trackedActorCount(): number {
    return this.restarts.size
  }

  /**
   * Decides how to handle the fault.
   *
   * @param error The fault
   * @param supervised The faulted actor
   * @param strategy The restart limits in effect
   */
  protected abstract decideDirective(
    error: Error,
    supervised: Supervised,
    strategy: SupervisionStrategy
  ): SupervisionDirective

  private restartPermitted(supervised: Supervised, strategy: SupervisionStrategy): boolean {
    if (strategy.intensity() === SupervisionStrategy.ForeverIntensity) {
      return true
    }

    const now = Date.now()
    this.pruneExpired(now, strategy.period())

    const key = supervised.address().valueAsString()
    const recent = (this.restarts.get(key) ?? []).filter(at => now - at < strategy.period())

    if (recent.length >= strategy.intensity()) {
      this.restarts.delete(key)
      return false
    }

    recent.push(now)
    this.restarts.set(key, recent)
    return true
  }

  // Actors stopped or quiet for a whole period leave no history behind.
  private pruneExpired(now: number, period: number): void {
    for (const [key, times] of this.restarts) {
      if (times.every(at => now - at >= period)) {
        this.restarts.delete(key)
      }
    }
  }
}

/**
 * The stage's default supervisor: every fault restarts the actor, without limit.
 */
export class RestartingSupervisor extends DefaultSupervisor {
  override supervisionStrategy(): Promise<SupervisionStrategy> {
    return Promise.resolve(new ForeverSupervisionStrategy())
  }

  protected decideDirective(error: Error, supervised: Supervised): SupervisionDirective {
    supervised.logger().error(
      `RestartingSupervisor: Failure of: ${supervised.address().valueAsString()} because: ${error.message} Action: Restarting.`,
      error
    )
    return SupervisionDirective.Restart
  }
}
