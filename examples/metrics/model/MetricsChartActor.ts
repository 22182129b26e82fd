// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { Actor, type HandlerSet, handlers, ObservableState, type Protocol, protocolOf } from '../../../src/index.js'

export type ChartMessage =
  | { readonly type: 'Metric', readonly value: number }
  | { readonly type: 'TogglePause' }
  | { readonly type: 'Clear' }

export interface ChartState {
  readonly maxPoints: number
  points: number[]
  /** Metrics refused for not being finite numbers */
  rejected: number
}

function record(state: ChartState, value: number): void {
  state.points.push(value)
  if (state.points.length > state.maxPoints) {
    state.points.shift()
  }
}

// Paused sits on top of Charting, so there is no Clear while paused.
const paused: HandlerSet<ChartMessage, ChartState> = handlers<ChartMessage, ChartState>('Paused')
  .match('Metric', (_metric, { state }) => record(state, 0))
  .match('TogglePause', (_toggle, context) => context.unbecome())
  .build()

const charting: HandlerSet<ChartMessage, ChartState> = handlers<ChartMessage, ChartState>('Charting')
  .matchWhen('Metric', metric => !Number.isFinite(metric.value), (_metric, { state }) => {
    state.rejected++
  })
  .match('Metric', (metric, { state }) => record(state, metric.value))
  .match('TogglePause', (_toggle, context) => context.become(paused, false))
  .match('Clear', (_clear, { state }) => {
    state.points = []
  })
  .build()

/**
 * A rolling chart of the latest metric values.
 *
 * While paused, every metric is charted as zero, keeping the time axis
 * continuous.
 */
export class MetricsChartActor extends Actor<ChartMessage, ChartState> {
  private readonly maxPoints: number

  constructor(maxPoints: number) {
    super()
    this.maxPoints = maxPoints
  }

  protected initialState(): ChartState {
    return { maxPoints: this.maxPoints, points: [], rejected: 0 }
  }

  protected initialBehavior(): HandlerSet<ChartMessage, ChartState> {
    return charting
  }

  protected override observableState(state: Readonly<ChartState>): ObservableState {
    return new ObservableState()
      .putValue('points', [...state.points])
      .putValue('rejected', state.rejected)
  }
}

export const metricsChartProtocol = (maxPoints: number = 60): Protocol<ChartMessage, ChartState> =>
  protocolOf('MetricsChart', () => new MetricsChartActor(maxPoints))

export const ChartBehaviors = { charting, paused } as const
