// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { stage } from '../../src/index.js'
import { metricsChartProtocol } from './model/MetricsChartActor.js'

/**
 * Pausable chart walkthrough: chart, pause, chart zeros, resume.
 */
async function main(): Promise<void> {
  const chart = stage().actorFor(metricsChartProtocol(8))

  for (const value of [3, 5, 8]) {
    chart.tell({ type: 'Metric', value })
  }

  chart.tell({ type: 'TogglePause' })
  chart.tell({ type: 'Metric', value: 13 })

  const whilePaused = await chart.inspect()
  console.log(`paused: ${whilePaused.behaviors.join(' > ')} points:`, whilePaused.state['points'])

  chart.tell({ type: 'TogglePause' })
  chart.tell({ type: 'Metric', value: 21 })

  const resumed = await chart.inspect()
  console.log(`resumed: ${resumed.behaviors.join(' > ')} points:`, resumed.state['points'])

  await stage().close()
}

main().catch((error: unknown) => {
  console.error('Metrics example failed:', error)
  process.exitCode = 1
})
