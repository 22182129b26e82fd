// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Address } from './Address.js'
import type { Directory } from './Directory.js'
import type { Stage } from './Stage.js'
import type { Supervised } from './Supervisor.js'

/**
 * Stage operations used by the runtime itself, not by clients.
 */
export interface StageInternal extends Stage {
  directory(): Directory

  removeFromDirectory(address: Address): void

  /**
   * Hands a faulted actor to the supervisor named in its environment.
   * Its mailbox is already suspended.
   */
  handleFailureOf(supervised: Supervised, supervisorName: string): void
}
