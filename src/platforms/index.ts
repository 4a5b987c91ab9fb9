/**
 * Adapter registry; board configs select a layout by key.
 */

import type { LayoutKey } from '../schema/deal.js'
import type { BoardAdapter } from './adapter.js'
import { arcalive } from './arcalive.js'
import { bbasak } from './bbasak.js'
import { clien } from './clien.js'
import { coolenjoy } from './coolenjoy.js'
import { dealbada } from './dealbada.js'
import { eomisae } from './eomisae.js'
import { quasarzone } from './quasarzone.js'
import { ruliweb } from './ruliweb.js'

export type AdapterRegistry = ReadonlyMap<LayoutKey, BoardAdapter>

export const adapters: AdapterRegistry = new Map<LayoutKey, BoardAdapter>([
  ['clien', clien],
  ['ruliweb', ruliweb],
  ['quasarzone', quasarzone],
  ['coolenjoy', coolenjoy],
  ['dealbada', dealbada],
  ['arcalive', arcalive],
  ['bbasak', bbasak],
  ['eomisae', eomisae],
])

export type { BoardAdapter } from './adapter.js'
