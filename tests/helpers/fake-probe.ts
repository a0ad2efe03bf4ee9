/**
 * Scriptable process probe
 *
 * Tracks a set of live pids and records every signal. Each pid can be told
 * which signal kills it.
 * @module tests/helpers/fake-probe
 */

import type { ProcessProbe, SignalKind } from '../../lib/process/liveness.js'

export type DiesOn = SignalKind | 'never'

export class FakeProcessProbe implements ProcessProbe {
  readonly signals: Array<{ pid: number; kind: SignalKind }> = []
  #alive = new Map<number, DiesOn>()

  constructor(alive: Record<number, DiesOn> = {}) {
    for (const [pid, diesOn] of Object.entries(alive)) {
      this.#alive.set(Number(pid), diesOn)
    }
  }

  exists(pid: number): boolean {
    return this.#alive.has(pid)
  }

  signal(pid: number, kind: SignalKind): void {
    this.signals.push({ pid, kind })
    const diesOn = this.#alive.get(pid)
    if (diesOn === kind || (diesOn === 'graceful' && kind === 'forceful')) {
      this.#alive.delete(pid)
    }
  }

  kinds(): SignalKind[] {
    return this.signals.map((entry) => entry.kind)
  }
}
