/** Line sclang prints once the LanguageServer quark accepts UDP traffic. */
export const DEFAULT_READY_MARKER = '***LSP READY***'

/**
 * One-shot latch for the readiness transition.
 *
 * Fed every output line of the child; `observe()` returns true for the first
 * line containing the marker and false for every line after it, so the relay
 * is brought up exactly once per session however often the marker repeats.
 */
export class ReadinessLatch {
  private fired = false

  constructor(readonly marker: string = DEFAULT_READY_MARKER) {}

  get isFired(): boolean {
    return this.fired
  }

  observe(line: string): boolean {
    if (this.fired || !line.includes(this.marker)) {
      return false
    }
    this.fired = true
    return true
  }
}
