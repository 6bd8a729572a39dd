/**
 * Logger utility for consistent loader output
 */
export class LoadLogger {
  constructor(
    private verbose: boolean = false,
    private scope: string = 'TPCH',
    private enabled: boolean = true
  ) {}

  info(message: string): void {
    if (this.enabled) {
      console.log(`[${this.scope}] ${message}`)
    }
  }

  debug(message: string): void {
    if (this.enabled && this.verbose) {
      console.log(`[${this.scope}:DEBUG] ${message}`)
    }
  }

  error(message: string, error?: Error): void {
    if (!this.enabled) return
    console.error(`[${this.scope}:ERROR] ${message}`)
    if (error && this.verbose) {
      console.error(error)
    }
  }

  warn(message: string): void {
    if (this.enabled) {
      console.warn(`[${this.scope}:WARN] ${message}`)
    }
  }

  child(scope: string): LoadLogger {
    return new LoadLogger(this.verbose, `${this.scope}:${scope}`, this.enabled)
  }
}

// Default for library calls that were not handed a logger
export const silentLogger = new LoadLogger(false, 'TPCH', false)
