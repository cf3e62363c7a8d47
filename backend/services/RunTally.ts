// services/RunTally.ts
import { FailedSymbol } from '../../shared/types'

/**
 * Succeeded and failed symbols for one scope (an index, or a whole run).
 * Created per invocation and passed around explicitly.
 */
export class RunTally {
  private readonly succeededSymbols: string[] = []
  private readonly failedContracts: FailedSymbol[] = []

  recordSuccess(symbol: string): void {
    this.succeededSymbols.push(symbol)
  }

  recordFailure(symbol: string, reason: string): void {
    this.failedContracts.push({ symbol, reason })
  }

  absorb(succeeded: readonly string[], failed: readonly FailedSymbol[]): void {
    this.succeededSymbols.push(...succeeded)
    this.failedContracts.push(...failed)
  }

  get succeeded(): string[] {
    return [...this.succeededSymbols]
  }

  get failed(): FailedSymbol[] {
    return [...this.failedContracts]
  }
}
