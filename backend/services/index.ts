// services/index.ts
import { RunReport } from '../../shared/types'
import { resolveIndexProfiles } from '../config/indexProfiles'
import { Settings, validateCredentials } from '../config/settings'
import { linearBackoff } from '../utils/util'
import { createAngelServices } from './angel-service'
import { CandleFetchService } from './CandleFetchService'
import { ContractFilterService } from './ContractFilterService'
import { ExpirySnapshotService } from './ExpirySnapshotService'
import { SnapshotFetchCoordinator } from './SnapshotFetchCoordinator'
import { SnapshotJobService } from './SnapshotJobService'
import { StrikeRangeService } from './StrikeRangeService'
import { SymbolMasterService } from './SymbolMasterService'
import { TelegramDeliveryService } from './TelegramDeliveryService'

export { ExpirySnapshotService } from './ExpirySnapshotService'
export { SnapshotJobService } from './SnapshotJobService'

export * from './types'

/**
 * Wires one run: fresh session, fresh services. Credentials are checked
 * before anything touches the network.
 */
export function createSnapshotRunner(settings: Settings): () => Promise<RunReport> {
  return async () => {
    validateCredentials(settings)

    const { angel, historical } = createAngelServices(settings.angel)
    await angel.login()

    const { fetch } = settings
    const snapshot = new ExpirySnapshotService({
      symbolMaster: new SymbolMasterService(settings.symbolMasterUrl),
      ranges: new StrikeRangeService(historical, fetch.lookbackWeeks),
      filter: new ContractFilterService(),
      coordinator: new SnapshotFetchCoordinator(
        new CandleFetchService(historical, linearBackoff(fetch.maxAttempts, fetch.backoffUnitMs)),
        { maxConcurrent: fetch.maxWorkers, minTimeMs: fetch.minTimeMs }
      ),
      delivery: new TelegramDeliveryService(settings.telegram),
      historyDays: fetch.historyDays,
      outputDir: settings.outputDir,
    })

    return snapshot.run(resolveIndexProfiles(settings.indices))
  }
}

export function createSnapshotJob(settings: Settings): SnapshotJobService {
  return new SnapshotJobService(createSnapshotRunner(settings))
}
