// services/angel-service/index.ts
import { AngelService } from './AngelService'
import { HistoricalDataService } from './HistoricalDataService'
import { AngelConfig } from './types'

export { AngelService } from './AngelService'
export { HistoricalDataService } from './HistoricalDataService'

export * from './types'

export function createAngelServices(config: AngelConfig) {
  const angel = new AngelService(config)
  return {
    angel,
    historical: new HistoricalDataService(angel),
  }
}
