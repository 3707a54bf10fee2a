import { SettingsStore } from './SettingsStore'
import { ConversionStore } from './ConversionStore'

/**
 * Root store combining all stores
 */
export class RootStore {
  settingsStore: SettingsStore
  conversionStore: ConversionStore

  constructor() {
    this.settingsStore = new SettingsStore()
    this.conversionStore = new ConversionStore(this.settingsStore)
  }

  /**
   * Reset all stores
   */
  reset(): void {
    this.conversionStore.reset()
    this.settingsStore.reset()
  }
}
