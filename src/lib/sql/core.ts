import { loadModule } from '@libpg-query/parser'

// ============ Module Loading ============
let moduleLoaded = false
let moduleLoadingPromise: Promise<void> | null = null

export async function ensureModuleLoaded(): Promise<void> {
  if (moduleLoaded) return
  if (moduleLoadingPromise) return moduleLoadingPromise
  moduleLoadingPromise = loadModule().then(() => {
    moduleLoaded = true
  })
  return moduleLoadingPromise
}

export function isModuleLoaded(): boolean {
  return moduleLoaded
}
