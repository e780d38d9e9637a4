import { loadVmEnv, type VmEnv } from '@nipvm/core'
import type { Safe } from '@nipvm/types'
import { safeCall, safeError, safeResult } from '@nipvm/types'
import { FileByteSource, PagedMessageStore } from '@nipvm/vm'
import { isValidPath } from './validation'

export interface OpenedStore {
  env: VmEnv
  source: FileByteSource
  store: PagedMessageStore
}

/**
 * Load the environment and open a paged store over a message file
 */
export function openMessageStore(file: string): Safe<OpenedStore> {
  if (!isValidPath(file)) {
    return safeError(new Error(`Invalid message file path: ${file}`))
  }

  const [envError, env] = safeCall(() => loadVmEnv())
  if (envError) return safeError(envError)

  const [openError, source] = FileByteSource.open(file)
  if (openError) return safeError(openError)

  const store = new PagedMessageStore(source, {
    capacity: env.NIPVM_PAGE_CACHE_PAGES,
  })
  return safeResult({ env, source, store })
}
