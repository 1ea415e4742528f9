import fs from 'fs-extra'
import path from 'path'

import { writeJsonAtomic } from '../core/fs-ops.js'
import { fragmentPath, Namespace, RepoLayout } from '../repo/layout.js'
import type { Domain, Fragment, ObservedFragment } from '../types.js'

/**
 * Raw fragment documents as they sit in the repository, keyed by domain.
 * Validation happens where a plugin's schema is known.
 */
export interface FragmentSet {
  desired: Record<Domain, unknown>
  observed: Record<Domain, unknown>
}

export class FragmentStore {
  constructor(readonly layout: RepoLayout) {}

  async read(ns: Namespace, domain: Domain): Promise<unknown | undefined> {
    const p = fragmentPath(this.layout, ns, domain)
    if (!await fs.pathExists(p)) return undefined
    return await fs.readJson(p)
  }

  async domains(ns: Namespace): Promise<Domain[]> {
    const dir = ns === 'desired' ? this.layout.desiredDir : this.layout.observedDir
    if (!await fs.pathExists(dir)) return []
    const names = await fs.readdir(dir)
    return names
      .filter(n => n.endsWith('.json'))
      .map(n => path.basename(n, '.json'))
      .sort()
  }

  async readAll(): Promise<FragmentSet> {
    const set: FragmentSet = { desired: {}, observed: {} }
    for (const ns of ['desired', 'observed'] as const) {
      for (const domain of await this.domains(ns)) {
        set[ns][domain] = await this.read(ns, domain)
      }
    }
    return set
  }

  /**
   * Observed fragments are replaced wholesale.
   */
  async writeObserved(fragment: ObservedFragment): Promise<void> {
    await writeJsonAtomic(fragmentPath(this.layout, 'observed', fragment.domain), fragment)
  }

  /**
   * Only used when seeding a fresh twin. The engine otherwise treats desired fragments as read-only.
   */
  async writeDesired(fragment: Fragment): Promise<void> {
    await writeJsonAtomic(fragmentPath(this.layout, 'desired', fragment.domain), fragment)
  }
}
