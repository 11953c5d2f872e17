import { DatabaseMisuseError } from './errors.js'

/** Something that must be released when the block that opened it ends. */
export interface ScopedResource {
  close(): void
}

/**
 * The lifetime of one queue block. Cursors opened during the block are
 * registered here and closed when it ends; afterwards they refuse to step.
 */
export class ExecutionContext {
  private active = true
  private readonly resources = new Set<ScopedResource>()

  get isActive(): boolean {
    return this.active
  }

  track(resource: ScopedResource): void {
    this.resources.add(resource)
  }

  untrack(resource: ScopedResource): void {
    this.resources.delete(resource)
  }

  /** Called by the queue when the block returns or throws. */
  end(): void {
    this.active = false
    for (const resource of [...this.resources]) {
      resource.close()
    }
    this.resources.clear()
  }
}

/** Hands out the context of the running block, or fails when none runs. */
export interface ContextProvider {
  currentContext(): ExecutionContext
}

export function assertActive(context: ExecutionContext | null, what: string): ExecutionContext {
  if (context === null || !context.isActive) {
    throw new DatabaseMisuseError(`${what} used outside of a database block`)
  }
  return context
}
